export const VELLUM_DIRS = {
  root: '.vellum',
  media: 'media',
  exports: 'exports',
  catalog: 'catalog.json',
  config: 'config.json',
  syncState: 'sync-state.json',
} as const;

export type VellumDirKey = keyof typeof VELLUM_DIRS;

/** Version stamped into the catalog blob. */
export const CATALOG_VERSION = 1;
