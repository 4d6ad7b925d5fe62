import { join, resolve } from 'node:path';
import { VellumConfigSchema, type VellumConfig } from '@domain/types/config.js';
import { CatalogSchema } from '@domain/types/entry.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { CATALOG_VERSION, VELLUM_DIRS } from '@shared/constants/paths.js';
import { logger } from '@shared/lib/logger.js';

export interface InitOptions {
  cwd: string;
  /** Mirror the journal to this folder. */
  syncFolder?: string;
  userName?: string;
  skipPrompts?: boolean;
  now?: () => Date;
}

export interface InitResult {
  vellumDir: string;
  config: VellumConfig;
  /** False when an existing journal was re-initialized. */
  created: boolean;
}

/**
 * Ask where to mirror the journal. Only called when skipPrompts is false
 * and no folder was given on the command line.
 */
async function promptSyncFolder(): Promise<string | undefined> {
  const { select, input } = await import('@inquirer/prompts');

  const provider = await select({
    message: 'Mirror this journal to another location?',
    choices: [
      { name: 'No, keep it on this device only', value: 'none' },
      { name: 'Yes, to a folder (e.g. one a cloud drive syncs)', value: 'folder' },
    ],
    default: 'none',
  });
  if (provider !== 'folder') return undefined;

  const folder = await input({ message: 'Folder path:' });
  return folder.trim() || undefined;
}

/**
 * Initialize a journal in `<cwd>/.vellum/`.
 *
 * Flow:
 * 1. Confirm before touching an existing .vellum/ (unless skipPrompts)
 * 2. Create .vellum/, media/ and exports/
 * 3. Write config.json
 * 4. Write an empty catalog when none exists
 *
 * Re-initializing rewrites config.json only; entries and media stay.
 */
export async function handleInit(options: InitOptions): Promise<InitResult> {
  const { cwd, skipPrompts = false } = options;
  const now = options.now ?? (() => new Date());
  const vellumDir = join(cwd, VELLUM_DIRS.root);
  const existed = JsonStore.exists(vellumDir);

  if (existed && !skipPrompts) {
    const { confirm } = await import('@inquirer/prompts');
    const proceed = await confirm({
      message: 'A .vellum/ directory already exists. Re-initializing will overwrite config.json. Continue?',
      default: false,
    });
    if (!proceed) {
      throw new Error('Init cancelled; existing .vellum/ directory preserved.');
    }
  }

  let syncFolder = options.syncFolder;
  if (syncFolder === undefined && !skipPrompts) {
    syncFolder = await promptSyncFolder();
  }

  JsonStore.ensureDir(vellumDir);
  JsonStore.ensureDir(join(vellumDir, VELLUM_DIRS.media));
  JsonStore.ensureDir(join(vellumDir, VELLUM_DIRS.exports));

  const config = VellumConfigSchema.parse({
    sync: syncFolder
      ? { enabled: true, provider: 'folder', folderPath: resolve(cwd, syncFolder) }
      : {},
    user: { name: options.userName },
  });
  JsonStore.write(join(vellumDir, VELLUM_DIRS.config), config, VellumConfigSchema);

  const catalogPath = join(vellumDir, VELLUM_DIRS.catalog);
  if (!JsonStore.exists(catalogPath)) {
    JsonStore.write(
      catalogPath,
      { version: CATALOG_VERSION, entries: [], updatedAt: now().toISOString() },
      CatalogSchema,
    );
  }

  if (syncFolder && config.sync.folderPath && !JsonStore.exists(config.sync.folderPath)) {
    logger.warn(`Sync folder "${config.sync.folderPath}" does not exist yet; sync stays idle until it does.`);
  }

  return { vellumDir, config, created: !existed };
}
