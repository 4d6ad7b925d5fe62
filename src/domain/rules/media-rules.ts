import type { EntryKind, EntryMedia } from '@domain/types/entry.js';

export type MediaField = keyof EntryMedia;

/** Media fields each kind may carry. Absence is always legal. */
export const MEDIA_FIELDS_BY_KIND: Record<EntryKind, readonly MediaField[]> = {
  text: [],
  audio: ['audio'],
  video: ['video'],
  photo: ['photos'],
};

export const MEDIA_EXTENSIONS: Record<Exclude<EntryKind, 'text'>, string> = {
  audio: 'm4a',
  video: 'mov',
  photo: 'jpg',
};

export interface MediaValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check that an entry only carries the media fields its kind allows.
 */
export function validateMediaForKind(
  kind: EntryKind,
  media: EntryMedia,
): MediaValidationResult {
  const errors: string[] = [];
  const allowed = MEDIA_FIELDS_BY_KIND[kind];

  for (const field of ['audio', 'video', 'photos'] as const) {
    if (media[field] !== undefined && !allowed.includes(field)) {
      errors.push(`${kind} entries cannot carry ${field} media`);
    }
  }

  return { valid: errors.length === 0, errors };
}

export function isMediaKind(kind: EntryKind): kind is Exclude<EntryKind, 'text'> {
  return kind !== 'text';
}
