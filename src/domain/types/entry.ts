import { z } from 'zod/v4';
import { validateMediaForKind } from '@domain/rules/media-rules.js';

export const EntryKind = z.enum(['text', 'audio', 'video', 'photo']);

export type EntryKind = z.infer<typeof EntryKind>;

export const MediaRefSchema = z.object({
  /** Stable handle, `<kind>_<epochSeconds>.<ext>`. Never a path. */
  fileName: z.string().min(1).refine((name) => !/[\\/]/.test(name), {
    message: 'Media file name must not contain path separators',
  }),
  /** Absolute path the file was last resolved to. Rewritten by path recovery. */
  location: z.string().min(1),
});

export type MediaRef = z.infer<typeof MediaRefSchema>;

export const EntryMediaSchema = z.object({
  audio: MediaRefSchema.optional(),
  video: MediaRefSchema.optional(),
  photos: z.array(MediaRefSchema).optional(),
});

export type EntryMedia = z.infer<typeof EntryMediaSchema>;

export const EntrySchema = z.object({
  id: z.string().uuid(),
  createdAt: z.string().datetime(),
  title: z.string(),
  kind: EntryKind,
  body: z.string().default(''),
  media: EntryMediaSchema.default({}),
  mood: z.string().min(1).optional(),
  transcript: z.string().optional(),
}).superRefine((entry, ctx) => {
  const result = validateMediaForKind(entry.kind, entry.media);
  for (const error of result.errors) {
    ctx.addIssue({ code: 'custom', message: error, path: ['media'] });
  }
});

export type Entry = z.infer<typeof EntrySchema>;

/** Fields a caller may change after creation. `null` clears an optional field. */
export const EntryPatchSchema = z.object({
  title: z.string().optional(),
  body: z.string().optional(),
  mood: z.string().min(1).nullable().optional(),
  transcript: z.string().nullable().optional(),
});

export type EntryPatch = z.infer<typeof EntryPatchSchema>;

export const CatalogSchema = z.object({
  version: z.literal(1),
  entries: z.array(EntrySchema).default([]),
  updatedAt: z.string().datetime(),
});

export type Catalog = z.infer<typeof CatalogSchema>;

/** Every media reference an entry owns, audio first, then video, then photos. */
export function mediaRefsOf(entry: Pick<Entry, 'media'>): MediaRef[] {
  const refs: MediaRef[] = [];
  if (entry.media.audio) refs.push(entry.media.audio);
  if (entry.media.video) refs.push(entry.media.video);
  if (entry.media.photos) refs.push(...entry.media.photos);
  return refs;
}
