import { z } from 'zod/v4';

export const DIARY_RECORD_TYPE = 'DiaryEntry';

export const RemoteAssetSchema = z.object({
  fileName: z.string().min(1),
  /** Where the remote store keeps the asset bytes. */
  path: z.string().min(1),
});

export type RemoteAsset = z.infer<typeof RemoteAssetSchema>;

/**
 * Field bag of one remote record. Everything is optional at this level;
 * decoding into an entry decides which fields are required.
 */
export const RemoteRecordFieldsSchema = z.object({
  entryID: z.string().optional(),
  title: z.string().optional(),
  content: z.string().optional(),
  type: z.string().optional(),
  date: z.string().optional(),
  mood: z.string().optional(),
  transcription: z.string().optional(),
  audioAsset: RemoteAssetSchema.optional(),
  videoAsset: RemoteAssetSchema.optional(),
  photoAssets: z.array(RemoteAssetSchema).optional(),
});

export type RemoteRecordFields = z.infer<typeof RemoteRecordFieldsSchema>;

export const RemoteRecordSchema = z.object({
  recordName: z.string().min(1),
  recordType: z.literal(DIARY_RECORD_TYPE),
  /** Server-side creation time; the query order key. */
  createdAt: z.string().datetime(),
  fields: RemoteRecordFieldsSchema,
});

export type RemoteRecord = z.infer<typeof RemoteRecordSchema>;
