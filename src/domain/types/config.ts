import { z } from 'zod/v4';

export const SyncProvider = z.enum(['none', 'folder']);

export type SyncProvider = z.infer<typeof SyncProvider>;

export const VellumConfigSchema = z.object({
  /** Remote mirror settings */
  sync: z.object({
    /** Whether the journal mirrors itself to the remote record store */
    enabled: z.boolean().default(false),
    /** Pull and push in the background on open and after each new entry */
    autoSync: z.boolean().default(true),
    /**
     * Remote record store backing the mirror.
     * - 'none': no remote; the mirror is a no-op
     * - 'folder': records and assets in a directory (e.g. a synced cloud drive folder)
     */
    provider: SyncProvider.default('none'),
    /** Root of the folder store. VELLUM_SYNC_FOLDER overrides it. */
    folderPath: z.string().optional(),
    /** Records per upload batch */
    batchSize: z.number().int().min(1).max(400).default(100),
    /** Records per download page */
    pageSize: z.number().int().min(1).max(400).default(100),
  }).default(() => ({
    enabled: false,
    autoSync: true,
    provider: 'none' as const,
    batchSize: 100,
    pageSize: 100,
  })),
  /** Plain-text export settings */
  export: z.object({
    /** Write a .txt rendition of every entry into exports/ */
    textRenditions: z.boolean().default(true),
  }).default(() => ({ textRenditions: true })),
  /**
   * External speech-to-text command. It receives the audio file path as its
   * last argument and prints the transcript on stdout.
   */
  transcription: z.object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    timeoutMs: z.number().int().positive().default(300_000),
  }).default(() => ({ args: [], timeoutMs: 300_000 })),
  /** Journal owner */
  user: z.object({
    name: z.string().optional(),
  }).default({}),
});

export type VellumConfig = z.infer<typeof VellumConfigSchema>;
