import { z } from 'zod/v4';

export const SyncStatus = z.enum(['unknown', 'syncing', 'synced', 'error', 'no-account']);

export type SyncStatus = z.infer<typeof SyncStatus>;

export const AccountStatus = z.enum([
  'available',
  'no-account',
  'restricted',
  'could-not-determine',
  'temporarily-unavailable',
]);

export type AccountStatus = z.infer<typeof AccountStatus>;

/** Persisted between runs in sync-state.json. */
export const SyncStateSchema = z.object({
  lastSyncAt: z.string().datetime().optional(),
});

export type SyncState = z.infer<typeof SyncStateSchema>;

export interface SyncSnapshot {
  status: SyncStatus;
  lastSyncAt?: string;
  lastError?: string;
}
