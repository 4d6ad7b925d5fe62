import type { Entry } from '@domain/types/entry.js';
import type { AccountStatus, SyncSnapshot } from '@domain/types/sync.js';

/**
 * Port interface for the optional remote replica of the catalog.
 *
 * Implementations never throw from upload/download: failures surface through
 * the sync snapshot. When no account is available every operation is a no-op
 * that reports failure or returns nothing.
 */
export interface IRemoteMirror {
  /** False for the no-op stub resolved when sync is not configured. */
  readonly available: boolean;
  checkAccount(): Promise<AccountStatus>;
  upload(entries: readonly Entry[]): Promise<boolean>;
  download(): Promise<Entry[]>;
  snapshot(): SyncSnapshot;
  onStatusChange(listener: (snapshot: SyncSnapshot) => void): () => void;
}
