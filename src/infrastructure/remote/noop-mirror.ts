import type { IRemoteMirror } from '@domain/ports/remote-mirror.js';
import type { Entry } from '@domain/types/entry.js';
import type { AccountStatus, SyncSnapshot } from '@domain/types/sync.js';
import { SyncStatusTracker } from '@domain/services/sync-status.js';

/**
 * Mirror used when no remote store is configured. Reports no account,
 * uploads nothing and downloads nothing.
 */
export class NoopRemoteMirror implements IRemoteMirror {
  readonly available = false;
  private readonly tracker: SyncStatusTracker;

  constructor(initial: { lastSyncAt?: string } = {}) {
    this.tracker = new SyncStatusTracker(initial);
    this.tracker.transition('no-account', 'Sync is not configured for this journal.');
  }

  async checkAccount(): Promise<AccountStatus> {
    return 'no-account';
  }

  async upload(_entries: readonly Entry[]): Promise<boolean> {
    return false;
  }

  async download(): Promise<Entry[]> {
    return [];
  }

  snapshot(): SyncSnapshot {
    return this.tracker.snapshot();
  }

  onStatusChange(listener: (snapshot: SyncSnapshot) => void): () => void {
    return this.tracker.onChange(listener);
  }
}
