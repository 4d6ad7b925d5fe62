import type { SyncSnapshot, SyncStatus } from '@domain/types/sync.js';
import { InvalidSyncTransitionError } from '@shared/lib/errors.js';

/**
 * Legal sync status moves. A move to the current status is always allowed
 * (it refreshes the error message without changing state).
 *
 * A failed account check reaches `error` from any resting state. `no-account`
 * otherwise leaves only through `unknown`, which the account check sets once
 * it sees a signed-in user again.
 */
const TRANSITIONS: Record<SyncStatus, readonly SyncStatus[]> = {
  unknown: ['syncing', 'error', 'no-account'],
  syncing: ['synced', 'error'],
  synced: ['syncing', 'error', 'no-account'],
  error: ['syncing', 'no-account', 'unknown'],
  'no-account': ['unknown', 'error'],
};

export function canTransition(from: SyncStatus, to: SyncStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

type SnapshotListener = (snapshot: SyncSnapshot) => void;

/**
 * Observable holder of the mirror's sync status.
 * Owned by the remote mirror; readers subscribe with onChange().
 */
export class SyncStatusTracker {
  private current: SyncStatus = 'unknown';
  private lastSyncAt?: string;
  private lastError?: string;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly now: () => Date;

  constructor(initial: { lastSyncAt?: string; now?: () => Date } = {}) {
    this.lastSyncAt = initial.lastSyncAt;
    this.now = initial.now ?? (() => new Date());
  }

  get status(): SyncStatus {
    return this.current;
  }

  /**
   * Move to `to`. `error` carries the message shown for the error and
   * no-account states; any other target clears it.
   *
   * @throws InvalidSyncTransitionError for a move the table does not allow
   */
  transition(to: SyncStatus, error?: string): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidSyncTransitionError(this.current, to);
    }
    this.current = to;
    this.lastError = to === 'error' || to === 'no-account' ? error : undefined;
    if (to === 'synced') {
      this.lastSyncAt = this.now().toISOString();
    }
    this.emit();
  }

  snapshot(): SyncSnapshot {
    const snap: SyncSnapshot = { status: this.current };
    if (this.lastSyncAt) snap.lastSyncAt = this.lastSyncAt;
    if (this.lastError) snap.lastError = this.lastError;
    return snap;
  }

  onChange(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const snap = this.snapshot();
    for (const listener of this.listeners) {
      listener(snap);
    }
  }
}
