import type { IMediaStore } from '@domain/ports/media-store.js';
import type { IRecordDatabase } from '@domain/ports/record-database.js';
import type { IRemoteMirror } from '@domain/ports/remote-mirror.js';
import type { Entry, MediaRef } from '@domain/types/entry.js';
import { DIARY_RECORD_TYPE, type RemoteAsset, type RemoteRecord } from '@domain/types/remote-record.js';
import type { AccountStatus, SyncSnapshot, SyncStatus } from '@domain/types/sync.js';
import { canTransition, SyncStatusTracker } from '@domain/services/sync-status.js';
import {
  AccountUnavailableError,
  PartialBatchFailureError,
  RemoteServiceError,
  VellumError,
} from '@shared/lib/errors.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';
import { entryToFields, recordToEntry, type RecordAssets } from './record-codec.js';

const ACCOUNT_MESSAGES: Record<Exclude<AccountStatus, 'available'>, string> = {
  'no-account': 'no signed-in account. Sign in to the remote store to sync.',
  restricted: 'the remote store is restricted on this device.',
  'could-not-determine': 'could not determine the account status.',
  'temporarily-unavailable': 'the remote store is temporarily unavailable.',
};

export interface RecordMirrorOptions {
  /** Records per save batch (default 100). */
  batchSize?: number;
  /** Records per query page (default 100). */
  pageSize?: number;
  /** Last successful sync carried over from a previous run. */
  lastSyncAt?: string;
  now?: () => Date;
  newRecordName?: () => string;
  logger?: Logger;
}

/**
 * Remote mirror over a record database.
 *
 * Upload fetches every remote record first (there is no upsert by entry id),
 * reuses the record whose entryID matches, and saves in sequential batches.
 * The first failing batch aborts the rest. Errors are reported through the
 * sync status and never thrown.
 */
export class RecordMirror implements IRemoteMirror {
  readonly available = true;
  private readonly tracker: SyncStatusTracker;
  private readonly batchSize: number;
  private readonly pageSize: number;
  private readonly now: () => Date;
  private readonly newRecordName: () => string;
  private readonly log: Logger;

  constructor(
    private readonly database: IRecordDatabase,
    private readonly mediaStore: IMediaStore,
    options: RecordMirrorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.tracker = new SyncStatusTracker({ lastSyncAt: options.lastSyncAt, now: this.now });
    this.batchSize = options.batchSize ?? 100;
    this.pageSize = options.pageSize ?? 100;
    this.newRecordName = options.newRecordName ?? (() => crypto.randomUUID());
    this.log = options.logger ?? componentLogger('remote-mirror');
  }

  snapshot(): SyncSnapshot {
    return this.tracker.snapshot();
  }

  onStatusChange(listener: (snapshot: SyncSnapshot) => void): () => void {
    return this.tracker.onChange(listener);
  }

  async checkAccount(): Promise<AccountStatus> {
    let status: AccountStatus;
    try {
      status = await this.database.accountStatus();
    } catch (err) {
      const error = new RemoteServiceError('account check', err);
      this.moveTo('error', error.message);
      this.log.warn(error.message);
      return 'could-not-determine';
    }

    if (status === 'available') {
      if (this.tracker.status === 'no-account' || this.tracker.status === 'error') {
        this.moveTo('unknown');
      }
    } else {
      const error = new AccountUnavailableError(ACCOUNT_MESSAGES[status]);
      this.moveTo(status === 'no-account' ? 'no-account' : 'error', error.message);
      this.log.info(error.message, { accountStatus: status });
    }
    return status;
  }

  async upload(entries: readonly Entry[]): Promise<boolean> {
    if ((await this.checkAccount()) !== 'available') {
      return false;
    }

    this.moveTo('syncing');
    try {
      const existing = await this.fetchAll();
      const byEntryId = new Map<string, RemoteRecord>();
      for (const record of existing) {
        const entryId = record.fields.entryID;
        if (entryId !== undefined && !byEntryId.has(entryId)) {
          byEntryId.set(entryId, record);
        }
      }

      const records: RemoteRecord[] = [];
      for (const entry of entries) {
        records.push(await this.toRecord(entry, byEntryId.get(entry.id)));
      }

      const batches = chunk(records, this.batchSize);
      for (const [index, batch] of batches.entries()) {
        try {
          await this.database.modify(batch);
        } catch (err) {
          throw new PartialBatchFailureError(index, batches.length, err);
        }
      }

      this.moveTo('synced');
      this.log.info(`Synced ${entries.length} entries`, { batches: batches.length });
      return true;
    } catch (err) {
      const error = err instanceof VellumError ? err : new RemoteServiceError('upload', err);
      this.moveTo('error', error.message);
      this.log.error('Sync failed', { error: error.message });
      return false;
    }
  }

  async download(): Promise<Entry[]> {
    if ((await this.checkAccount()) !== 'available') {
      return [];
    }

    this.moveTo('syncing');
    try {
      const records = await this.fetchAll();
      const entries: Entry[] = [];
      for (const record of records) {
        const entry = recordToEntry(record);
        if (entry) {
          entries.push(entry);
        } else {
          this.log.debug('Dropping remote record with missing or invalid fields', { recordName: record.recordName });
        }
      }
      this.moveTo('synced');
      return entries;
    } catch (err) {
      const error = err instanceof VellumError ? err : new RemoteServiceError('download', err);
      this.moveTo('error', error.message);
      this.log.error('Failed to fetch entries', { error: error.message });
      return [];
    }
  }

  private async fetchAll(): Promise<RemoteRecord[]> {
    const all: RemoteRecord[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.database.query({ cursor, limit: this.pageSize });
      all.push(...page.records);
      cursor = page.cursor;
    } while (cursor !== undefined);
    return all;
  }

  private async toRecord(entry: Entry, existing: RemoteRecord | undefined): Promise<RemoteRecord> {
    const previous = existing?.fields;
    const assets: RecordAssets = {};

    if (entry.media.audio) {
      assets.audio = await this.assetFor(entry.media.audio, previous?.audioAsset ? [previous.audioAsset] : []);
    }
    if (entry.media.video) {
      assets.video = await this.assetFor(entry.media.video, previous?.videoAsset ? [previous.videoAsset] : []);
    }
    if (entry.media.photos) {
      const photos: RemoteAsset[] = [];
      for (const photo of entry.media.photos) {
        const asset = await this.assetFor(photo, previous?.photoAssets ?? []);
        if (asset) photos.push(asset);
      }
      assets.photos = photos;
    }

    return {
      recordName: existing?.recordName ?? this.newRecordName(),
      recordType: DIARY_RECORD_TYPE,
      createdAt: existing?.createdAt ?? this.now().toISOString(),
      fields: entryToFields(entry, assets),
    };
  }

  /**
   * Asset for a media ref: the one already on the record when the file name
   * matches, otherwise a fresh upload of the local file. A ref with no local
   * file and no previous asset is skipped.
   */
  private async assetFor(ref: MediaRef, previous: readonly RemoteAsset[]): Promise<RemoteAsset | undefined> {
    const known = previous.find((asset) => asset.fileName === ref.fileName);
    if (known) return known;

    const path = this.mediaStore.locate(ref);
    if (!path) {
      this.log.warn(`Skipping missing media "${ref.fileName}" during upload`);
      return undefined;
    }
    return this.database.putAsset(path, ref.fileName);
  }

  private moveTo(status: SyncStatus, error?: string): void {
    if (!canTransition(this.tracker.status, status)) {
      this.log.warn(`Ignoring sync status change ${this.tracker.status} -> ${status}`, error ? { error } : undefined);
      return;
    }
    this.tracker.transition(status, error);
  }
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
