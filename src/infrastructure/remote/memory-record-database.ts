import type { IRecordDatabase, RecordPage, RecordQuery } from '@domain/ports/record-database.js';
import type { RemoteAsset, RemoteRecord } from '@domain/types/remote-record.js';
import type { AccountStatus } from '@domain/types/sync.js';

/**
 * In-process record database for tests and dry runs.
 *
 * Records live in a Map keyed by recordName. Assets are not copied: the
 * returned handle points at the local file that was "uploaded".
 * `failModifyAt` makes the n-th modify() call (1-based) reject.
 */
export class MemoryRecordDatabase implements IRecordDatabase {
  account: AccountStatus = 'available';
  accountError?: Error;
  queryError?: Error;
  failModifyAt?: number;
  readonly modifyCalls: RemoteRecord[][] = [];
  readonly uploadedAssets: string[] = [];
  private readonly records = new Map<string, RemoteRecord>();

  async accountStatus(): Promise<AccountStatus> {
    if (this.accountError) throw this.accountError;
    return this.account;
  }

  async query(query: RecordQuery): Promise<RecordPage> {
    if (this.queryError) throw this.queryError;
    const ordered = this.all();
    const offset = query.cursor ? Number(query.cursor) : 0;
    const records = ordered.slice(offset, offset + query.limit);
    const next = offset + records.length;
    return next < ordered.length ? { records, cursor: String(next) } : { records };
  }

  async modify(records: RemoteRecord[]): Promise<void> {
    this.modifyCalls.push(records);
    if (this.failModifyAt === this.modifyCalls.length) {
      throw new Error('quota exceeded');
    }
    for (const record of records) {
      this.records.set(record.recordName, structuredClone(record));
    }
  }

  async putAsset(localPath: string, fileName: string): Promise<RemoteAsset> {
    this.uploadedAssets.push(fileName);
    return { fileName, path: localPath };
  }

  /** Insert records directly, bypassing modify(). */
  seed(records: RemoteRecord[]): void {
    for (const record of records) {
      this.records.set(record.recordName, structuredClone(record));
    }
  }

  /** All records, newest first by creation time. */
  all(): RemoteRecord[] {
    return [...this.records.values()].sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }
}
