import type { AccountStatus } from '@domain/types/sync.js';
import type { RemoteAsset, RemoteRecord } from '@domain/types/remote-record.js';

export interface RecordQuery {
  /** Opaque continuation from the previous page. Absent for the first page. */
  cursor?: string;
  limit: number;
}

export interface RecordPage {
  records: RemoteRecord[];
  /** Absent when there are no more pages. */
  cursor?: string;
}

/**
 * Port interface for a per-user remote record store.
 *
 * Mirrors what a managed cloud database offers: an account check, a paginated
 * query over all records of one type (newest first), a batched save keyed by
 * record name, and binary asset upload. No upsert-by-field is assumed.
 */
export interface IRecordDatabase {
  accountStatus(): Promise<AccountStatus>;
  query(query: RecordQuery): Promise<RecordPage>;
  /** Save a batch. Records with an existing recordName are replaced. */
  modify(records: RemoteRecord[]): Promise<void>;
  /** Upload a local file and return the handle to store on a record. */
  putAsset(localPath: string, fileName: string): Promise<RemoteAsset>;
}
