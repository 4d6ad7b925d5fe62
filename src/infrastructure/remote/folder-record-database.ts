import { existsSync, statSync } from 'node:fs';
import { copyFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { IRecordDatabase, RecordPage, RecordQuery } from '@domain/ports/record-database.js';
import { RemoteRecordSchema, type RemoteAsset, type RemoteRecord } from '@domain/types/remote-record.js';
import type { AccountStatus } from '@domain/types/sync.js';
import { RemoteServiceError } from '@shared/lib/errors.js';
import { JsonStore } from '@infra/persistence/json-store.js';

const SAFE_NAME = /^[A-Za-z0-9._-]+$/;

/**
 * Record database kept in a plain directory, typically one a cloud drive
 * client already syncs between devices:
 *
 * ```
 * <root>/records/<recordName>.json
 * <root>/assets/<fileName>
 * ```
 *
 * The "account" is available when the root directory exists.
 */
export class FolderRecordDatabase implements IRecordDatabase {
  private readonly recordsDir: string;
  private readonly assetsDir: string;

  constructor(readonly root: string) {
    this.recordsDir = join(root, 'records');
    this.assetsDir = join(root, 'assets');
  }

  async accountStatus(): Promise<AccountStatus> {
    if (!existsSync(this.root)) return 'no-account';
    return statSync(this.root).isDirectory() ? 'available' : 'no-account';
  }

  async query(query: RecordQuery): Promise<RecordPage> {
    const ordered = JsonStore.list(this.recordsDir, RemoteRecordSchema).sort(
      (a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || a.recordName.localeCompare(b.recordName),
    );
    const offset = query.cursor ? Number(query.cursor) : 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RemoteServiceError('query', `invalid cursor "${query.cursor}"`);
    }
    const records = ordered.slice(offset, offset + query.limit);
    const next = offset + records.length;
    return next < ordered.length ? { records, cursor: String(next) } : { records };
  }

  async modify(records: RemoteRecord[]): Promise<void> {
    for (const record of records) {
      assertSafeName(record.recordName);
      JsonStore.write(join(this.recordsDir, `${record.recordName}.json`), record, RemoteRecordSchema);
    }
  }

  async putAsset(localPath: string, fileName: string): Promise<RemoteAsset> {
    assertSafeName(fileName);
    const destination = join(this.assetsDir, fileName);
    await mkdir(this.assetsDir, { recursive: true });
    await copyFile(localPath, destination);
    return { fileName, path: destination };
  }
}

function assertSafeName(name: string): void {
  if (!SAFE_NAME.test(name) || name === '.' || name === '..') {
    throw new RemoteServiceError('write', `unsafe name "${name}"`);
  }
}
