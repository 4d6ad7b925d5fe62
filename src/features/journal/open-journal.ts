import { join } from 'node:path';
import type { IMediaStore } from '@domain/ports/media-store.js';
import type { IPersistence } from '@domain/ports/persistence.js';
import type { IRecordDatabase } from '@domain/ports/record-database.js';
import type { IRemoteMirror } from '@domain/ports/remote-mirror.js';
import type { ITranscriber } from '@domain/ports/transcriber.js';
import { VellumConfigSchema, type VellumConfig } from '@domain/types/config.js';
import { SyncStateSchema, type SyncState } from '@domain/types/sync.js';
import { LocalCatalog } from '@infra/catalog/local-catalog.js';
import { TextRenditionStore } from '@infra/export/text-rendition.js';
import { FileMediaStore } from '@infra/media/media-store.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { FolderRecordDatabase } from '@infra/remote/folder-record-database.js';
import { NoopRemoteMirror } from '@infra/remote/noop-mirror.js';
import { RecordMirror } from '@infra/remote/record-mirror.js';
import { CommandTranscriber } from '@infra/transcription/command-transcriber.js';
import { VELLUM_DIRS } from '@shared/constants/paths.js';
import { logger } from '@shared/lib/logger.js';
import { JournalService } from './journal-service.js';

export interface OpenJournalOptions {
  persistence?: IPersistence;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  /** Use this record database instead of the one the config names. */
  database?: IRecordDatabase;
}

export interface Journal {
  service: JournalService;
  mediaStore: IMediaStore;
  renditions: TextRenditionStore;
  config: VellumConfig;
  /** Absent when no transcription command is configured. */
  transcriber?: ITranscriber;
}

/**
 * Read `.vellum/config.json`. A missing file yields the defaults; an invalid
 * one throws.
 *
 * @throws JsonStoreError if the file exists but cannot be read or validated
 */
export function loadConfig(vellumDir: string, persistence: IPersistence = JsonStore): VellumConfig {
  const path = join(vellumDir, VELLUM_DIRS.config);
  if (!persistence.exists(path)) {
    return VellumConfigSchema.parse({});
  }
  return persistence.read(path, VellumConfigSchema);
}

/** Last recorded sync; empty when the state file is missing or unreadable. */
export function loadSyncState(vellumDir: string, persistence: IPersistence = JsonStore): SyncState {
  const path = join(vellumDir, VELLUM_DIRS.syncState);
  if (!persistence.exists(path)) return {};
  try {
    return persistence.read(path, SyncStateSchema);
  } catch (err) {
    logger.warn('Ignoring unreadable sync state', {
      path,
      error: err instanceof Error ? err.message : String(err),
    });
    return {};
  }
}

/**
 * Pick the remote mirror for this configuration: a record mirror over the
 * folder store when one is configured, otherwise the no-op mirror.
 * `VELLUM_SYNC_FOLDER` overrides `sync.folderPath`.
 */
export function resolveMirror(
  config: VellumConfig,
  mediaStore: IMediaStore,
  options: { env?: NodeJS.ProcessEnv; lastSyncAt?: string; now?: () => Date; database?: IRecordDatabase } = {},
): IRemoteMirror {
  const mirrorOptions = {
    batchSize: config.sync.batchSize,
    pageSize: config.sync.pageSize,
    lastSyncAt: options.lastSyncAt,
    now: options.now,
  };

  if (options.database) {
    return new RecordMirror(options.database, mediaStore, mirrorOptions);
  }

  const env = options.env ?? process.env;
  const folderPath = env['VELLUM_SYNC_FOLDER'] || config.sync.folderPath;
  if (config.sync.provider === 'folder' && folderPath) {
    return new RecordMirror(new FolderRecordDatabase(folderPath), mediaStore, mirrorOptions);
  }
  if (config.sync.provider === 'folder') {
    logger.warn('Folder sync is selected but no folder path is set; set sync.folderPath or VELLUM_SYNC_FOLDER');
  }
  return new NoopRemoteMirror({ lastSyncAt: options.lastSyncAt });
}

/**
 * Wire a journal rooted at a `.vellum/` directory. The catalog is not loaded
 * until `service.open()` is called.
 */
export function createJournal(vellumDir: string, options: OpenJournalOptions = {}): Journal {
  const persistence = options.persistence ?? JsonStore;
  const config = loadConfig(vellumDir, persistence);
  const syncState = loadSyncState(vellumDir, persistence);

  const mediaStore = new FileMediaStore(join(vellumDir, VELLUM_DIRS.media), { now: options.now });
  const renditions = new TextRenditionStore(join(vellumDir, VELLUM_DIRS.exports), { now: options.now });
  const catalog = new LocalCatalog(join(vellumDir, VELLUM_DIRS.catalog), mediaStore, {
    persistence,
    now: options.now,
  });
  const mirror = resolveMirror(config, mediaStore, {
    env: options.env,
    lastSyncAt: syncState.lastSyncAt,
    now: options.now,
    database: options.database,
  });

  const service = new JournalService({
    catalog,
    mediaStore,
    mirror,
    renditions,
    config,
    paths: {
      configPath: join(vellumDir, VELLUM_DIRS.config),
      syncStatePath: join(vellumDir, VELLUM_DIRS.syncState),
    },
    persistence,
    now: options.now,
  });

  const journal: Journal = { service, mediaStore, renditions, config };
  if (config.transcription.command) {
    journal.transcriber = new CommandTranscriber({
      command: config.transcription.command,
      args: config.transcription.args,
      timeoutMs: config.transcription.timeoutMs,
    });
  }
  return journal;
}
