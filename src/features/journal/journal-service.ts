import type { IMediaStore, MediaKind, MediaSource } from '@domain/ports/media-store.js';
import type { IPersistence } from '@domain/ports/persistence.js';
import type { IRemoteMirror } from '@domain/ports/remote-mirror.js';
import { MEDIA_FIELDS_BY_KIND, type MediaField } from '@domain/rules/media-rules.js';
import { mergeCatalogs } from '@domain/services/catalog-merger.js';
import { VellumConfigSchema, type VellumConfig } from '@domain/types/config.js';
import type { Entry, EntryKind, EntryMedia, EntryPatch, MediaRef } from '@domain/types/entry.js';
import { SyncStateSchema, type SyncStatus } from '@domain/types/sync.js';
import type { CatalogListener, LocalCatalog } from '@infra/catalog/local-catalog.js';
import type { TextRenditionStore } from '@infra/export/text-rendition.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { InvalidEntryError } from '@shared/lib/errors.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';
import { defaultEntryTitle } from '@shared/lib/naming.js';
import { recoverMediaPaths, type RecoveryReport } from '@features/recovery/path-recovery.js';
import { missingMediaStats, type MissingMediaStats } from '@features/recovery/missing-media.js';

export interface JournalPaths {
  configPath: string;
  syncStatePath: string;
}

export interface JournalServiceDeps {
  catalog: LocalCatalog;
  mediaStore: IMediaStore;
  mirror: IRemoteMirror;
  renditions: TextRenditionStore;
  config: VellumConfig;
  paths: JournalPaths;
  persistence?: IPersistence;
  now?: () => Date;
  newId?: () => string;
  logger?: Logger;
}

export interface CreateEntryInput {
  kind: EntryKind;
  title?: string;
  body?: string;
  mood?: string;
  transcript?: string;
  audio?: MediaSource;
  video?: MediaSource;
  photos?: MediaSource[];
}

export interface JournalStatus {
  entries: number;
  syncEnabled: boolean;
  mirrorAvailable: boolean;
  syncStatus: SyncStatus;
  lastSyncAt?: string;
  lastError?: string;
}

/**
 * The journal: sole owner and writer of the local catalog.
 *
 * Local writes finish before any remote work starts. Uploads and pulls run
 * one at a time through a promise chain; background ones are scheduled on the
 * same chain and never reach the caller. `whenIdle()` waits for the chain.
 */
export class JournalService {
  private readonly catalog: LocalCatalog;
  private readonly mediaStore: IMediaStore;
  private readonly mirror: IRemoteMirror;
  private readonly renditions: TextRenditionStore;
  private readonly paths: JournalPaths;
  private readonly persistence: IPersistence;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly log: Logger;
  private config: VellumConfig;
  private tail: Promise<void> = Promise.resolve();
  /** Ids deleted since open(); a pull in the same session does not bring them back. */
  private readonly deletedIds = new Set<string>();

  constructor(deps: JournalServiceDeps) {
    this.catalog = deps.catalog;
    this.mediaStore = deps.mediaStore;
    this.mirror = deps.mirror;
    this.renditions = deps.renditions;
    this.config = deps.config;
    this.paths = deps.paths;
    this.persistence = deps.persistence ?? JsonStore;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? (() => crypto.randomUUID());
    this.log = deps.logger ?? componentLogger('journal');
  }

  /**
   * Load the catalog and repair media paths, persisting once if anything
   * moved. Starts a background pull and push when auto-sync is on.
   */
  open(): RecoveryReport {
    this.catalog.load();
    const report = this.recover();
    if (this.autoSyncActive()) {
      this.schedule(async () => {
        await this.pullNow();
        await this.syncNow();
      });
    }
    return report;
  }

  entries(): Entry[] {
    return this.catalog.entries();
  }

  getEntry(id: string): Entry | undefined {
    return this.catalog.get(id);
  }

  /**
   * Copy media into the media store, then append and persist the entry.
   * A media file that fails to copy is logged and left off the entry.
   *
   * @throws InvalidEntryError when the kind does not allow the given media
   */
  async createEntry(input: CreateEntryInput): Promise<Entry> {
    assertMediaAllowed(input);

    const createdAt = this.now();
    const media: EntryMedia = {};
    if (input.audio !== undefined) {
      const ref = await this.saveMedia('audio', input.audio);
      if (ref) media.audio = ref;
    }
    if (input.video !== undefined) {
      const ref = await this.saveMedia('video', input.video);
      if (ref) media.video = ref;
    }
    if (input.photos && input.photos.length > 0) {
      const photos: MediaRef[] = [];
      for (const [index, source] of input.photos.entries()) {
        const ref = await this.saveMedia('photo', source, index);
        if (ref) photos.push(ref);
      }
      if (photos.length > 0) media.photos = photos;
    }

    const entry: Entry = {
      id: this.newId(),
      createdAt: createdAt.toISOString(),
      title: input.title?.trim() || defaultEntryTitle(createdAt),
      kind: input.kind,
      body: input.body ?? '',
      media,
    };
    if (input.mood) entry.mood = input.mood;
    if (input.transcript !== undefined) entry.transcript = input.transcript;

    const saved = this.catalog.append(entry);
    this.log.info('Entry saved', { id: saved.id, kind: saved.kind });
    this.afterLocalChange(saved);
    return saved;
  }

  /** @throws EntryNotFoundError if no entry has this id */
  updateEntry(id: string, patch: EntryPatch): Entry {
    const updated = this.catalog.update(id, patch);
    this.afterLocalChange(updated);
    return updated;
  }

  /**
   * Remove an entry with its media and text rendition. The remote copy is
   * left alone; pulls made by this service skip it from now on.
   *
   * @throws EntryNotFoundError if no entry has this id
   */
  deleteEntry(id: string): Entry {
    const removed = this.catalog.remove(id);
    this.deletedIds.add(id);
    this.renditions.delete(id);
    this.log.info('Entry deleted', { id });
    return removed;
  }

  /** Run path recovery over the loaded catalog. */
  recover(): RecoveryReport {
    const report = recoverMediaPaths(this.catalog.entries(), this.mediaStore);
    if (report.repaired.length > 0) {
      this.catalog.replaceAll(report.entries);
      this.log.info(`Repaired ${report.repaired.length} media reference(s)`);
    }
    if (report.unresolved.length > 0) {
      this.log.warn(`${report.unresolved.length} media reference(s) could not be located`, {
        fileNames: report.unresolved.map((u) => u.fileName),
      });
    }
    return report;
  }

  missingMedia(): MissingMediaStats {
    return missingMediaStats(this.catalog.entries(), this.mediaStore);
  }

  /** Push every entry to the remote mirror. Waits for earlier sync work. */
  sync(): Promise<boolean> {
    return this.enqueue(() => this.syncNow());
  }

  /**
   * Fetch remote entries, bring their media into the local store and merge
   * them in. Returns the number of entries added.
   */
  pull(): Promise<number> {
    return this.enqueue(() => this.pullNow());
  }

  /** Save the sync switch to config. Turning it on starts a background push. */
  setSyncEnabled(enabled: boolean): void {
    this.config = { ...this.config, sync: { ...this.config.sync, enabled } };
    this.persistence.write(this.paths.configPath, this.config, VellumConfigSchema);
    this.log.info(`Sync ${enabled ? 'enabled' : 'disabled'}`);
    if (enabled && this.mirror.available) {
      this.schedule(() => this.syncNow());
    }
  }

  /** Resolves once all sync work scheduled so far has settled. */
  whenIdle(): Promise<void> {
    return this.tail;
  }

  status(): JournalStatus {
    const snapshot = this.mirror.snapshot();
    const status: JournalStatus = {
      entries: this.catalog.entries().length,
      syncEnabled: this.config.sync.enabled,
      mirrorAvailable: this.mirror.available,
      syncStatus: snapshot.status,
    };
    if (snapshot.lastSyncAt) status.lastSyncAt = snapshot.lastSyncAt;
    if (snapshot.lastError) status.lastError = snapshot.lastError;
    return status;
  }

  onChange(listener: CatalogListener): () => void {
    return this.catalog.onChange(listener);
  }

  private autoSyncActive(): boolean {
    return this.config.sync.enabled && this.config.sync.autoSync && this.mirror.available;
  }

  private afterLocalChange(entry: Entry): void {
    if (this.config.export.textRenditions) {
      this.renditions.write(entry);
    }
    if (this.autoSyncActive()) {
      this.schedule(() => this.syncNow());
    }
  }

  private async saveMedia(kind: MediaKind, source: MediaSource, index = 0): Promise<MediaRef | undefined> {
    try {
      return await this.mediaStore.save(kind, source, { index });
    } catch (err) {
      this.log.error(`Failed to copy ${kind} media; saving the entry without it`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }

  private async syncNow(): Promise<boolean> {
    if (!this.config.sync.enabled) {
      this.log.info('Sync is disabled; run "vellum sync enable" to turn it on');
      return false;
    }
    const ok = await this.mirror.upload(this.catalog.entries());
    if (ok) this.saveSyncState();
    return ok;
  }

  private async pullNow(): Promise<number> {
    if (!this.config.sync.enabled) return 0;

    const remote = await this.mirror.download();
    const known = new Set(this.catalog.entries().map((e) => e.id));
    const incoming: Entry[] = [];
    for (const entry of remote) {
      if (!known.has(entry.id) && !this.deletedIds.has(entry.id)) {
        incoming.push(await this.adoptMedia(entry));
      }
    }
    if (incoming.length === 0) return 0;

    const { entries, added } = mergeCatalogs(this.catalog.entries(), incoming);
    if (added.length > 0) {
      this.catalog.replaceAll(entries);
      if (this.config.export.textRenditions) {
        for (const entry of added) this.renditions.write(entry);
      }
      this.log.info(`Pulled ${added.length} entr${added.length === 1 ? 'y' : 'ies'} from the remote mirror`);
    }
    return added.length;
  }

  /** Copy a remote entry's media into the local store. Refs that fail to copy keep the remote path. */
  private async adoptMedia(entry: Entry): Promise<Entry> {
    const adopt = async (ref: MediaRef): Promise<MediaRef> => {
      try {
        return await this.mediaStore.adopt(ref.fileName, ref.location);
      } catch (err) {
        this.log.warn(`Could not copy remote media "${ref.fileName}"`, {
          error: err instanceof Error ? err.message : String(err),
        });
        return ref;
      }
    };

    const media: EntryMedia = {};
    if (entry.media.audio) media.audio = await adopt(entry.media.audio);
    if (entry.media.video) media.video = await adopt(entry.media.video);
    if (entry.media.photos) {
      const photos: MediaRef[] = [];
      for (const photo of entry.media.photos) photos.push(await adopt(photo));
      media.photos = photos;
    }
    return { ...entry, media };
  }

  private saveSyncState(): void {
    const lastSyncAt = this.mirror.snapshot().lastSyncAt;
    try {
      this.persistence.write(this.paths.syncStatePath, lastSyncAt ? { lastSyncAt } : {}, SyncStateSchema);
    } catch (err) {
      this.log.warn('Failed to record the last sync time', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Run after earlier queued work; the caller sees the result or the error. */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Run after earlier queued work in the background; failures are logged. */
  private schedule(task: () => Promise<unknown>): void {
    this.tail = this.tail.then(task).then(
      () => undefined,
      (err: unknown) => {
        this.log.error('Background sync failed', { error: err instanceof Error ? err.message : String(err) });
      },
    );
  }
}

function assertMediaAllowed(input: CreateEntryInput): void {
  const given: MediaField[] = [];
  if (input.audio !== undefined) given.push('audio');
  if (input.video !== undefined) given.push('video');
  if (input.photos && input.photos.length > 0) given.push('photos');

  const allowed = MEDIA_FIELDS_BY_KIND[input.kind];
  for (const field of given) {
    if (!allowed.includes(field)) {
      throw new InvalidEntryError(`${input.kind} entries cannot carry ${field} media`);
    }
  }
}
