import type { IPersistence } from '@domain/ports/persistence.js';
import type { IMediaStore } from '@domain/ports/media-store.js';
import {
  CatalogSchema,
  EntrySchema,
  mediaRefsOf,
  type Entry,
  type EntryPatch,
} from '@domain/types/entry.js';
import { CATALOG_VERSION } from '@shared/constants/paths.js';
import {
  CatalogSerializationError,
  DuplicateEntryError,
  EntryNotFoundError,
  ValidationError,
} from '@shared/lib/errors.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';
import { JsonStore } from '@infra/persistence/json-store.js';

export type CatalogListener = (entries: readonly Entry[], version: number) => void;

export interface LocalCatalogOptions {
  persistence?: IPersistence;
  now?: () => Date;
  logger?: Logger;
}

/**
 * The device's ordered list of entries, newest first by insertion.
 *
 * Every mutation is synchronous and ends with a full persist of the list as
 * one JSON document, so the stored catalog never reflects half a mutation.
 * A failed persist is logged and skipped; the in-memory list stays the
 * source of truth until the next successful write.
 */
export class LocalCatalog {
  private items: Entry[] = [];
  private changeVersion = 0;
  private readonly listeners = new Set<CatalogListener>();
  private readonly persistence: IPersistence;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly catalogPath: string,
    private readonly mediaStore: IMediaStore,
    options: LocalCatalogOptions = {},
  ) {
    this.persistence = options.persistence ?? JsonStore;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? componentLogger('catalog');
  }

  /** Incremented on every load and mutation. */
  get version(): number {
    return this.changeVersion;
  }

  /**
   * Read the stored catalog. A missing or unreadable document yields an empty
   * catalog; an unreadable one is first moved aside to `<path>.corrupt`.
   */
  load(): Entry[] {
    this.items = this.readStored();
    this.changed();
    return this.entries();
  }

  entries(): Entry[] {
    return [...this.items];
  }

  get(id: string): Entry | undefined {
    return this.items.find((e) => e.id === id);
  }

  /**
   * Insert at the head and persist.
   *
   * @throws ValidationError if the entry fails the schema
   * @throws DuplicateEntryError if the id is already present
   */
  append(entry: Entry): Entry {
    const parsed = parseEntry(entry);
    if (this.get(parsed.id)) {
      throw new DuplicateEntryError(parsed.id);
    }
    this.items = [parsed, ...this.items];
    this.commit();
    return parsed;
  }

  /**
   * Change the mutable fields of an entry and persist.
   * `null` for mood or transcript removes the field.
   *
   * @throws EntryNotFoundError if no entry has this id
   */
  update(id: string, patch: EntryPatch): Entry {
    const index = this.items.findIndex((e) => e.id === id);
    const current = this.items[index];
    if (!current) {
      throw new EntryNotFoundError(id);
    }

    const next: Entry = { ...current };
    if (patch.title !== undefined) next.title = patch.title;
    if (patch.body !== undefined) next.body = patch.body;
    if (patch.mood === null) delete next.mood;
    else if (patch.mood !== undefined) next.mood = patch.mood;
    if (patch.transcript === null) delete next.transcript;
    else if (patch.transcript !== undefined) next.transcript = patch.transcript;

    const parsed = parseEntry(next);
    this.items = this.items.map((e, i) => (i === index ? parsed : e));
    this.commit();
    return parsed;
  }

  /**
   * Remove an entry, delete its media files, and persist.
   *
   * @throws EntryNotFoundError if no entry has this id
   */
  remove(id: string): Entry {
    const removed = this.get(id);
    if (!removed) {
      throw new EntryNotFoundError(id);
    }

    for (const ref of mediaRefsOf(removed)) {
      this.mediaStore.delete(ref);
    }

    this.items = this.items.filter((e) => e.id !== id);
    this.commit();
    return removed;
  }

  /** Swap in a whole new list (recovery, merge) and persist once. */
  replaceAll(entries: readonly Entry[]): void {
    this.items = [...entries];
    this.commit();
  }

  /**
   * Write the full list. Returns false (and logs) when the write fails.
   */
  persist(): boolean {
    try {
      this.persistence.write(
        this.catalogPath,
        { version: CATALOG_VERSION, entries: this.items, updatedAt: this.now().toISOString() },
        CatalogSchema,
      );
      return true;
    } catch (err) {
      this.log.error('Failed to persist catalog', {
        path: this.catalogPath,
        entries: this.items.length,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  onChange(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(): void {
    this.persist();
    this.changed();
  }

  private changed(): void {
    this.changeVersion += 1;
    const snapshot = this.entries();
    for (const listener of this.listeners) {
      listener(snapshot, this.changeVersion);
    }
  }

  private readStored(): Entry[] {
    if (!this.persistence.exists(this.catalogPath)) {
      return [];
    }
    try {
      return this.persistence.read(this.catalogPath, CatalogSchema).entries;
    } catch (err) {
      const error = new CatalogSerializationError(`Unreadable catalog at ${this.catalogPath}`, err);
      this.log.warn(`${error.message}; starting with an empty catalog`, {
        error: err instanceof Error ? err.message : String(err),
      });
      this.quarantine();
      return [];
    }
  }

  private quarantine(): void {
    try {
      this.persistence.rename(this.catalogPath, `${this.catalogPath}.corrupt`);
    } catch (err) {
      this.log.warn('Could not move the unreadable catalog aside', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function parseEntry(entry: Entry): Entry {
  const result = EntrySchema.safeParse(entry);
  if (!result.success) {
    throw new ValidationError(
      `Invalid entry: ${result.error.issues.map((i) => i.message).join('; ')}`,
      result.error.issues,
    );
  }
  return result.data;
}
