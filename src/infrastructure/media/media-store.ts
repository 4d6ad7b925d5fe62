import { existsSync, readdirSync, rmSync } from 'node:fs';
import { copyFile, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative } from 'node:path';
import type { MediaRef } from '@domain/types/entry.js';
import type { IMediaStore, MediaKind, MediaSaveOptions, MediaSource } from '@domain/ports/media-store.js';
import { MEDIA_EXTENSIONS } from '@domain/rules/media-rules.js';
import { MediaIOError } from '@shared/lib/errors.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';
import { mediaFileName } from '@shared/lib/naming.js';

export interface FileMediaStoreOptions {
  /** Clock used for generated file names. */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Media store backed by a private directory on the local filesystem.
 *
 * Entries hold `{ fileName, location }`. The file name never changes; the
 * location is only a cache of where the file was last found, so a journal
 * restored under a different root still resolves through `resolve()`.
 */
export class FileMediaStore implements IMediaStore {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly directory: string,
    options: FileMediaStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? componentLogger('media-store');
  }

  /**
   * Copy a file (or write bytes) into the media directory under a generated
   * `<kind>_<epochSeconds>.<ext>` name. An existing file at that name is replaced.
   *
   * @throws MediaIOError when the copy or write fails
   */
  async save(kind: MediaKind, source: MediaSource, options?: MediaSaveOptions): Promise<MediaRef> {
    const fileName = mediaFileName(kind, MEDIA_EXTENSIONS[kind], this.now(), options?.index);
    const destination = this.resolve(fileName);

    try {
      await mkdir(this.directory, { recursive: true });
      await rm(destination, { force: true });
      if (typeof source === 'string') {
        await copyFile(source, destination);
      } else {
        await writeFile(destination, source);
      }
    } catch (err) {
      throw new MediaIOError(
        `Failed to save ${kind} media: ${err instanceof Error ? err.message : String(err)}`,
        destination,
        err,
      );
    }

    this.log.debug('Saved media file', { kind, fileName });
    return { fileName, location: destination };
  }

  /**
   * Bring a file that lives elsewhere (a downloaded asset) into the media
   * directory under its original name.
   *
   * @throws MediaIOError when the copy fails
   */
  async adopt(fileName: string, sourcePath: string): Promise<MediaRef> {
    const destination = this.resolve(fileName);
    if (existsSync(destination)) {
      return { fileName, location: destination };
    }

    try {
      await mkdir(this.directory, { recursive: true });
      await copyFile(sourcePath, destination);
    } catch (err) {
      throw new MediaIOError(
        `Failed to adopt media "${fileName}": ${err instanceof Error ? err.message : String(err)}`,
        destination,
        err,
      );
    }

    this.log.debug('Adopted media file', { fileName, from: sourcePath });
    return { fileName, location: destination };
  }

  resolve(ref: MediaRef | string): string {
    return join(this.directory, typeof ref === 'string' ? ref : ref.fileName);
  }

  exists(ref: MediaRef): boolean {
    return this.locate(ref) !== null;
  }

  locate(ref: MediaRef): string | null {
    if (existsSync(ref.location)) return ref.location;
    const expected = this.resolve(ref);
    return existsSync(expected) ? expected : null;
  }

  scan(fileName: string): string | null {
    if (!existsSync(this.directory)) return null;
    try {
      return findFile(this.directory, fileName);
    } catch (err) {
      this.log.warn(`Failed to scan media directory for "${fileName}"`, {
        directory: this.directory,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  /**
   * @throws MediaIOError when the file cannot be located or read
   */
  async read(ref: MediaRef): Promise<Buffer> {
    const path = this.locate(ref);
    if (!path) {
      throw new MediaIOError(`Media file not found: ${ref.fileName}`, this.resolve(ref));
    }
    try {
      return await readFile(path);
    } catch (err) {
      throw new MediaIOError(`Failed to read media "${ref.fileName}"`, path, err);
    }
  }

  /**
   * Remove the file behind a reference. Only paths inside the media directory
   * are touched. Failures are logged and swallowed.
   */
  delete(ref: MediaRef): void {
    const candidates = new Set([ref.location, this.resolve(ref)]);
    for (const path of candidates) {
      if (!this.owns(path)) continue;
      try {
        rmSync(path, { force: true });
      } catch (err) {
        this.log.warn(`Failed to delete media file "${ref.fileName}"`, {
          path,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private owns(path: string): boolean {
    const rel = relative(this.directory, path);
    return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
  }
}

function findFile(dir: string, fileName: string): string | null {
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && entry.name === fileName) {
      return join(dir, entry.name);
    }
  }
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const found = findFile(join(dir, entry.name), fileName);
    if (found) return found;
  }
  return null;
}
