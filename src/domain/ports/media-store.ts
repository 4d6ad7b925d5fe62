import type { EntryKind, MediaRef } from '@domain/types/entry.js';

export type MediaKind = Exclude<EntryKind, 'text'>;

/** A file on disk to copy in, or in-memory bytes to write (an encoded photo). */
export type MediaSource = string | Buffer;

export interface MediaSaveOptions {
  /** Disambiguates several files of one kind saved in the same millisecond. */
  index?: number;
}

/**
 * Port interface for the private media directory.
 * Entries keep only the MediaRef; every path is derived from it at use time.
 */
export interface IMediaStore {
  /** Root of the private media directory. */
  readonly directory: string;
  save(kind: MediaKind, source: MediaSource, options?: MediaSaveOptions): Promise<MediaRef>;
  /** Copy an existing file in under a fixed name. Returns the existing ref if one already resolves. */
  adopt(fileName: string, sourcePath: string): Promise<MediaRef>;
  /** Media directory joined with the file name. Does not check existence. */
  resolve(ref: MediaRef | string): string;
  exists(ref: MediaRef): boolean;
  /** First existing path among the ref's last location and its resolved path. */
  locate(ref: MediaRef): string | null;
  /** Walk the media directory for a file with exactly this name. */
  scan(fileName: string): string | null;
  read(ref: MediaRef): Promise<Buffer>;
  /** Best effort. Never throws. */
  delete(ref: MediaRef): void;
}
