import type { IMediaStore } from '@domain/ports/media-store.js';
import type { Entry, EntryMedia, MediaRef } from '@domain/types/entry.js';
import type { MediaField } from '@domain/rules/media-rules.js';

export interface MediaRepair {
  entryId: string;
  field: MediaField;
  fileName: string;
  from: string;
  to: string;
  /** `resolved`: found at the expected path; `scan`: found by walking the media directory. */
  via: 'resolved' | 'scan';
}

export interface UnresolvedMedia {
  entryId: string;
  field: MediaField;
  fileName: string;
}

export interface RecoveryReport {
  entries: Entry[];
  repaired: MediaRepair[];
  unresolved: UnresolvedMedia[];
}

type RefOutcome =
  | { kind: 'ok' }
  | { kind: 'repaired'; ref: MediaRef; via: MediaRepair['via'] }
  | { kind: 'unresolved' };

/**
 * Repair media references whose stored location no longer holds the file,
 * as happens when a journal is restored under a new root.
 *
 * Per reference: keep it if its location exists; else adopt the expected
 * path in the current media directory; else adopt the first exact-name match
 * found by scanning the media directory; else leave it as is and report it.
 * Each photo is handled on its own. Entries without repairs are returned as
 * the same objects, so a second run over the result changes nothing.
 */
export function recoverMediaPaths(entries: readonly Entry[], mediaStore: IMediaStore): RecoveryReport {
  const repaired: MediaRepair[] = [];
  const unresolved: UnresolvedMedia[] = [];

  const check = (entryId: string, field: MediaField, ref: MediaRef): MediaRef => {
    const outcome = recoverRef(ref, mediaStore);
    if (outcome.kind === 'repaired') {
      repaired.push({ entryId, field, fileName: ref.fileName, from: ref.location, to: outcome.ref.location, via: outcome.via });
      return outcome.ref;
    }
    if (outcome.kind === 'unresolved') {
      unresolved.push({ entryId, field, fileName: ref.fileName });
    }
    return ref;
  };

  const result = entries.map((entry) => {
    const before = repaired.length;
    const media: EntryMedia = {};

    if (entry.media.audio) media.audio = check(entry.id, 'audio', entry.media.audio);
    if (entry.media.video) media.video = check(entry.id, 'video', entry.media.video);
    if (entry.media.photos) media.photos = entry.media.photos.map((photo) => check(entry.id, 'photos', photo));

    return repaired.length === before ? entry : { ...entry, media };
  });

  return { entries: result, repaired, unresolved };
}

function recoverRef(ref: MediaRef, mediaStore: IMediaStore): RefOutcome {
  const located = mediaStore.locate(ref);
  if (located === ref.location) {
    return { kind: 'ok' };
  }
  if (located !== null) {
    return { kind: 'repaired', ref: { fileName: ref.fileName, location: located }, via: 'resolved' };
  }

  const scanned = mediaStore.scan(ref.fileName);
  if (scanned !== null) {
    return { kind: 'repaired', ref: { fileName: ref.fileName, location: scanned }, via: 'scan' };
  }
  return { kind: 'unresolved' };
}
