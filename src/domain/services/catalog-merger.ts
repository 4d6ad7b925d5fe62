import type { Entry } from '@domain/types/entry.js';

/**
 * Order entries newest first by `createdAt`. Ties keep their input order.
 * Returns a new array.
 */
export function sortByCreatedAtDesc<T extends Pick<Entry, 'createdAt'>>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
}

export interface MergeResult {
  entries: Entry[];
  /** Remote entries that were not present locally. */
  added: Entry[];
}

/**
 * Union of a local and a remote catalog keyed by entry id.
 *
 * Local entries are kept untouched; a remote entry is added only when its id
 * is not present locally. Entries present on both sides are not reconciled
 * field by field: the local copy wins. The result is sorted newest first.
 */
export function mergeCatalogs(local: readonly Entry[], remote: readonly Entry[]): MergeResult {
  const seen = new Set(local.map((e) => e.id));
  const added: Entry[] = [];

  for (const entry of remote) {
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    added.push(entry);
  }

  return { entries: sortByCreatedAtDesc([...local, ...added]), added };
}
