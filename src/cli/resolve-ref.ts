import type { Entry } from '@domain/types/entry.js';
import { sortByCreatedAtDesc } from '@domain/services/catalog-merger.js';
import { AmbiguousRefError, EntryNotFoundError } from '@shared/lib/errors.js';

/**
 * Resolve a human-friendly entry reference (full id, "latest", or an id
 * prefix of at least 4 characters) to an entry.
 *
 * @throws {EntryNotFoundError} If no entry matches.
 * @throws {AmbiguousRefError} If a prefix matches several entries.
 */
export function resolveEntryRef(input: string, entries: readonly Entry[]): Entry {
  const exact = entries.find((entry) => entry.id === input);
  if (exact) return exact;

  if (input === 'latest') {
    const [newest] = sortByCreatedAtDesc(entries);
    if (newest) return newest;
    throw new EntryNotFoundError(input);
  }

  if (input.length >= 4 && /^[0-9a-f-]+$/i.test(input)) {
    const lower = input.toLowerCase();
    const matches = entries.filter((entry) => entry.id.toLowerCase().startsWith(lower));
    const [only] = matches;
    if (matches.length === 1 && only) return only;
    if (matches.length > 1) {
      throw new AmbiguousRefError(input, matches.length);
    }
  }

  throw new EntryNotFoundError(input);
}
