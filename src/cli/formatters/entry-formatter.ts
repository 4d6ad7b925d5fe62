import type { Entry } from '@domain/types/entry.js';
import type { IMediaStore } from '@domain/ports/media-store.js';
import { mediaRefsOf } from '@domain/types/entry.js';

/**
 * Format entries as an aligned text table, newest first as given.
 */
export function formatEntryTable(entries: readonly Entry[]): string {
  if (entries.length === 0) {
    return 'No entries yet. Add one with "vellum entry add text".';
  }

  const headerCols = ['ID', 'Date', 'Kind', 'Title'];
  const header = padColumns(headerCols);
  const separator = '-'.repeat(header.length);
  const rows = entries.map((e) =>
    padColumns([e.id.slice(0, 8), e.createdAt.slice(0, 16).replace('T', ' '), e.kind, truncate(e.title, 48)]),
  );

  return [header, separator, ...rows].join('\n');
}

/**
 * Format one entry with its body and media. Media that no longer resolve are
 * marked as missing when a media store is given.
 */
export function formatEntryDetail(entry: Entry, mediaStore?: IMediaStore): string {
  const lines: string[] = [];

  lines.push(entry.title);
  lines.push(`ID:      ${entry.id}`);
  lines.push(`Created: ${entry.createdAt}`);
  lines.push(`Kind:    ${entry.kind}`);
  if (entry.mood) {
    lines.push(`Mood:    ${entry.mood}`);
  }
  lines.push('');
  lines.push(entry.body || '(no text)');

  if (entry.transcript) {
    lines.push('');
    lines.push('Transcript:');
    lines.push(entry.transcript);
  }

  const refs = mediaRefsOf(entry);
  if (refs.length > 0) {
    lines.push('');
    lines.push('Media:');
    for (const ref of refs) {
      const missing = mediaStore && !mediaStore.exists(ref) ? '  (missing)' : '';
      lines.push(`  ${ref.fileName}${missing}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format entries as JSON.
 */
export function formatEntriesJson(entries: readonly Entry[]): string {
  return JSON.stringify(entries, null, 2);
}

// ---- Helpers ----

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max - 3) + '...' : value;
}

function padColumns(values: string[]): string {
  const widths = [10, 18, 7];
  return values.map((v, i) => (i < widths.length ? v.padEnd(widths[i] ?? 0) : v)).join('  ');
}
