/**
 * Naming helpers for entry titles and media file names.
 */

const TITLE_FORMAT = new Intl.DateTimeFormat('en-US', {
  dateStyle: 'medium',
  timeStyle: 'short',
  timeZone: 'UTC',
});

/**
 * Default title for a new entry: `Diary - Oct 19, 2026, 9:42 AM`.
 * Formatted in UTC so the same instant always yields the same title.
 */
export function defaultEntryTitle(createdAt: Date): string {
  return `Diary - ${TITLE_FORMAT.format(createdAt)}`;
}

/**
 * Seconds since the epoch with millisecond precision, e.g. `1760866920.5`.
 * Trailing zeros are dropped the way Number#toString drops them.
 */
export function epochSeconds(at: Date): string {
  return String(at.getTime() / 1000);
}

/**
 * Media file name in the `<kind>_<epochSeconds>.<ext>` form.
 * When `index` > 0, appends `-{index}` before the extension so several photos
 * saved in the same millisecond do not collide.
 */
export function mediaFileName(kind: string, ext: string, at: Date, index?: number): string {
  const suffix = index && index > 0 ? `-${index}` : '';
  return `${kind}_${epochSeconds(at)}${suffix}.${ext}`;
}
