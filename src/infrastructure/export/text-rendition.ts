import { existsSync, readdirSync, rmSync, writeFileSync, renameSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Entry } from '@domain/types/entry.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';

const DISPLAY_FORMAT = new Intl.DateTimeFormat('en-US', {
  dateStyle: 'full',
  timeStyle: 'short',
  timeZone: 'UTC',
});

const KIND_LABELS: Record<Entry['kind'], string> = {
  text: 'Text',
  audio: 'Audio',
  video: 'Video',
  photo: 'Photo',
};

/**
 * Render an entry as the plain-text document kept in exports/.
 */
export function renderEntryText(entry: Entry, savedAt: Date): string {
  const lines: string[] = [
    entry.title,
    '',
    `Date: ${DISPLAY_FORMAT.format(new Date(entry.createdAt))}`,
    `Type: ${KIND_LABELS[entry.kind]}`,
    `Entry ID: ${entry.id}`,
    '',
    entry.body,
  ];

  if (entry.mood) {
    lines.push('', `Mood: ${entry.mood}`);
  }
  if (entry.transcript) {
    lines.push('', 'Transcription:', entry.transcript);
  }
  if (entry.media.audio) {
    lines.push('', `Audio File: ${entry.media.audio.fileName}`);
  }
  if (entry.media.video) {
    lines.push('', `Video File: ${entry.media.video.fileName}`);
  }
  if (entry.media.photos && entry.media.photos.length > 0) {
    lines.push('', 'Photo Files:');
    for (const photo of entry.media.photos) {
      lines.push(`- ${photo.fileName}`);
    }
  }

  lines.push('', '---', 'Saved from Vellum', savedAt.toISOString());
  return lines.join('\n') + '\n';
}

export function renditionFileName(entryId: string): string {
  return `entry_${entryId}.txt`;
}

export interface TextRenditionStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Keeps one .txt rendition per entry. Writes and deletes are best effort:
 * a failure is logged and never reaches the caller.
 */
export class TextRenditionStore {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly directory: string,
    options: TextRenditionStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? componentLogger('text-rendition');
  }

  path(entryId: string): string {
    return join(this.directory, renditionFileName(entryId));
  }

  write(entry: Entry): boolean {
    const target = this.path(entry.id);
    const temp = `${target}.tmp`;
    try {
      mkdirSync(this.directory, { recursive: true });
      writeFileSync(temp, renderEntryText(entry, this.now()), 'utf-8');
      renameSync(temp, target);
      return true;
    } catch (err) {
      rmSync(temp, { force: true });
      this.log.warn(`Failed to write text rendition for entry ${entry.id}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  delete(entryId: string): void {
    try {
      rmSync(this.path(entryId), { force: true });
    } catch (err) {
      this.log.warn(`Failed to delete text rendition for entry ${entryId}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Rendition file names, sorted. */
  list(): string[] {
    if (!existsSync(this.directory)) return [];
    try {
      return readdirSync(this.directory)
        .filter((f) => f.startsWith('entry_') && f.endsWith('.txt'))
        .sort();
    } catch (err) {
      this.log.warn('Failed to list text renditions', {
        directory: this.directory,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }
}
