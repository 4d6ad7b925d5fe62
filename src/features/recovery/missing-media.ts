import type { IMediaStore } from '@domain/ports/media-store.js';
import type { Entry } from '@domain/types/entry.js';

export interface MissingMediaStats {
  audio: number;
  video: number;
  photos: number;
}

/** Count media references that currently resolve to no file. */
export function missingMediaStats(entries: readonly Entry[], mediaStore: IMediaStore): MissingMediaStats {
  const stats: MissingMediaStats = { audio: 0, video: 0, photos: 0 };

  for (const entry of entries) {
    if (entry.media.audio && !mediaStore.exists(entry.media.audio)) stats.audio += 1;
    if (entry.media.video && !mediaStore.exists(entry.media.video)) stats.video += 1;
    for (const photo of entry.media.photos ?? []) {
      if (!mediaStore.exists(photo)) stats.photos += 1;
    }
  }

  return stats;
}
