import type { IMediaStore } from '@domain/ports/media-store.js';
import type { ITranscriber } from '@domain/ports/transcriber.js';
import type { Entry } from '@domain/types/entry.js';
import { logger } from '@shared/lib/logger.js';
import type { JournalService } from './journal-service.js';

export type TranscribeResult =
  | { ok: true; transcript: string; entry: Entry }
  | { ok: false; message: string };

/**
 * Transcribe an entry's audio and store the text on the entry.
 * Failures come back as a message; the entry is only touched on success.
 */
export async function transcribeEntry(
  journal: JournalService,
  transcriber: ITranscriber,
  mediaStore: IMediaStore,
  entryId: string,
): Promise<TranscribeResult> {
  const entry = journal.getEntry(entryId);
  if (!entry) {
    return { ok: false, message: `Entry not found: "${entryId}".` };
  }
  const audio = entry.media.audio;
  if (!audio) {
    return { ok: false, message: 'This entry has no audio to transcribe.' };
  }

  let bytes: Buffer;
  try {
    bytes = await mediaStore.read(audio);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }

  let transcript: string;
  try {
    transcript = await transcriber.transcribe(bytes, audio.fileName);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Transcription failed', { id: entryId, error: message });
    return { ok: false, message };
  }

  const updated = journal.updateEntry(entryId, { transcript });
  return { ok: true, transcript, entry: updated };
}
