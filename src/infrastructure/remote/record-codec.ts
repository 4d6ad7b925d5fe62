import { EntryKind, EntrySchema, type Entry, type EntryMedia, type MediaRef } from '@domain/types/entry.js';
import type { RemoteAsset, RemoteRecord, RemoteRecordFields } from '@domain/types/remote-record.js';

export interface RecordAssets {
  audio?: RemoteAsset;
  video?: RemoteAsset;
  photos?: RemoteAsset[];
}

/**
 * Remote field bag for an entry. Optional entry fields that are unset are
 * left out rather than written empty.
 */
export function entryToFields(entry: Entry, assets: RecordAssets): RemoteRecordFields {
  const fields: RemoteRecordFields = {
    entryID: entry.id,
    title: entry.title,
    content: entry.body,
    type: entry.kind,
    date: entry.createdAt,
  };
  if (entry.mood !== undefined) fields.mood = entry.mood;
  if (entry.transcript !== undefined) fields.transcription = entry.transcript;
  if (assets.audio) fields.audioAsset = assets.audio;
  if (assets.video) fields.videoAsset = assets.video;
  if (assets.photos && assets.photos.length > 0) fields.photoAssets = assets.photos;
  return fields;
}

function assetRef(asset: RemoteAsset): MediaRef {
  return { fileName: asset.fileName, location: asset.path };
}

/**
 * Decode a remote record into an entry, or null when a required field
 * (entryID, title, content, type, date) is missing or the result fails the
 * entry schema. Asset fields the entry's kind does not allow are ignored.
 * Media refs point at the remote asset paths until adopted locally.
 */
export function recordToEntry(record: RemoteRecord): Entry | null {
  const { entryID, title, content, type, date } = record.fields;
  if (entryID === undefined || title === undefined || content === undefined || date === undefined) {
    return null;
  }
  const kind = EntryKind.safeParse(type);
  if (!kind.success) return null;

  const media: EntryMedia = {};
  if (kind.data === 'audio' && record.fields.audioAsset) media.audio = assetRef(record.fields.audioAsset);
  if (kind.data === 'video' && record.fields.videoAsset) media.video = assetRef(record.fields.videoAsset);
  if (kind.data === 'photo' && record.fields.photoAssets) media.photos = record.fields.photoAssets.map(assetRef);

  const candidate: Record<string, unknown> = {
    id: entryID,
    createdAt: date,
    title,
    kind: kind.data,
    body: content,
    media,
  };
  if (record.fields.mood) candidate['mood'] = record.fields.mood;
  if (record.fields.transcription !== undefined) candidate['transcript'] = record.fields.transcription;

  const parsed = EntrySchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}
