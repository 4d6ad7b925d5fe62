import type { Entry } from '@domain/types/entry.js';
import type { RemoteRecord, RemoteRecordFields } from '@domain/types/remote-record.js';
import { entryToFields, recordToEntry } from './record-codec.js';

const ENTRY_ID = '2b7e1516-28ae-4d2a-8f09-cf4f3c762e71';

function makeRecord(fields: RemoteRecordFields): RemoteRecord {
  return {
    recordName: 'rec-1',
    recordType: 'DiaryEntry',
    createdAt: '2026-10-19T09:42:05.000Z',
    fields,
  };
}

const baseFields: RemoteRecordFields = {
  entryID: ENTRY_ID,
  title: 'Harbour',
  content: 'Boats at dusk.',
  type: 'photo',
  date: '2026-10-19T09:42:00.000Z',
};

describe('entryToFields', () => {
  it('maps entry fields onto the remote field names', () => {
    const entry: Entry = {
      id: ENTRY_ID,
      createdAt: '2026-10-19T09:42:00.000Z',
      title: 'Voice memo',
      kind: 'audio',
      body: 'notes',
      media: { audio: { fileName: 'audio_1.m4a', location: '/m/audio_1.m4a' } },
      mood: '🙂',
      transcript: 'hi',
    };

    expect(entryToFields(entry, { audio: { fileName: 'audio_1.m4a', path: '/remote/assets/audio_1.m4a' } })).toEqual({
      entryID: ENTRY_ID,
      title: 'Voice memo',
      content: 'notes',
      type: 'audio',
      date: '2026-10-19T09:42:00.000Z',
      mood: '🙂',
      transcription: 'hi',
      audioAsset: { fileName: 'audio_1.m4a', path: '/remote/assets/audio_1.m4a' },
    });
  });

  it('leaves unset optional fields and empty photo lists out', () => {
    const entry: Entry = {
      id: ENTRY_ID,
      createdAt: '2026-10-19T09:42:00.000Z',
      title: 'Empty album',
      kind: 'photo',
      body: '',
      media: { photos: [] },
    };

    expect(Object.keys(entryToFields(entry, { photos: [] })).sort()).toEqual(['content', 'date', 'entryID', 'title', 'type']);
  });
});

describe('recordToEntry', () => {
  it('decodes a complete record, pointing media at the remote assets', () => {
    const entry = recordToEntry(
      makeRecord({
        ...baseFields,
        mood: '😊',
        transcription: 'words',
        photoAssets: [{ fileName: 'photo_1.jpg', path: '/remote/assets/photo_1.jpg' }],
      }),
    );

    expect(entry).toEqual({
      id: ENTRY_ID,
      createdAt: '2026-10-19T09:42:00.000Z',
      title: 'Harbour',
      kind: 'photo',
      body: 'Boats at dusk.',
      media: { photos: [{ fileName: 'photo_1.jpg', location: '/remote/assets/photo_1.jpg' }] },
      mood: '😊',
      transcript: 'words',
    });
  });

  it.each(['entryID', 'title', 'content', 'type', 'date'] as const)('drops a record without %s', (field) => {
    const fields = { ...baseFields };
    delete fields[field];
    expect(recordToEntry(makeRecord(fields))).toBeNull();
  });

  it('drops a record with an unknown type or a malformed id', () => {
    expect(recordToEntry(makeRecord({ ...baseFields, type: '✍️ Text' }))).toBeNull();
    expect(recordToEntry(makeRecord({ ...baseFields, entryID: 'not-a-uuid' }))).toBeNull();
  });

  it('ignores assets the kind does not allow and an empty mood', () => {
    const entry = recordToEntry(
      makeRecord({
        ...baseFields,
        type: 'text',
        mood: '',
        audioAsset: { fileName: 'audio_1.m4a', path: '/remote/assets/audio_1.m4a' },
      }),
    );

    expect(entry?.media).toEqual({});
    expect(entry && 'mood' in entry).toBe(false);
  });
});
