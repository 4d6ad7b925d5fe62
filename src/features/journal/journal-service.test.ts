import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { VellumConfigSchema } from '@domain/types/config.js';
import { CatalogSchema, type Entry } from '@domain/types/entry.js';
import type { RemoteRecord } from '@domain/types/remote-record.js';
import type { SyncStatus } from '@domain/types/sync.js';
import { LocalCatalog } from '@infra/catalog/local-catalog.js';
import { TextRenditionStore } from '@infra/export/text-rendition.js';
import { FileMediaStore } from '@infra/media/media-store.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { MemoryRecordDatabase } from '@infra/remote/memory-record-database.js';
import { RecordMirror } from '@infra/remote/record-mirror.js';
import { InvalidEntryError } from '@shared/lib/errors.js';
import { JournalService } from './journal-service.js';

const NOW = new Date('2026-10-19T10:00:00.000Z');

function uuid(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

let tempDir: string;
let vellumDir: string;
let mediaDir: string;
let database: MemoryRecordDatabase;
let mirror: RecordMirror;
let renditions: TextRenditionStore;
let idCounter: number;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'vellum-journal-test-'));
  vellumDir = join(tempDir, '.vellum');
  mediaDir = join(vellumDir, 'media');
  mkdirSync(vellumDir);
  database = new MemoryRecordDatabase();
  idCounter = 0;
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function createService(config: unknown = {}): JournalService {
  const mediaStore = new FileMediaStore(mediaDir, { now: () => NOW });
  mirror = new RecordMirror(database, mediaStore, { now: () => NOW, newRecordName: () => `rec-${idCounter}` });
  renditions = new TextRenditionStore(join(vellumDir, 'exports'), { now: () => NOW });
  return new JournalService({
    catalog: new LocalCatalog(join(vellumDir, 'catalog.json'), mediaStore, { now: () => NOW }),
    mediaStore,
    mirror,
    renditions,
    config: VellumConfigSchema.parse(config),
    paths: {
      configPath: join(vellumDir, 'config.json'),
      syncStatePath: join(vellumDir, 'sync-state.json'),
    },
    now: () => NOW,
    newId: () => uuid(++idCounter),
  });
}

function storedEntries(): Entry[] {
  return JsonStore.read(join(vellumDir, 'catalog.json'), CatalogSchema).entries;
}

function sourceFile(name: string, content = name): string {
  const path = join(tempDir, name);
  writeFileSync(path, content);
  return path;
}

const SYNC_ON = { sync: { enabled: true, autoSync: false } };

describe('JournalService.createEntry', () => {
  it('saves a text entry with a default title, persists it and writes its rendition', async () => {
    const service = createService();
    service.open();

    const entry = await service.createEntry({ kind: 'text', body: 'Rained all day.' });

    expect(entry.id).toBe(uuid(1));
    expect(entry.createdAt).toBe('2026-10-19T10:00:00.000Z');
    expect(entry.title).toMatch(/^Diary - Oct 19, 2026, 10:00\s?AM$/u);
    expect(storedEntries().map((e) => e.id)).toEqual([uuid(1)]);
    expect(renditions.list()).toEqual([`entry_${uuid(1)}.txt`]);
  });

  it('keeps an explicit title and optional fields', async () => {
    const service = createService();
    service.open();

    const entry = await service.createEntry({ kind: 'text', title: '  Morning  ', mood: '😀', transcript: '' });

    expect(entry.title).toBe('Morning');
    expect(entry.mood).toBe('😀');
    expect(entry.transcript).toBe('');
  });

  it('copies audio into the media directory before saving', async () => {
    const service = createService();
    service.open();

    const entry = await service.createEntry({ kind: 'audio', audio: sourceFile('memo.m4a', 'pcm') });

    expect(entry.media.audio).toEqual({
      fileName: 'audio_1792404000.m4a',
      location: join(mediaDir, 'audio_1792404000.m4a'),
    });
    expect(readFileSync(join(mediaDir, 'audio_1792404000.m4a'), 'utf-8')).toBe('pcm');
  });

  it('gives each photo its own indexed name', async () => {
    const service = createService();
    service.open();

    const entry = await service.createEntry({
      kind: 'photo',
      photos: [sourceFile('a.jpg'), Buffer.from('jpeg-bytes')],
    });

    expect(entry.media.photos?.map((p) => p.fileName)).toEqual(['photo_1792404000.jpg', 'photo_1792404000-1.jpg']);
    expect(readFileSync(join(mediaDir, 'photo_1792404000-1.jpg'), 'utf-8')).toBe('jpeg-bytes');
  });

  it('rejects media the kind does not allow and saves nothing', async () => {
    const service = createService();
    service.open();

    await expect(service.createEntry({ kind: 'text', audio: sourceFile('memo.m4a') })).rejects.toThrow(
      InvalidEntryError,
    );
    expect(service.entries()).toEqual([]);
    expect(existsSync(mediaDir)).toBe(false);
  });

  it('saves the entry without media that failed to copy', async () => {
    const service = createService();
    service.open();

    const entry = await service.createEntry({ kind: 'audio', audio: join(tempDir, 'missing.m4a') });

    expect(entry.media).toEqual({});
    expect(storedEntries()).toHaveLength(1);
  });

  it('skips the rendition when text renditions are turned off', async () => {
    const service = createService({ export: { textRenditions: false } });
    service.open();

    await service.createEntry({ kind: 'text' });

    expect(renditions.list()).toEqual([]);
  });
});

describe('JournalService.updateEntry / deleteEntry', () => {
  it('rewrites the rendition after an update', async () => {
    const service = createService();
    service.open();
    const entry = await service.createEntry({ kind: 'text', title: 'Draft' });

    service.updateEntry(entry.id, { title: 'Final', mood: '🙂' });

    const text = readFileSync(renditions.path(entry.id), 'utf-8');
    expect(text.split('\n')[0]).toBe('Final');
    expect(text).toContain('\nMood: 🙂\n');
  });

  it('removes the entry, its media and its rendition', async () => {
    const service = createService();
    service.open();
    const entry = await service.createEntry({ kind: 'audio', audio: sourceFile('memo.m4a') });

    const removed = service.deleteEntry(entry.id);

    expect(removed.id).toBe(entry.id);
    expect(storedEntries()).toEqual([]);
    expect(existsSync(join(mediaDir, 'audio_1792404000.m4a'))).toBe(false);
    expect(renditions.list()).toEqual([]);
  });
});

describe('JournalService delete during a launch sync', () => {
  it('keeps an entry deleted right after open from coming back through the queued pull', async () => {
    const first = createService({ sync: { enabled: true } });
    first.open();
    const entry = await first.createEntry({ kind: 'audio', audio: sourceFile('memo.m4a') });
    await first.whenIdle();
    expect(database.all().map((r) => r.fields.entryID)).toEqual([entry.id]);

    const second = createService({ sync: { enabled: true } });
    second.open();
    second.deleteEntry(entry.id);
    await second.whenIdle();

    expect(second.getEntry(entry.id)).toBeUndefined();
    expect(storedEntries()).toEqual([]);
    expect(existsSync(join(mediaDir, 'audio_1792404000.m4a'))).toBe(false);
  });
});

describe('JournalService.open', () => {
  it('repairs media paths from a previous root and persists the repair', () => {
    mkdirSync(mediaDir, { recursive: true });
    writeFileSync(join(mediaDir, 'audio_1.m4a'), 'pcm');
    JsonStore.write(
      join(vellumDir, 'catalog.json'),
      {
        version: 1,
        updatedAt: '2026-10-01T00:00:00.000Z',
        entries: [
          {
            id: uuid(9),
            createdAt: '2026-10-01T00:00:00.000Z',
            title: 'Old',
            kind: 'audio',
            body: '',
            media: { audio: { fileName: 'audio_1.m4a', location: '/old-root/.vellum/media/audio_1.m4a' } },
          },
        ],
      },
      CatalogSchema,
    );
    const service = createService();

    const report = service.open();

    expect(report.repaired).toEqual([
      {
        entryId: uuid(9),
        field: 'audio',
        fileName: 'audio_1.m4a',
        from: '/old-root/.vellum/media/audio_1.m4a',
        to: join(mediaDir, 'audio_1.m4a'),
        via: 'resolved',
      },
    ]);
    expect(storedEntries()[0]?.media.audio?.location).toBe(join(mediaDir, 'audio_1.m4a'));
    expect(service.missingMedia()).toEqual({ audio: 0, video: 0, photos: 0 });
  });

  it('pulls then pushes in the background when auto-sync is on', async () => {
    const remoteId = uuid(50);
    database.seed([
      {
        recordName: 'seed',
        recordType: 'DiaryEntry',
        createdAt: '2026-10-18T00:00:00.000Z',
        fields: { entryID: remoteId, title: 'From elsewhere', content: '', type: 'text', date: '2026-10-18T00:00:00.000Z' },
      },
    ]);
    const service = createService({ sync: { enabled: true } });

    service.open();
    await service.whenIdle();

    expect(service.entries().map((e) => e.id)).toEqual([remoteId]);
    expect(database.all().map((r) => r.recordName)).toEqual(['seed']);
    expect(database.modifyCalls).toHaveLength(1);
  });
});

describe('JournalService.sync', () => {
  it('does nothing while sync is disabled', async () => {
    const service = createService();
    service.open();
    await service.createEntry({ kind: 'text' });

    expect(await service.sync()).toBe(false);
    expect(database.modifyCalls).toEqual([]);
  });

  it('uploads every entry and records the sync time', async () => {
    const service = createService(SYNC_ON);
    service.open();
    await service.createEntry({ kind: 'text', title: 'One' });

    expect(await service.sync()).toBe(true);

    expect(database.all().map((r) => r.fields.title)).toEqual(['One']);
    expect(JSON.parse(readFileSync(join(vellumDir, 'sync-state.json'), 'utf-8'))).toEqual({
      lastSyncAt: '2026-10-19T10:00:00.000Z',
    });
    expect(service.status()).toEqual({
      entries: 1,
      syncEnabled: true,
      mirrorAvailable: true,
      syncStatus: 'synced',
      lastSyncAt: '2026-10-19T10:00:00.000Z',
    });
  });

  it('runs overlapping sync calls one after the other', async () => {
    const service = createService(SYNC_ON);
    service.open();
    await service.createEntry({ kind: 'text' });
    const statuses: SyncStatus[] = [];
    mirror.onStatusChange((s) => statuses.push(s.status));

    const results = await Promise.all([service.sync(), service.sync()]);

    expect(results).toEqual([true, true]);
    expect(statuses).toEqual(['syncing', 'synced', 'syncing', 'synced']);
  });

  it('uploads in the background after a new entry when auto-sync is on', async () => {
    const service = createService({ sync: { enabled: true } });
    service.open();
    await service.whenIdle();

    await service.createEntry({ kind: 'text', title: 'Auto' });
    await service.whenIdle();

    expect(database.all().map((r) => r.fields.title)).toEqual(['Auto']);
  });

  it('reports a failed upload through status without throwing', async () => {
    database.failModifyAt = 1;
    const service = createService(SYNC_ON);
    service.open();
    await service.createEntry({ kind: 'text' });

    expect(await service.sync()).toBe(false);
    expect(service.status().lastError).toBe('Upload batch 1 of 1 failed: quota exceeded');
    expect(existsSync(join(vellumDir, 'sync-state.json'))).toBe(false);
  });
});

describe('JournalService.pull', () => {
  function remoteAudioRecord(id: string): RemoteRecord {
    const assetDir = join(tempDir, 'remote-assets');
    mkdirSync(assetDir, { recursive: true });
    writeFileSync(join(assetDir, 'audio_1792300000.m4a'), 'remote-pcm');
    return {
      recordName: 'remote-1',
      recordType: 'DiaryEntry',
      createdAt: '2026-10-18T00:00:00.000Z',
      fields: {
        entryID: id,
        title: 'From phone',
        content: 'hi',
        type: 'audio',
        date: '2026-10-18T08:00:00.000Z',
        audioAsset: { fileName: 'audio_1792300000.m4a', path: join(assetDir, 'audio_1792300000.m4a') },
      },
    };
  }

  it('adds remote entries and brings their media into the local store', async () => {
    const remoteId = uuid(70);
    database.seed([remoteAudioRecord(remoteId)]);
    const service = createService(SYNC_ON);
    service.open();
    await service.createEntry({ kind: 'text', title: 'Local' });

    expect(await service.pull()).toBe(1);

    const pulled = service.getEntry(remoteId);
    expect(pulled?.media.audio).toEqual({
      fileName: 'audio_1792300000.m4a',
      location: join(mediaDir, 'audio_1792300000.m4a'),
    });
    expect(readFileSync(join(mediaDir, 'audio_1792300000.m4a'), 'utf-8')).toBe('remote-pcm');
    expect(storedEntries().map((e) => e.id)).toEqual([uuid(1), remoteId]);
    expect(renditions.list()).toContain(`entry_${remoteId}.txt`);
  });

  it('keeps the local copy of an entry that exists on both sides', async () => {
    const service = createService(SYNC_ON);
    service.open();
    const local = await service.createEntry({ kind: 'text', title: 'Local title' });
    database.seed([
      {
        recordName: 'r',
        recordType: 'DiaryEntry',
        createdAt: '2026-10-19T00:00:00.000Z',
        fields: { entryID: local.id, title: 'Remote title', content: '', type: 'text', date: local.createdAt },
      },
    ]);

    expect(await service.pull()).toBe(0);
    expect(service.getEntry(local.id)?.title).toBe('Local title');
  });

  it('returns 0 while sync is disabled', async () => {
    database.seed([remoteAudioRecord(uuid(71))]);
    const service = createService();
    service.open();

    expect(await service.pull()).toBe(0);
    expect(service.entries()).toEqual([]);
  });
});

describe('JournalService.setSyncEnabled', () => {
  it('saves the switch to config and pushes when turned on', async () => {
    const service = createService({ sync: { autoSync: false } });
    service.open();
    await service.createEntry({ kind: 'text', title: 'Pending' });

    service.setSyncEnabled(true);
    await service.whenIdle();

    const saved = JsonStore.read(join(vellumDir, 'config.json'), VellumConfigSchema);
    expect(saved.sync.enabled).toBe(true);
    expect(database.all().map((r) => r.fields.title)).toEqual(['Pending']);
    expect(service.status().syncEnabled).toBe(true);
  });
});

describe('JournalService.onChange', () => {
  it('forwards catalog notifications', async () => {
    const service = createService();
    service.open();
    const counts: number[] = [];
    service.onChange((entries) => counts.push(entries.length));

    const entry = await service.createEntry({ kind: 'text' });
    service.deleteEntry(entry.id);

    expect(counts).toEqual([1, 0]);
  });
});
