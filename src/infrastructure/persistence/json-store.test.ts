import { mkdtempSync, rmSync, writeFileSync, existsSync, mkdirSync, chmodSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod/v4';
import { JsonStore, JsonStoreError } from './json-store.js';

const NoteSchema = z.object({
  id: z.string().uuid(),
  title: z.string().min(1),
  mood: z.string().optional(),
  words: z.number().int().min(0).default(0),
});

type Note = z.infer<typeof NoteSchema>;

// Permission bits do not stop root, so the EACCES cases only run unprivileged.
const isRoot = process.getuid?.() === 0;

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'vellum-store-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('JsonStore.read', () => {
  it('reads and validates a valid JSON file', () => {
    const id = crypto.randomUUID();
    const path = join(tempDir, 'note.json');
    writeFileSync(path, JSON.stringify({ id, title: 'Morning pages', words: 5 }));

    const result = JsonStore.read(path, NoteSchema);
    expect(result.id).toBe(id);
    expect(result.title).toBe('Morning pages');
    expect(result.words).toBe(5);
  });

  it('applies defaults for missing fields and keeps optional ones absent', () => {
    const id = crypto.randomUUID();
    const path = join(tempDir, 'note.json');
    writeFileSync(path, JSON.stringify({ id, title: 'minimal' }));

    const result = JsonStore.read(path, NoteSchema);
    expect(result.words).toBe(0);
    expect('mood' in result).toBe(false);
  });

  it('throws JsonStoreError for missing file', () => {
    const path = join(tempDir, 'nonexistent.json');
    expect(() => JsonStore.read(path, NoteSchema)).toThrow(JsonStoreError);
    expect(() => JsonStore.read(path, NoteSchema)).toThrow('File not found');
  });

  it('throws JsonStoreError for invalid JSON', () => {
    const path = join(tempDir, 'bad.json');
    writeFileSync(path, 'not json {{{');
    expect(() => JsonStore.read(path, NoteSchema)).toThrow('Invalid JSON');
  });

  it('throws JsonStoreError for schema validation failure', () => {
    const path = join(tempDir, 'invalid.json');
    writeFileSync(path, JSON.stringify({ id: 'not-a-uuid', title: '' }));
    expect(() => JsonStore.read(path, NoteSchema)).toThrow('Validation failed');
  });
});

describe('JsonStore.write', () => {
  it('writes valid data that reads back equal', () => {
    const path = join(tempDir, 'output.json');
    const data: Note = { id: crypto.randomUUID(), title: 'written', mood: 'calm', words: 10 };

    JsonStore.write(path, data, NoteSchema);

    expect(JsonStore.read(path, NoteSchema)).toEqual(data);
  });

  it('creates parent directories if needed', () => {
    const path = join(tempDir, 'nested', 'deep', 'output.json');
    JsonStore.write(path, { id: crypto.randomUUID(), title: 'nested', words: 0 }, NoteSchema);
    expect(existsSync(path)).toBe(true);
  });

  it('leaves no temp file behind after a successful write', () => {
    const path = join(tempDir, 'catalog.json');
    JsonStore.write(path, { id: crypto.randomUUID(), title: 'one', words: 1 }, NoteSchema);
    JsonStore.write(path, { id: crypto.randomUUID(), title: 'two', words: 2 }, NoteSchema);

    expect(readdirSync(tempDir)).toEqual(['catalog.json']);
  });

  it.skipIf(isRoot)('keeps the previous document when the write fails', () => {
    const dir = join(tempDir, 'locked');
    mkdirSync(dir);
    const path = join(dir, 'catalog.json');
    const original: Note = { id: crypto.randomUUID(), title: 'original', words: 1 };
    JsonStore.write(path, original, NoteSchema);

    chmodSync(dir, 0o500); // no new files in the directory: the temp write fails
    try {
      expect(() =>
        JsonStore.write(path, { id: crypto.randomUUID(), title: 'replacement', words: 2 }, NoteSchema),
      ).toThrow('Failed to write file');
    } finally {
      chmodSync(dir, 0o755);
    }

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(original);
  });

  it('throws JsonStoreError if data fails validation before write', () => {
    const path = join(tempDir, 'bad-write.json');
    const badData = { id: 'not-uuid', title: '', words: -5 };

    expect(() => JsonStore.write(path, badData as Note, NoteSchema)).toThrow('Validation failed before write');
    expect(existsSync(path)).toBe(false);
  });
});

describe('JsonStore.exists', () => {
  it('reports existing and missing files', () => {
    const path = join(tempDir, 'exists.json');
    writeFileSync(path, '{}');
    expect(JsonStore.exists(path)).toBe(true);
    expect(JsonStore.exists(join(tempDir, 'nope.json'))).toBe(false);
  });
});

describe('JsonStore.rename', () => {
  it('moves a file over an existing destination', () => {
    const from = join(tempDir, 'catalog.json');
    const to = join(tempDir, 'catalog.json.corrupt');
    writeFileSync(from, 'new');
    writeFileSync(to, 'old');

    JsonStore.rename(from, to);

    expect(existsSync(from)).toBe(false);
    expect(readFileSync(to, 'utf-8')).toBe('new');
  });

  it('throws JsonStoreError when the source is missing', () => {
    expect(() => JsonStore.rename(join(tempDir, 'a.json'), join(tempDir, 'b.json'))).toThrow('Failed to rename');
  });
});

describe('JsonStore.list', () => {
  it('returns empty array for missing directory', () => {
    expect(JsonStore.list(join(tempDir, 'nonexistent'), NoteSchema)).toEqual([]);
  });

  it('reads all valid JSON files and skips invalid or non-JSON ones', () => {
    const dir = join(tempDir, 'records');
    JsonStore.ensureDir(dir);

    writeFileSync(join(dir, 'a.json'), JSON.stringify({ id: crypto.randomUUID(), title: 'first' }));
    writeFileSync(join(dir, 'b.json'), JSON.stringify({ id: crypto.randomUUID(), title: 'second', words: 3 }));
    writeFileSync(join(dir, 'bad.json'), JSON.stringify({ id: 'not-uuid', title: '' }));
    writeFileSync(join(dir, 'broken.json'), 'broken {{{');
    writeFileSync(join(dir, 'readme.md'), '# Not JSON');

    const titles = JsonStore.list(dir, NoteSchema).map((r) => r.title).sort();
    expect(titles).toEqual(['first', 'second']);
  });

  it.skipIf(isRoot)('throws JsonStoreError when directory is not readable (EACCES)', () => {
    const dir = join(tempDir, 'locked-dir');
    mkdirSync(dir);
    chmodSync(dir, 0o000); // remove all permissions — readdirSync will fail
    try {
      expect(() => JsonStore.list(dir, NoteSchema)).toThrow(JsonStoreError);
      expect(() => JsonStore.list(dir, NoteSchema)).toThrow('Failed to read directory');
    } finally {
      chmodSync(dir, 0o755); // restore so cleanup can proceed
    }
  });
});

describe('JsonStore.ensureDir', () => {
  it('creates directory if it does not exist and is idempotent', () => {
    const dir = join(tempDir, 'new-dir');
    JsonStore.ensureDir(dir);
    JsonStore.ensureDir(dir);
    expect(existsSync(dir)).toBe(true);
  });
});
