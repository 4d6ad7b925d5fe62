import { join } from 'node:path';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { handleInit } from '@features/init/init-handler.js';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerEntryCommands } from './entry.js';
import { registerMediaCommands } from './media.js';

function createProgram(): Command {
  const program = new Command();
  program.option('--json').option('--verbose').option('--cwd <path>');
  program.exitOverride();
  registerEntryCommands(program);
  registerMediaCommands(program);
  return program;
}

describe('registerMediaCommands', () => {
  let baseDir: string;
  let vellumDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  function run(...args: string[]): Promise<Command> {
    return createProgram().parseAsync(['node', 'test', ...args, '--cwd', baseDir]);
  }

  function output(): string {
    return consoleSpy.mock.calls.flat().join('\n');
  }

  async function addAudioEntry(): Promise<string> {
    const source = join(baseDir, 'note.m4a');
    writeFileSync(source, 'audio-bytes');
    await run('--json', 'entry', 'add', 'audio', '--audio', source);
    const created = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
    consoleSpy.mockClear();
    return created.media.audio.fileName;
  }

  beforeAll(() => {
    setLoggerOptions({ level: 'error' });
  });

  afterAll(() => {
    setLoggerOptions({});
  });

  beforeEach(async () => {
    vi.stubEnv('VELLUM_SYNC_FOLDER', '');
    baseDir = mkdtempSync(join(tmpdir(), 'vellum-media-cmd-'));
    vellumDir = (await handleInit({ cwd: baseDir, skipPrompts: true })).vellumDir;
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    consoleSpy.mockRestore();
    errorSpy.mockRestore();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  describe('media missing', () => {
    it('reports no missing media for a fresh journal', async () => {
      await run('media', 'missing');
      expect(output()).toBe('No missing media.');
      expect(process.exitCode).toBeUndefined();
    });

    it('counts a deleted media file and exits non-zero', async () => {
      const fileName = await addAudioEntry();
      rmSync(join(vellumDir, 'media', fileName));

      await run('media', 'missing');

      expect(output()).toBe('Missing media: 1\n  Audio:  1\n  Video:  0\n  Photos: 0');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('media recover', () => {
    it('repairs a location left over from another root', async () => {
      const fileName = await addAudioEntry();
      const catalogPath = join(vellumDir, 'catalog.json');
      const catalog = JSON.parse(readFileSync(catalogPath, 'utf-8'));
      catalog.entries[0].media.audio.location = `/old/device/.vellum/media/${fileName}`;
      writeFileSync(catalogPath, JSON.stringify(catalog));

      await run('media', 'recover');

      const expected = join(vellumDir, 'media', fileName);
      expect(output()).toBe(`Repaired 1 reference(s):\n  ${fileName} -> ${expected}`);
      const saved = JSON.parse(readFileSync(catalogPath, 'utf-8'));
      expect(saved.entries[0].media.audio.location).toBe(expected);
    });

    it('lists references it cannot locate as JSON', async () => {
      const fileName = await addAudioEntry();
      rmSync(join(vellumDir, 'media', fileName));

      await run('--json', 'media', 'recover');

      const printed = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
      expect(printed.repaired).toEqual([]);
      expect(printed.unresolved).toEqual([
        { entryId: expect.any(String), field: 'audio', fileName },
      ]);
    });
  });
});
