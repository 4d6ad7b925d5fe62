import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { rmSync, writeFileSync } from 'node:fs';
import { extname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { ITranscriber } from '@domain/ports/transcriber.js';
import { TranscriptionError } from '@shared/lib/errors.js';
import { componentLogger, type Logger } from '@shared/lib/logger.js';

const execFileAsync = promisify(execFile);

export type ExecFn = (
  file: string,
  args: string[],
  options: { timeout: number; maxBuffer: number; encoding: 'utf-8' },
) => Promise<{ stdout: string; stderr: string }>;

export interface CommandTranscriberOptions {
  command: string;
  args?: string[];
  /** Defaults to 300,000 (5 min). */
  timeoutMs?: number;
  /** Replaces the process runner (for testing). */
  exec?: ExecFn;
  logger?: Logger;
}

/**
 * Transcriber that shells out to a speech-to-text command.
 *
 * The audio is written to a temp file whose path is passed as the last
 * argument; the command's trimmed stdout is the transcript. The temp file is
 * removed whether or not the command succeeds.
 */
export class CommandTranscriber implements ITranscriber {
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;
  private readonly exec: ExecFn;
  private readonly log: Logger;

  constructor(options: CommandTranscriberOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs ?? 300_000;
    this.exec = options.exec ?? execFileAsync;
    this.log = options.logger ?? componentLogger('transcriber');
  }

  async transcribe(audio: Buffer, fileName: string): Promise<string> {
    const audioPath = join(tmpdir(), `vellum-audio-${randomUUID()}${extname(fileName)}`);
    writeFileSync(audioPath, audio);

    try {
      const { stdout, stderr } = await this.exec(this.command, [...this.args, audioPath], {
        timeout: this.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf-8',
      });
      if (stderr.trim()) {
        this.log.debug('Transcriber wrote to stderr', { stderr: stderr.trim() });
      }
      const transcript = stdout.trim();
      if (!transcript) {
        throw new TranscriptionError(`Transcriber "${this.command}" returned no text for ${fileName}.`);
      }
      return transcript;
    } catch (err) {
      if (err instanceof TranscriptionError) throw err;
      throw new TranscriptionError(
        `Transcriber "${this.command}" failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      rmSync(audioPath, { force: true });
    }
  }
}
