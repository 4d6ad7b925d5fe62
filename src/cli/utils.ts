import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { Command } from 'commander';
import { ConfigNotFoundError } from '@shared/lib/errors.js';
import { VELLUM_DIRS, type VellumDirKey } from '@shared/constants/paths.js';
import { createJournal, type Journal } from '@features/journal/open-journal.js';
import type { RecoveryReport } from '@features/recovery/path-recovery.js';

/**
 * Resolve the .vellum/ directory path from a given cwd (or process.cwd()).
 * Throws ConfigNotFoundError if the directory does not exist.
 */
export function resolveVellumDir(cwd?: string): string {
  const dir = join(cwd ?? process.cwd(), VELLUM_DIRS.root);
  if (!existsSync(dir)) {
    throw new ConfigNotFoundError(dir);
  }
  return dir;
}

/**
 * Build an absolute path to a file or subdirectory within a .vellum/ directory.
 */
export function vellumDirPath(vellumDir: string, key: VellumDirKey): string {
  return join(vellumDir, VELLUM_DIRS[key]);
}

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  cwd?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  vellumDir: string;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext, ...args: string[]) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<{ json?: boolean; verbose?: boolean; cwd?: string }>();
  return { json: !!opts.json, verbose: !!opts.verbose, cwd: opts.cwd };
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves vellumDir, extracts global options, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and forwards positional args.
 */
export function withCommandContext(
  handler: CommandHandler,
  options?: { needsVellumDir?: boolean },
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new TypeError('withCommandContext: last action argument is not a Command');
    }
    const positionalArgs = args.slice(0, -2).filter((arg): arg is string => typeof arg === 'string');
    const globalOpts = getGlobalOptions(cmd);

    try {
      const vellumDir = options?.needsVellumDir === false
        ? ''
        : resolveVellumDir(globalOpts.cwd);

      const ctx: CommandContext = { globalOpts, vellumDir, cmd };
      await handler(ctx, ...positionalArgs);
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

export interface OpenedJournal extends Journal {
  /** What path recovery repaired while opening. */
  recovery: RecoveryReport;
}

/**
 * Open the journal under ctx.vellumDir: load the catalog and repair media paths.
 */
export function openJournal(ctx: CommandContext): OpenedJournal {
  const journal = createJournal(ctx.vellumDir);
  const recovery = journal.service.open();
  return { ...journal, recovery };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
