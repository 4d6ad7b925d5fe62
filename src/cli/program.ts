import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerEntryCommands } from './commands/entry.js';
import { registerMediaCommands } from './commands/media.js';
import { registerSyncCommands } from './commands/sync.js';
import { registerExportCommands } from './commands/export.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vellum')
    .description('Local-first journal: entries, media, recovery and an optional remote mirror')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--cwd <path>', 'Set working directory');

  // Wire --verbose and --json to the logger before any command runs.
  // Routine info lines stay quiet on the command line.
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<{ json?: boolean; verbose?: boolean }>();
    setLoggerOptions({ level: opts.verbose ? 'debug' : 'warn', json: !!opts.json });
  });

  registerInitCommand(program);
  registerEntryCommands(program);
  registerMediaCommands(program);
  registerSyncCommands(program);
  registerExportCommands(program);

  return program;
}
