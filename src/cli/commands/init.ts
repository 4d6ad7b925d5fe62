import type { Command } from 'commander';
import { handleInit } from '@features/init/init-handler.js';
import { withCommandContext } from '@cli/utils.js';

interface InitCommandOptions {
  syncFolder?: string;
  name?: string;
  skipPrompts?: boolean;
}

/**
 * Register the `vellum init` command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a journal in ./.vellum')
    .option('--sync-folder <path>', 'Mirror the journal to this folder (e.g. one a cloud drive syncs)')
    .option('--name <name>', 'Journal owner name')
    .option('--skip-prompts', 'Skip interactive prompts and use defaults')
    .action(withCommandContext(async (ctx) => {
      const localOpts = ctx.cmd.opts<InitCommandOptions>();
      const cwd = ctx.globalOpts.cwd ?? process.cwd();

      const result = await handleInit({
        cwd,
        syncFolder: localOpts.syncFolder,
        userName: localOpts.name,
        skipPrompts: localOpts.skipPrompts ?? false,
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      console.log(`✓ ${result.created ? 'Journal created' : 'Journal re-initialized'} at ${result.vellumDir}`);
      console.log('');
      const sync = result.config.sync;
      console.log(`  Sync:     ${sync.enabled ? `folder ${sync.folderPath ?? ''}` : 'off (this device only)'}`);
      console.log('');
      console.log('  What\'s next:');
      console.log('  → Write an entry:   vellum entry add text --body "..."');
      console.log('  → See entries:      vellum entry list');
      console.log('  → Check media:      vellum media missing');
      if (!sync.enabled) {
        console.log('  → Turn on sync:     vellum init --sync-folder <path>');
      }
    }, { needsVellumDir: false }));
}
