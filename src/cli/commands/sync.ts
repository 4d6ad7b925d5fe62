import type { Command } from 'commander';
import { withCommandContext, openJournal } from '@cli/utils.js';
import { formatSyncStatus } from '@cli/formatters/sync-formatter.js';

const NO_REMOTE_MESSAGE = 'No remote store configured. Set sync.folderPath in .vellum/config.json or VELLUM_SYNC_FOLDER.';

/**
 * Register the `vellum sync` subcommands.
 */
export function registerSyncCommands(parent: Command): void {
  const sync = parent
    .command('sync')
    .description('Mirror the journal to the configured remote store');

  sync
    .command('status')
    .description('Show whether sync is on and when it last ran')
    .action(withCommandContext(async (ctx) => {
      const { service } = openJournal(ctx);
      await service.whenIdle();
      const status = service.status();

      console.log(ctx.globalOpts.json ? JSON.stringify(status, null, 2) : formatSyncStatus(status));
    }));

  sync
    .command('push')
    .description('Upload every entry and its media')
    .action(withCommandContext(async (ctx) => {
      const { service } = openJournal(ctx);
      const before = service.status();
      if (!before.syncEnabled) {
        throw new Error('Sync is disabled. Run "vellum sync enable" first.');
      }
      if (!before.mirrorAvailable) {
        throw new Error(NO_REMOTE_MESSAGE);
      }

      const ok = await service.sync();
      const status = service.status();
      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ ok, ...status }, null, 2));
      } else if (ok) {
        console.log(`✓ Uploaded ${status.entries} entr${status.entries === 1 ? 'y' : 'ies'}`);
      }
      if (!ok) {
        throw new Error(status.lastError ?? 'Upload failed.');
      }
    }));

  sync
    .command('pull')
    .description('Download entries made on other devices and merge them in')
    .action(withCommandContext(async (ctx) => {
      const { service } = openJournal(ctx);
      const before = service.status();
      if (!before.syncEnabled) {
        throw new Error('Sync is disabled. Run "vellum sync enable" first.');
      }
      if (!before.mirrorAvailable) {
        throw new Error(NO_REMOTE_MESSAGE);
      }

      const added = await service.pull();
      const status = service.status();
      if (status.syncStatus === 'error' || status.syncStatus === 'no-account') {
        throw new Error(status.lastError ?? 'Download failed.');
      }

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ added }, null, 2));
      } else {
        console.log(added === 0 ? 'Already up to date.' : `✓ Added ${added} entr${added === 1 ? 'y' : 'ies'} from the remote store`);
      }
    }));

  sync
    .command('enable')
    .description('Turn sync on and push the journal')
    .action(withCommandContext(async (ctx) => {
      const { service } = openJournal(ctx);
      service.setSyncEnabled(true);
      await service.whenIdle();
      const status = service.status();

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }
      console.log('✓ Sync enabled');
      if (!status.mirrorAvailable) {
        console.log('  No remote store configured yet. Set sync.folderPath in .vellum/config.json.');
      } else if (status.lastError) {
        console.log(`  Upload failed: ${status.lastError}`);
      }
    }));

  sync
    .command('disable')
    .description('Turn sync off; entries stay on this device')
    .action(withCommandContext(async (ctx) => {
      const { service } = openJournal(ctx);
      await service.whenIdle();
      service.setSyncEnabled(false);

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(service.status(), null, 2));
      } else {
        console.log('✓ Sync disabled');
      }
    }));
}
