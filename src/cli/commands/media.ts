import type { Command } from 'commander';
import { withCommandContext, openJournal } from '@cli/utils.js';
import { formatMissingMedia, formatRecoveryReport } from '@cli/formatters/sync-formatter.js';

/**
 * Register the `vellum media` subcommands.
 */
export function registerMediaCommands(parent: Command): void {
  const media = parent
    .command('media')
    .description('Check the media files entries point at');

  media
    .command('recover')
    .description('Re-locate media files by name and save repaired paths')
    .action(withCommandContext((ctx) => {
      const { recovery } = openJournal(ctx);

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ repaired: recovery.repaired, unresolved: recovery.unresolved }, null, 2));
        return;
      }
      console.log(formatRecoveryReport(recovery));
    }));

  media
    .command('missing')
    .description('Count media references whose files are gone')
    .action(withCommandContext((ctx) => {
      const { service } = openJournal(ctx);
      const stats = service.missingMedia();

      console.log(ctx.globalOpts.json ? JSON.stringify(stats, null, 2) : formatMissingMedia(stats));
      if (stats.audio + stats.video + stats.photos > 0) {
        process.exitCode = 1;
      }
    }));
}
