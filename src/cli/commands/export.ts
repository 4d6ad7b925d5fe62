import { basename } from 'node:path';
import type { Command } from 'commander';
import { renditionFileName } from '@infra/export/text-rendition.js';
import { withCommandContext, openJournal } from '@cli/utils.js';

/**
 * Register the `vellum export` subcommands.
 */
export function registerExportCommands(parent: Command): void {
  const exportCmd = parent
    .command('export')
    .description('Manage the plain-text copies of entries in .vellum/exports');

  exportCmd
    .command('list')
    .description('List text renditions')
    .action(withCommandContext((ctx) => {
      const { renditions } = openJournal(ctx);
      const files = renditions.list();

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ directory: renditions.directory, files }, null, 2));
        return;
      }
      if (files.length === 0) {
        console.log('No text renditions. Run "vellum export rebuild" to write them.');
        return;
      }
      console.log(`${basename(renditions.directory)}/ (${files.length})`);
      for (const file of files) {
        console.log(`  ${file}`);
      }
    }));

  exportCmd
    .command('rebuild')
    .description('Rewrite every text rendition and remove ones whose entry is gone')
    .action(withCommandContext((ctx) => {
      const { service, renditions } = openJournal(ctx);
      const entries = service.entries();

      let written = 0;
      for (const entry of entries) {
        if (renditions.write(entry)) written += 1;
      }

      const current = new Set(entries.map((e) => renditionFileName(e.id)));
      const stale = renditions.list().filter((file) => !current.has(file));
      for (const file of stale) {
        renditions.delete(file.slice('entry_'.length, -'.txt'.length));
      }

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ written, removed: stale.length, failed: entries.length - written }, null, 2));
        return;
      }
      console.log(`✓ Wrote ${written} of ${entries.length} rendition(s), removed ${stale.length} stale`);
      if (written < entries.length) {
        process.exitCode = 1;
      }
    }));
}
