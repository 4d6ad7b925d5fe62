import type { Command } from 'commander';
import { EntryKind, type EntryPatch } from '@domain/types/entry.js';
import { transcribeEntry } from '@features/journal/transcribe-entry.js';
import { withCommandContext, openJournal } from '@cli/utils.js';
import { resolveEntryRef } from '@cli/resolve-ref.js';
import { formatEntriesJson, formatEntryDetail, formatEntryTable } from '@cli/formatters/entry-formatter.js';

interface AddOptions {
  title?: string;
  body?: string;
  mood?: string;
  transcript?: string;
  audio?: string;
  video?: string;
  photo?: string[];
}

interface EditOptions {
  title?: string;
  body?: string;
  mood?: string;
  clearMood?: boolean;
  transcript?: string;
  clearTranscript?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Parse --limit as a positive integer. */
export function parseLimit(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value.trim()) < 1) {
    throw new Error(`Invalid limit "${value}". Use a positive whole number.`);
  }
  return Number(value.trim());
}

/**
 * Register the `vellum entry` subcommands.
 */
export function registerEntryCommands(parent: Command): void {
  const entry = parent
    .command('entry')
    .description('Write, read, edit and delete journal entries');

  entry
    .command('add <kind>')
    .description('Add an entry (kind: text, audio, video, photo)')
    .option('--title <title>', 'Title (default: "Diary - <date>")')
    .option('--body <text>', 'Entry text')
    .option('--mood <mood>', 'Mood, e.g. an emoji')
    .option('--transcript <text>', 'Transcript of the audio')
    .option('--audio <path>', 'Audio file to attach (audio entries)')
    .option('--video <path>', 'Video file to attach (video entries)')
    .option('--photo <path>', 'Photo to attach; repeat for more (photo entries)', collect)
    .action(withCommandContext(async (ctx, kindArg) => {
      const kind = EntryKind.safeParse(kindArg);
      if (!kind.success) {
        throw new Error(`Invalid kind "${kindArg}". Valid kinds: ${EntryKind.options.join(', ')}`);
      }
      const localOpts = ctx.cmd.opts<AddOptions>();
      const { service } = openJournal(ctx);

      const created = await service.createEntry({
        kind: kind.data,
        title: localOpts.title,
        body: localOpts.body,
        mood: localOpts.mood,
        transcript: localOpts.transcript,
        audio: localOpts.audio,
        video: localOpts.video,
        photos: localOpts.photo,
      });
      await service.whenIdle();

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(created, null, 2));
      } else {
        console.log(`✓ Saved "${created.title}" (${created.id.slice(0, 8)})`);
      }
    }));

  entry
    .command('list')
    .description('List entries, newest first')
    .option('--limit <n>', 'Show at most n entries', parseLimit)
    .action(withCommandContext((ctx) => {
      const localOpts = ctx.cmd.opts<{ limit?: number }>();
      const { service } = openJournal(ctx);
      const entries = service.entries().slice(0, localOpts.limit);

      console.log(ctx.globalOpts.json ? formatEntriesJson(entries) : formatEntryTable(entries));
    }));

  entry
    .command('show <id>')
    .description('Show one entry (full id, unique prefix, or "latest")')
    .action(withCommandContext((ctx, ref) => {
      const { service, mediaStore } = openJournal(ctx);
      const found = resolveEntryRef(ref, service.entries());

      console.log(ctx.globalOpts.json ? JSON.stringify(found, null, 2) : formatEntryDetail(found, mediaStore));
    }));

  entry
    .command('edit <id>')
    .description('Change the title, text, mood or transcript of an entry')
    .option('--title <title>', 'New title')
    .option('--body <text>', 'New text')
    .option('--mood <mood>', 'New mood')
    .option('--clear-mood', 'Remove the mood')
    .option('--transcript <text>', 'New transcript')
    .option('--clear-transcript', 'Remove the transcript')
    .action(withCommandContext(async (ctx, ref) => {
      const localOpts = ctx.cmd.opts<EditOptions>();
      const patch: EntryPatch = {};
      if (localOpts.title !== undefined) patch.title = localOpts.title;
      if (localOpts.body !== undefined) patch.body = localOpts.body;
      if (localOpts.clearMood) patch.mood = null;
      else if (localOpts.mood !== undefined) patch.mood = localOpts.mood;
      if (localOpts.clearTranscript) patch.transcript = null;
      else if (localOpts.transcript !== undefined) patch.transcript = localOpts.transcript;

      if (Object.keys(patch).length === 0) {
        throw new Error('Nothing to change. Pass --title, --body, --mood or --transcript.');
      }

      const { service } = openJournal(ctx);
      await service.whenIdle();
      const target = resolveEntryRef(ref, service.entries());
      const updated = service.updateEntry(target.id, patch);
      await service.whenIdle();

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(updated, null, 2));
      } else {
        console.log(`✓ Updated "${updated.title}" (${updated.id.slice(0, 8)})`);
      }
    }));

  entry
    .command('delete <id>')
    .description('Delete an entry with its media and text copy')
    .option('--yes', 'Do not ask for confirmation')
    .action(withCommandContext(async (ctx, ref) => {
      const localOpts = ctx.cmd.opts<{ yes?: boolean }>();
      const { service } = openJournal(ctx);
      await service.whenIdle();
      const target = resolveEntryRef(ref, service.entries());

      if (!localOpts.yes) {
        const { confirm } = await import('@inquirer/prompts');
        const proceed = await confirm({
          message: `Delete "${target.title}" and its media? This cannot be undone.`,
          default: false,
        });
        if (!proceed) {
          console.log('Cancelled.');
          return;
        }
      }

      const removed = service.deleteEntry(target.id);
      await service.whenIdle();
      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ deleted: removed.id }, null, 2));
      } else {
        console.log(`✓ Deleted "${removed.title}"`);
      }
    }));

  entry
    .command('transcribe <id>')
    .description('Transcribe the audio of an entry with the configured command')
    .action(withCommandContext(async (ctx, ref) => {
      const { service, mediaStore, transcriber } = openJournal(ctx);
      if (!transcriber) {
        throw new Error('No transcription command configured. Set transcription.command in .vellum/config.json.');
      }
      const target = resolveEntryRef(ref, service.entries());

      const result = await transcribeEntry(service, transcriber, mediaStore, target.id);
      await service.whenIdle();
      if (!result.ok) {
        throw new Error(result.message);
      }

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ id: target.id, transcript: result.transcript }, null, 2));
      } else {
        console.log(result.transcript);
      }
    }));
}
