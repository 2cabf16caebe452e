/**
 * Pipeline Commands
 *
 * Command-line dispatch over the stage runners. Output goes through a
 * writer so commands can be exercised without a terminal.
 */

import type { ChannelRecord } from '@/types';
import type { PipelineConfig } from '@/lib/config';
import { LoadError } from '@/lib/errors';
import {
  compareChannels,
  filterChannels,
  findChannel,
  searchChannels,
  summarizeChannels,
} from '@/lib/channel-query';
import {
  runAudit,
  runDedupe,
  runFullPipeline,
  runGuideExtraction,
  runPlaylistExtraction,
  runReconciliation,
  runValidation,
  type PipelineDeps,
  type StageResult,
} from './pipeline';

export const COMMANDS = [
  'validate',
  'playlists',
  'guides',
  'reconcile',
  'audit',
  'dedupe',
  'all',
  'search',
  'filter',
  'compare',
  'summary',
] as const;

export type Command = (typeof COMMANDS)[number];

export const EXIT_OK = 0;
export const EXIT_LOAD_ERROR = 1;
export const EXIT_USAGE = 2;

export type Writer = (line: string) => void;

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function usage(): string {
  return [
    'Usage: iptv-pipeline <command> [args]',
    '',
    'Commands:',
    '  validate         Check every playlist and guide URL',
    '  playlists        Extract channels from the playlists',
    '  guides           Extract channel entries from the guides',
    '  reconcile        Match channels to guide entries by name',
    '  audit            Report empty sources, null entries and duplicate ids',
    '  dedupe           Drop channels with repeated ids',
    '  all              validate, then playlists and guides, then reconcile',
    '  search <query>   Find channels by name or id',
    '  filter <group> [language]',
    '                   List channels whose group and language contain the given text',
    '  compare <a> <b>  Show the fields that differ between two channels',
    '  summary          Count channels by group and language',
  ].join('\n');
}

function channelLine(channel: ChannelRecord): string {
  return `${channel.displayName || '(no name)'} [${channel.id || 'no id'}] ${channel.streamUrl}`;
}

function line(write: Writer, label: string, value: number | string): void {
  write(`  ${label.padEnd(30)} ${value}`);
}

function report<T>(result: StageResult<T>, write: Writer, describe: (data: T) => void): number {
  if (!result.success) {
    write(`❌ ${result.error.message}`);
    return EXIT_LOAD_ERROR;
  }

  describe(result.data);
  if (!result.saved) {
    write('⚠ Result could not be saved; see the log for details');
  }
  return EXIT_OK;
}

/**
 * Load the channel store for read-only commands; null after a LoadError
 */
async function readChannels(deps: PipelineDeps, write: Writer): Promise<ChannelRecord[] | null> {
  try {
    return await deps.store.loadChannels();
  } catch (error) {
    if (error instanceof LoadError) {
      deps.logger?.error(`[LOAD ERROR] ${error.message}`, error);
      write(`❌ ${error.message}`);
      return null;
    }
    throw error;
  }
}

/**
 * Run one command and return the process exit code
 */
export async function runCommand(
  argv: readonly string[],
  config: PipelineConfig,
  deps: PipelineDeps,
  write: Writer
): Promise<number> {
  const [name, ...args] = argv;
  if (name === undefined || !isCommand(name)) {
    for (const text of usage().split('\n')) write(text);
    return EXIT_USAGE;
  }

  switch (name) {
    case 'validate':
      return report(await runValidation(config, deps), write, ({ summary }) => {
        write('🔎 Validation');
        line(write, 'Checked', summary.checked);
        line(write, 'Alive', summary.alive);
        line(write, 'Dead', summary.dead);
        for (const [kind, count] of Object.entries(summary.errors)) {
          line(write, kind, count);
        }
      });

    case 'playlists':
      return report(await runPlaylistExtraction(config, deps), write, (data) => {
        line(write, 'Channels extracted', data.channels.length);
        line(write, 'Playlists failed', data.failedUrls.length);
      });

    case 'guides':
      return report(await runGuideExtraction(config, deps), write, (data) => {
        let entries = 0;
        for (const group of data.groups.values()) entries += group.length;
        line(write, 'Guides parsed', data.groups.size);
        line(write, 'Guide entries', entries);
        line(write, 'Guides failed', data.failedUrls.length);
      });

    case 'reconcile':
      return report(await runReconciliation(config, deps), write, (data) => {
        line(write, 'Channels matched', `${data.matched}/${data.channels.length}`);
      });

    case 'audit':
      return report(await runAudit(config, deps), write, (data) => {
        write('🔍 Guide Metadata Audit');
        line(write, 'Total sources scanned', data.totalSources);
        line(write, 'Sources with no entries', data.emptySources.length);
        line(write, 'Null entries', data.nullEntries.length);
        line(write, 'Duplicate ids', data.duplicates.length);
      });

    case 'dedupe':
      return report(await runDedupe(config, deps), write, (data) => {
        line(write, 'Duplicates removed', data.removed);
        line(write, 'Unique channels', data.count);
      });

    case 'all':
      return report(await runFullPipeline(config, deps), write, (data) => {
        line(write, 'URLs alive', `${data.validation.summary.alive}/${data.validation.summary.checked}`);
        line(write, 'Channels extracted', data.playlists.channels.length);
        line(write, 'Guides parsed', data.guides.groups.size);
        line(write, 'Channels matched', data.reconciliation.matched);
      });

    case 'search': {
      const channels = await readChannels(deps, write);
      if (!channels) return EXIT_LOAD_ERROR;

      const query = args.join(' ');
      const found = searchChannels(channels, query);
      for (const channel of found) write(channelLine(channel));
      write(`${found.length} channel(s) match "${query}"`);
      return EXIT_OK;
    }

    case 'filter': {
      const [group, language] = args;
      if (group === undefined) {
        write('Usage: iptv-pipeline filter <group> [language]');
        return EXIT_USAGE;
      }

      const channels = await readChannels(deps, write);
      if (!channels) return EXIT_LOAD_ERROR;

      const found = filterChannels(channels, { group, language });
      for (const channel of found) write(channelLine(channel));
      write(`${found.length} channel(s) in group "${group}"${language ? ` with language "${language}"` : ''}`);
      return EXIT_OK;
    }

    case 'compare': {
      const [leftQuery, rightQuery] = args;
      if (leftQuery === undefined || rightQuery === undefined) {
        write('Usage: iptv-pipeline compare <a> <b>');
        return EXIT_USAGE;
      }

      const channels = await readChannels(deps, write);
      if (!channels) return EXIT_LOAD_ERROR;

      const left = findChannel(channels, leftQuery);
      const right = findChannel(channels, rightQuery);
      if (!left || !right) {
        write(`No channel matches "${left ? rightQuery : leftQuery}"`);
        return EXIT_OK;
      }

      const differences = compareChannels(left, right);
      write(`Comparing ${channelLine(left)} with ${channelLine(right)}`);
      for (const { field, left: a, right: b } of differences) {
        write(`  ${field.padEnd(30)} ${a ?? ''} | ${b ?? ''}`);
      }
      write(differences.length === 0 ? 'No differences' : `${differences.length} field(s) differ`);
      return EXIT_OK;
    }

    case 'summary': {
      const channels = await readChannels(deps, write);
      if (!channels) return EXIT_LOAD_ERROR;

      const summary = summarizeChannels(channels);
      line(write, 'Total channels', summary.total);
      line(write, 'Matched to a guide', summary.matched);
      write('By group:');
      for (const [group, count] of Object.entries(summary.byGroup)) line(write, group, count);
      write('By language:');
      for (const [language, count] of Object.entries(summary.byLanguage)) line(write, language, count);
      return EXIT_OK;
    }
  }
}
