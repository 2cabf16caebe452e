/**
 * Channel Query
 *
 * Read-only search, filtering, comparison and summary helpers over
 * extracted channel records.
 */

import { UNKNOWN_CHANNEL_LANGUAGE, type ChannelRecord } from '@/types';

export interface ChannelFilter {
  group?: string;
  language?: string;
}

export const CHANNEL_FIELDS = [
  'id',
  'displayName',
  'logoUrl',
  'group',
  'language',
  'streamUrl',
  'sourceUrl',
  'matchedGuideId',
] as const satisfies ReadonlyArray<keyof ChannelRecord>;

export type ChannelField = (typeof CHANNEL_FIELDS)[number];

export interface FieldDifference {
  field: ChannelField;
  left: string | undefined;
  right: string | undefined;
}

export interface ChannelSummary {
  total: number;
  /** Channels carrying a guide match */
  matched: number;
  byGroup: Record<string, number>;
  byLanguage: Record<string, number>;
}

function contains(value: string, needle: string): boolean {
  return value.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Case-insensitive substring search on display name or id.
 * A blank query returns every channel.
 */
export function searchChannels(channels: readonly ChannelRecord[], query: string): ChannelRecord[] {
  const trimmedQuery = query.trim();
  if (!trimmedQuery) {
    return [...channels];
  }

  return channels.filter(
    (channel) => contains(channel.displayName, trimmedQuery) || contains(channel.id, trimmedQuery)
  );
}

/**
 * Filter by group and language substrings; blank criteria match everything
 */
export function filterChannels(
  channels: readonly ChannelRecord[],
  filter: ChannelFilter
): ChannelRecord[] {
  const group = filter.group?.trim() ?? '';
  const language = filter.language?.trim() ?? '';

  return channels.filter(
    (channel) =>
      (!group || contains(channel.group, group)) &&
      (!language || contains(channel.language, language))
  );
}

/**
 * First channel matched by searchChannels, or null
 */
export function findChannel(channels: readonly ChannelRecord[], query: string): ChannelRecord | null {
  return searchChannels(channels, query)[0] ?? null;
}

/**
 * Fields whose values differ between two channels
 */
export function compareChannels(left: ChannelRecord, right: ChannelRecord): FieldDifference[] {
  const differences: FieldDifference[] = [];
  for (const field of CHANNEL_FIELDS) {
    if (left[field] !== right[field]) {
      differences.push({ field, left: left[field], right: right[field] });
    }
  }
  return differences;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeChannels(channels: readonly ChannelRecord[]): ChannelSummary {
  const summary: ChannelSummary = { total: channels.length, matched: 0, byGroup: {}, byLanguage: {} };

  for (const channel of channels) {
    if (channel.matchedGuideId) summary.matched++;
    increment(summary.byGroup, channel.group || 'Unknown');
    increment(summary.byLanguage, channel.language || UNKNOWN_CHANNEL_LANGUAGE);
  }

  return summary;
}
