/**
 * M3U Parser
 *
 * Parses M3U/M3U8 playlist text into channel records.
 * Pure: identical text and source URL always yield identical records.
 */

import { UNKNOWN_CHANNEL_LANGUAGE, type ChannelRecord } from '@/types';

const EXTINF_PREFIX = '#EXTINF';

/**
 * Extracts an attribute value from an EXTINF line.
 * Missing attributes yield an empty string.
 */
export function extractAttribute(line: string, attribute: string): string {
  const regex = new RegExp(`${attribute}="(.*?)"`);
  const match = line.match(regex);
  return match?.[1] ?? '';
}

/**
 * Split playlist text into trimmed lines, accepting \n, \r\n and \r
 */
function splitLines(content: string): string[] {
  return content.split(/\r\n|\r|\n/).map((line) => line.trim());
}

/**
 * Parses M3U playlist content into channel records
 *
 * Each #EXTINF line starts one record; the following line is its stream URL
 * unless it is another #EXTINF line. Records with neither tvg-id nor
 * tvg-name are dropped.
 */
export function parsePlaylist(content: string, sourceUrl: string): ChannelRecord[] {
  if (!content) return [];

  const lines = splitLines(content);
  const channels: ChannelRecord[] = [];

  for (let i = 0; i < lines.length; i++) {
    const info = lines[i];
    if (!info.startsWith(EXTINF_PREFIX)) continue;

    const next = lines[i + 1];
    const streamUrl = next !== undefined && !next.startsWith(EXTINF_PREFIX) ? next : '';

    const channel: ChannelRecord = {
      id: extractAttribute(info, 'tvg-id'),
      displayName: extractAttribute(info, 'tvg-name'),
      logoUrl: extractAttribute(info, 'tvg-logo'),
      group: extractAttribute(info, 'group-title'),
      language: UNKNOWN_CHANNEL_LANGUAGE,
      streamUrl,
      sourceUrl,
    };

    if (channel.id || channel.displayName) {
      channels.push(channel);
    }
  }

  return channels;
}
