/**
 * Deduplicator
 *
 * Drops later channels whose id was already seen. Channels without an id
 * cannot be compared and are always kept.
 */

import type { ChannelRecord } from '@/types';
import { createLogger, type Logger } from '@/lib/logger';

export interface DedupeResult {
  channels: ChannelRecord[];
  /** Final channel count */
  count: number;
  removed: number;
}

export function dedupeChannels(channels: readonly ChannelRecord[], logger?: Logger): DedupeResult {
  const log = logger ?? createLogger('Deduplicator');
  const seen = new Set<string>();
  const unique: ChannelRecord[] = [];

  for (const channel of channels) {
    if (channel.id) {
      if (seen.has(channel.id)) continue;
      seen.add(channel.id);
    }
    unique.push(channel);
  }

  const removed = channels.length - unique.length;
  log.info(`[DEDUP] Removed ${removed} duplicates. Final count: ${unique.length}`);

  return { channels: unique, count: unique.length, removed };
}
