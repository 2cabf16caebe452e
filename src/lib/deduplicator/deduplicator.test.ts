/**
 * Deduplicator Tests
 */

import { describe, it, expect } from 'vitest';
import type { ChannelRecord } from '@/types';
import { dedupeChannels } from './deduplicator';

function channel(id: string, displayName: string): ChannelRecord {
  return {
    id,
    displayName,
    logoUrl: '',
    group: '',
    language: 'Unknown',
    streamUrl: `http://stream.example/${displayName}`,
    sourceUrl: 'http://lists.example/all.m3u',
  };
}

describe('dedupeChannels', () => {
  it('keeps the first channel per id and every id-less channel', () => {
    const first = channel('bbc1', 'BBC One');
    const idless = channel('', 'Local TV');
    const repeat = channel('bbc1', 'BBC One Backup');

    const result = dedupeChannels([first, repeat, idless]);

    expect(result.channels).toEqual([first, idless]);
    expect(result.count).toBe(2);
    expect(result.removed).toBe(1);
  });

  it('keeps repeated id-less channels', () => {
    const result = dedupeChannels([channel('', 'A'), channel('', 'A')]);

    expect(result.channels).toHaveLength(2);
    expect(result.removed).toBe(0);
  });

  it('is stable and idempotent', () => {
    const channels = [
      channel('c', 'C'),
      channel('a', 'A'),
      channel('c', 'C2'),
      channel('b', 'B'),
      channel('a', 'A2'),
    ];

    const once = dedupeChannels(channels).channels;

    expect(once.map((c) => c.displayName)).toEqual(['C', 'A', 'B']);
    expect(dedupeChannels(once).channels).toEqual(once);
  });
});
