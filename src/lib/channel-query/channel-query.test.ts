/**
 * Channel Query Tests
 */

import { describe, it, expect } from 'vitest';
import type { ChannelRecord } from '@/types';
import {
  compareChannels,
  filterChannels,
  findChannel,
  searchChannels,
  summarizeChannels,
} from './channel-query';

function channel(id: string, displayName: string, overrides: Partial<ChannelRecord> = {}): ChannelRecord {
  return {
    id,
    displayName,
    logoUrl: '',
    group: 'UK',
    language: 'Unknown',
    streamUrl: `http://stream.example/${id}`,
    sourceUrl: 'http://lists.example/all.m3u',
    ...overrides,
  };
}

const channels = [
  channel('bbc1.uk', 'BBC One', { matchedGuideId: 'BBC One HD' }),
  channel('cnn.us', 'CNN International', { group: 'News', language: 'English' }),
  channel('tf1.fr', 'TF1', { group: 'France;News', language: 'French' }),
  channel('', 'Local Access', { group: '' }),
];

describe('searchChannels', () => {
  it('matches display names case-insensitively', () => {
    expect(searchChannels(channels, 'bbc').map((c) => c.displayName)).toEqual(['BBC One']);
  });

  it('matches ids', () => {
    expect(searchChannels(channels, '.fr').map((c) => c.id)).toEqual(['tf1.fr']);
  });

  it('returns every channel for a blank query', () => {
    expect(searchChannels(channels, '   ')).toEqual(channels);
  });
});

describe('filterChannels', () => {
  it('filters by group substring', () => {
    expect(filterChannels(channels, { group: 'news' }).map((c) => c.id)).toEqual([
      'cnn.us',
      'tf1.fr',
    ]);
  });

  it('combines group and language', () => {
    expect(filterChannels(channels, { group: 'news', language: 'FRENCH' }).map((c) => c.id)).toEqual([
      'tf1.fr',
    ]);
  });

  it('matches everything with blank criteria', () => {
    expect(filterChannels(channels, { group: '', language: ' ' })).toHaveLength(4);
  });
});

describe('findChannel', () => {
  it('returns the first match or null', () => {
    expect(findChannel(channels, 'n')?.id).toBe('bbc1.uk');
    expect(findChannel(channels, 'nothing like this')).toBeNull();
  });
});

describe('compareChannels', () => {
  it('lists differing fields with both values', () => {
    const left = channel('bbc1.uk', 'BBC One', { matchedGuideId: 'BBC One HD' });
    const right = channel('bbc1.uk', 'BBC One', { group: 'Entertainment' });

    expect(compareChannels(left, right)).toEqual([
      { field: 'group', left: 'UK', right: 'Entertainment' },
      { field: 'matchedGuideId', left: 'BBC One HD', right: undefined },
    ]);
  });

  it('returns nothing for equal channels', () => {
    expect(compareChannels(channels[1], { ...channels[1] })).toEqual([]);
  });
});

describe('summarizeChannels', () => {
  it('counts matches, groups and languages', () => {
    expect(summarizeChannels(channels)).toEqual({
      total: 4,
      matched: 1,
      byGroup: { UK: 1, News: 1, 'France;News': 1, Unknown: 1 },
      byLanguage: { Unknown: 2, English: 1, French: 1 },
    });
  });
});
