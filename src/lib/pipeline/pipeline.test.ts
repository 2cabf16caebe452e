/**
 * Pipeline Runner Tests
 */

import { Readable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import type { EndpointDocument } from '@/types';
import { DEFAULT_CONFIG, type PipelineConfig } from '@/lib/config';
import type { HttpClient } from '@/lib/http';
import { MemoryStore } from '@/lib/storage';
import { LoadError, SaveError } from '@/lib/errors';
import {
  runAudit,
  runDedupe,
  runFullPipeline,
  runGuideExtraction,
  runPlaylistExtraction,
  runReconciliation,
  runValidation,
} from './pipeline';

const PLAYLIST = 'http://lists.example/uk.m3u';
const GUIDE = 'http://guide.example/uk.xml';
const DEAD = 'https://iptv-org.github.io/iptv/gone.m3u';

const config: PipelineConfig = { ...DEFAULT_CONFIG, matchThreshold: 0.5 };

function fakeHttp(): HttpClient {
  return {
    checkLiveness: vi.fn(async (url: string) => {
      if (url === DEAD) throw new Error('getaddrinfo ENOTFOUND iptv-org.github.io');
      return { statusCode: 200, ok: true, responseTimeMs: 10 };
    }),
    fetchText: vi.fn(async () =>
      [
        '#EXTM3U',
        '#EXTINF:-1 tvg-id="bbc1" tvg-name="BBC One" group-title="UK",BBC One',
        'http://x/bbc1.m3u8',
        '#EXTINF:-1 tvg-id="bbc1" tvg-name="BBC One Backup" group-title="UK",BBC One',
        'http://x/bbc1-backup.m3u8',
      ].join('\n')
    ),
    fetchStream: vi.fn(async () => ({
      stream: Readable.from(
        '<tv><channel id="bbc1.uk"><display-name>BBC One HD</display-name></channel></tv>'
      ),
      contentType: 'application/xml',
    })),
  };
}

function endpoints(playlistUrls: string[], epgUrls: string[]): EndpointDocument {
  return { playlistUrls, epgUrls, statusHistory: {}, lastStatus: {}, mirrorSuggestions: {} };
}

const clock = { now: () => new Date('2026-01-01T00:00:00.000Z'), sleep: async () => {} };

describe('pipeline stages', () => {
  it('returns a failed result on a missing input store', async () => {
    const store = new MemoryStore();

    const result = await runValidation(config, { store, http: fakeHttp(), clock });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(LoadError);
      expect(result.error.resource).toBe('playlist_epg_urls');
    }
    expect(store.contents.deadLinks).toBeUndefined();
  });

  it('persists the validated document and dead links', async () => {
    const store = new MemoryStore();
    store.contents.endpoints = endpoints([PLAYLIST, DEAD], [GUIDE]);

    const result = await runValidation(config, { store, http: fakeHttp(), clock });

    expect(result.success && result.saved).toBe(true);
    expect(Object.keys(store.contents.deadLinks ?? {})).toEqual([DEAD]);
    expect(store.contents.endpoints?.mirrorSuggestions).toEqual({
      [DEAD]: 'https://raw.githubusercontent.com/iptv-org/iptv/gone.m3u',
    });
    expect(store.contents.endpoints?.statusHistory[DEAD]).toHaveLength(config.retry.maxAttempts);
  });

  it('reports a failed save but still returns the data', async () => {
    const store = new MemoryStore();
    store.contents.endpoints = endpoints([PLAYLIST], []);
    vi.spyOn(store, 'saveChannels').mockRejectedValue(new SaveError('channels_metadata', 'disk full'));

    const result = await runPlaylistExtraction(config, { store, http: fakeHttp() });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.saved).toBe(false);
      expect(result.data.channels).toHaveLength(2);
    }
    expect(store.contents.channels).toBeUndefined();
  });

  it('extracts guides into the guide store', async () => {
    const store = new MemoryStore();
    store.contents.endpoints = endpoints([], [GUIDE]);

    const result = await runGuideExtraction(config, { store, http: fakeHttp() });

    expect(result.success).toBe(true);
    expect([...(store.contents.guides?.keys() ?? [])]).toEqual([GUIDE]);
  });

  it('reconciles stored channels against stored guides', async () => {
    const store = new MemoryStore();
    store.contents.channels = [
      {
        id: 'bbc1',
        displayName: 'BBC One',
        logoUrl: '',
        group: 'UK',
        language: 'Unknown',
        streamUrl: 'http://x/bbc1.m3u8',
        sourceUrl: PLAYLIST,
      },
    ];
    store.contents.guides = new Map([
      [GUIDE, [{ id: 'bbc1.uk', displayName: 'BBC One HD', sourceGuideUrl: GUIDE, language: 'unknown' }]],
    ]);

    const result = await runReconciliation(config, { store, http: fakeHttp() });

    expect(result.success && result.data.matched).toBe(1);
    expect(store.contents.channels?.[0].matchedGuideId).toBe('BBC One HD');
  });

  it('fails reconciliation when the guide store is missing', async () => {
    const store = new MemoryStore();
    store.contents.channels = [];

    const result = await runReconciliation(config, { store, http: fakeHttp() });

    expect(result.success).toBe(false);
  });

  it('audits stored guides without writing', async () => {
    const store = new MemoryStore();
    store.contents.guides = new Map([[GUIDE, []]]);
    const saveGuides = vi.spyOn(store, 'saveGuides');

    const result = await runAudit(config, { store, http: fakeHttp() });

    expect(result.success && result.data.emptySources).toEqual([GUIDE]);
    expect(saveGuides).not.toHaveBeenCalled();
  });

  it('dedupes the channel store', async () => {
    const store = new MemoryStore();
    store.contents.endpoints = endpoints([PLAYLIST], []);
    await runPlaylistExtraction(config, { store, http: fakeHttp() });

    const result = await runDedupe(config, { store, http: fakeHttp() });

    expect(result.success && result.data.count).toBe(1);
    expect(store.contents.channels?.map((c) => c.displayName)).toEqual(['BBC One']);
  });
});

describe('runFullPipeline', () => {
  it('validates, extracts and reconciles', async () => {
    const store = new MemoryStore();
    store.contents.endpoints = endpoints([PLAYLIST], [GUIDE]);

    const result = await runFullPipeline(config, { store, http: fakeHttp(), clock });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.saved).toBe(true);
      expect(result.data.validation.summary).toEqual({ checked: 2, alive: 2, dead: 0, errors: {} });
      expect(result.data.reconciliation.matched).toBe(2);
    }
    expect(store.contents.channels?.map((c) => c.matchedGuideId)).toEqual(['BBC One HD', 'BBC One HD']);
  });

  it('stops when the endpoint store is missing', async () => {
    const http = fakeHttp();

    const result = await runFullPipeline(config, { store: new MemoryStore(), http, clock });

    expect(result.success).toBe(false);
    expect(http.fetchText).not.toHaveBeenCalled();
  });
});
