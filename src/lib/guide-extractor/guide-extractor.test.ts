/**
 * Guide Extractor Tests
 */

import { Readable } from 'node:stream';
import { gzipSync } from 'node:zlib';
import { describe, it, expect, vi } from 'vitest';
import type { StreamResponse } from '@/lib/http';
import { extractGuides, isGzipped } from './guide-extractor';

const guide = (id: string, name: string) =>
  `<tv><channel id="${id}"><display-name>${name}</display-name></channel></tv>`;

const GUIDES: Record<string, () => StreamResponse> = {
  'http://g.example/a.xml': () => ({
    stream: Readable.from(guide('a1', 'Alpha')),
    contentType: 'application/xml',
  }),
  'http://g.example/b.xml.gz': () => ({
    stream: Readable.from(gzipSync(guide('b1', 'Beta'))),
    contentType: 'application/octet-stream',
  }),
  'http://g.example/c': () => ({
    stream: Readable.from(gzipSync(guide('c1', 'Gamma'))),
    contentType: 'application/gzip',
  }),
  'http://g.example/empty.xml': () => ({
    stream: Readable.from('<tv></tv>'),
    contentType: 'text/xml',
  }),
  'http://g.example/broken.xml': () => ({
    stream: Readable.from('<tv><channel id="x"></tv>'),
    contentType: 'text/xml',
  }),
  'http://g.example/blank.xml': () => ({
    stream: Readable.from('   \n'),
    contentType: 'text/xml',
  }),
  'http://g.example/zero.xml': () => ({
    stream: Readable.from(Buffer.alloc(0)),
    contentType: 'text/xml',
  }),
};

function fakeHttp() {
  return {
    fetchStream: vi.fn(async (url: string) => {
      const respond = GUIDES[url];
      if (!respond) {
        throw new Error('Request timeout after 15000ms');
      }
      return respond();
    }),
  };
}

describe('extractGuides', () => {
  it('groups entries per URL in URL order', async () => {
    const urls = ['http://g.example/c', 'http://g.example/a.xml', 'http://g.example/b.xml.gz'];

    const result = await extractGuides(urls, { concurrency: 3 }, { http: fakeHttp() });

    expect([...result.groups.keys()]).toEqual(urls);
    expect(result.groups.get('http://g.example/b.xml.gz')).toEqual([
      {
        id: 'b1',
        displayName: 'Beta',
        sourceGuideUrl: 'http://g.example/b.xml.gz',
        language: 'unknown',
      },
    ]);
    expect(result.groups.get('http://g.example/c')?.[0].displayName).toBe('Gamma');
    expect(result.failedUrls).toEqual([]);
  });

  it('leaves failed URLs out of the groups', async () => {
    const urls = [
      'http://g.example/down.xml',
      'http://g.example/broken.xml',
      'http://g.example/empty.xml',
    ];

    const result = await extractGuides(urls, { concurrency: 2 }, { http: fakeHttp() });

    expect([...result.groups.entries()]).toEqual([['http://g.example/empty.xml', []]]);
    expect(result.failedUrls).toEqual(['http://g.example/down.xml', 'http://g.example/broken.xml']);
  });

  it('treats empty and whitespace-only documents as failures, not empty groups', async () => {
    const urls = ['http://g.example/blank.xml', 'http://g.example/zero.xml', 'http://g.example/a.xml'];

    const result = await extractGuides(urls, { concurrency: 3 }, { http: fakeHttp() });

    expect(result.groups.has('http://g.example/blank.xml')).toBe(false);
    expect(result.groups.has('http://g.example/zero.xml')).toBe(false);
    expect([...result.groups.keys()]).toEqual(['http://g.example/a.xml']);
    expect(result.failedUrls).toEqual(['http://g.example/blank.xml', 'http://g.example/zero.xml']);
  });

  it('fetches a repeated URL once', async () => {
    const http = fakeHttp();

    const result = await extractGuides(
      ['http://g.example/a.xml', 'http://g.example/a.xml'],
      { concurrency: 2 },
      { http }
    );

    expect(http.fetchStream).toHaveBeenCalledTimes(1);
    expect(result.groups.size).toBe(1);
  });
});

describe('isGzipped', () => {
  it('detects gzip by extension or content type', () => {
    expect(isGzipped('http://g.example/guide.xml.gz', 'application/octet-stream')).toBe(true);
    expect(isGzipped('http://g.example/guide.XML.GZ?token=1', '')).toBe(true);
    expect(isGzipped('http://g.example/guide', 'application/x-gzip')).toBe(true);
    expect(isGzipped('http://g.example/guide.xml', 'text/xml')).toBe(false);
  });
});
