/**
 * Guide Extractor
 *
 * Downloads XMLTV guides and groups their channel entries by source URL.
 * Guides may be gzipped; a URL that fails to download or parse is absent
 * from the result rather than mapped to an empty group.
 */

import { createGunzip } from 'node:zlib';
import type { Readable } from 'node:stream';
import type { GuideGroups } from '@/types';
import type { HttpClient } from '@/lib/http';
import { errorMessage } from '@/lib/errors';
import { mapWithConcurrency, uniqueInOrder } from '@/lib/concurrency';
import { createLogger, type Logger } from '@/lib/logger';
import { parseGuideChannels, type GuideParseResult } from './xmltv-parser';

export interface GuideExtractorOptions {
  concurrency: number;
}

export interface GuideExtractorDeps {
  http: Pick<HttpClient, 'fetchStream'>;
  logger?: Logger;
}

export interface GuideExtraction {
  groups: GuideGroups;
  /** URLs that could not be fetched or parsed */
  failedUrls: string[];
}

/**
 * Whether a guide should be gunzipped before parsing
 */
export function isGzipped(url: string, contentType: string): boolean {
  const path = url.split(/[?#]/)[0].toLowerCase();
  return path.endsWith('.gz') || contentType.toLowerCase().includes('gzip');
}

async function fetchGuide(
  url: string,
  http: GuideExtractorDeps['http'],
  log: Logger
): Promise<GuideParseResult> {
  const response = await http.fetchStream(url);
  let source: Readable = response.stream;

  if (isGzipped(url, response.contentType)) {
    log.debug(`[EPG] Decompressing gzipped guide: ${url}`);
    const gunzip = createGunzip();
    response.stream.on('error', (error) => gunzip.destroy(error));
    response.stream.pipe(gunzip);
    source = gunzip;
  }

  try {
    return await parseGuideChannels(source, url);
  } finally {
    response.stream.destroy();
  }
}

/**
 * Fetch and parse every guide. The group mapping keeps URL order.
 */
export async function extractGuides(
  urls: readonly string[],
  options: GuideExtractorOptions,
  deps: GuideExtractorDeps
): Promise<GuideExtraction> {
  const log = deps.logger ?? createLogger('GuideExtractor');
  const uniqueUrls = uniqueInOrder(urls);

  const perUrl = await mapWithConcurrency(uniqueUrls, options.concurrency, async (url) => {
    log.info(`[EPG] Fetching guide: ${url}`);

    try {
      const result = await fetchGuide(url, deps.http, log);
      if (result.skipped > 0) {
        log.warn(`[EPG] Skipped ${result.skipped} channels without id or display-name in ${url}`);
      }
      for (const entry of result.entries) {
        log.debug(`[EPG] Parsed guide entry: ${entry.displayName || entry.id}`);
      }
      log.info(`[EPG] Parsed ${result.entries.length} channels from ${url}`);
      return result;
    } catch (error) {
      log.warn(`[EPG ERROR] Failed to parse ${url}: ${errorMessage(error)}`);
      return null;
    }
  });

  const groups: GuideGroups = new Map();
  const failedUrls: string[] = [];

  perUrl.forEach((result, index) => {
    const url = uniqueUrls[index];
    if (result === null) {
      failedUrls.push(url);
    } else {
      groups.set(url, result.entries);
    }
  });

  log.info(`[EPG] Extracted ${groups.size}/${uniqueUrls.length} guides`);

  return { groups, failedUrls };
}
