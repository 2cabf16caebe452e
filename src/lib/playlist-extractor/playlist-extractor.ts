/**
 * Playlist Extractor
 *
 * Downloads every playlist URL and parses it into channel records.
 * A failing URL is logged and skipped; the others still contribute.
 */

import type { ChannelRecord } from '@/types';
import type { HttpClient } from '@/lib/http';
import { errorMessage } from '@/lib/errors';
import { mapWithConcurrency } from '@/lib/concurrency';
import { createLogger, type Logger } from '@/lib/logger';
import { parsePlaylist } from './m3u-parser';

export interface PlaylistExtractorOptions {
  concurrency: number;
}

export interface PlaylistExtractorDeps {
  http: Pick<HttpClient, 'fetchText'>;
  logger?: Logger;
}

export interface PlaylistExtraction {
  channels: ChannelRecord[];
  /** URLs that could not be fetched */
  failedUrls: string[];
}

/**
 * Fetch and parse every playlist. Output follows URL order, then line order.
 */
export async function extractPlaylists(
  urls: readonly string[],
  options: PlaylistExtractorOptions,
  deps: PlaylistExtractorDeps
): Promise<PlaylistExtraction> {
  const log = deps.logger ?? createLogger('PlaylistExtractor');

  const perUrl = await mapWithConcurrency(urls, options.concurrency, async (url) => {
    log.info(`[M3U] Fetching playlist: ${url}`);

    let content: string;
    try {
      content = await deps.http.fetchText(url);
    } catch (error) {
      log.warn(`[M3U ERROR] Failed to fetch ${url}: ${errorMessage(error)}`);
      return null;
    }

    const channels = parsePlaylist(content, url);
    for (const channel of channels) {
      log.debug(`[M3U] Parsed channel: ${channel.displayName || channel.id} from ${url}`);
    }
    log.info(`[M3U] Parsed ${channels.length} channels from ${url}`);
    return channels;
  });

  const channels: ChannelRecord[] = [];
  const failedUrls: string[] = [];

  perUrl.forEach((result, index) => {
    if (result === null) {
      failedUrls.push(urls[index]);
    } else {
      channels.push(...result);
    }
  });

  const fetched = urls.length - failedUrls.length;
  log.info(`[M3U] Extracted ${channels.length} channels from ${fetched}/${urls.length} playlists`);

  return { channels, failedUrls };
}
