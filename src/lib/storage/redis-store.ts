/**
 * Redis Store
 *
 * One JSON-encoded string key per artifact under a key prefix. The
 * connection opens with the first command and stays open until close().
 */

import Redis from 'ioredis';
import type { ChannelRecord, DeadLinks, EndpointDocument, GuideGroups } from '@/types';
import { LoadError, SaveError, errorMessage } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import {
  decodeChannels,
  decodeEndpointDocument,
  decodeGuides,
  encodeChannels,
  encodeDeadLinks,
  encodeEndpointDocument,
  encodeGuides,
} from './records';
import { ARTIFACTS, type Artifact, type RecordStore } from './record-store';

export interface RedisStoreOptions {
  redisUrl: string;
  keyPrefix: string;
  logger?: Logger;
}

export class RedisStore implements RecordStore {
  private redis: Redis;
  private readonly keyPrefix: string;
  private readonly log: Logger;

  constructor(options: RedisStoreOptions) {
    this.keyPrefix = options.keyPrefix;
    this.log = options.logger ?? createLogger('RedisStore');

    this.redis = new Redis(options.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 5) {
          this.log.error('Redis connection failed after 5 retries');
          return null;
        }
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });

    this.redis.on('connect', () => {
      this.log.debug('Connected to Redis');
    });

    this.redis.on('error', (err) => {
      this.log.error('Redis error', err);
    });
  }

  /**
   * Redis key of an artifact
   */
  keyOf(artifact: Artifact): string {
    return `${this.keyPrefix}${artifact}`;
  }

  private async read<T>(artifact: Artifact, decode: (value: unknown) => T): Promise<T> {
    const key = this.keyOf(artifact);

    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (error) {
      throw new LoadError(artifact, `cannot read ${key}: ${errorMessage(error)}`, { cause: error });
    }

    if (raw === null) {
      throw new LoadError(artifact, `key ${key} does not exist`);
    }

    try {
      return decode(JSON.parse(raw));
    } catch (error) {
      throw new LoadError(artifact, `invalid data in ${key}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async write(artifact: Artifact, value: unknown): Promise<void> {
    const key = this.keyOf(artifact);
    try {
      await this.redis.set(key, JSON.stringify(value));
    } catch (error) {
      throw new SaveError(artifact, `cannot write ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  loadEndpoints(): Promise<EndpointDocument> {
    return this.read(ARTIFACTS.endpoints, decodeEndpointDocument);
  }

  saveEndpoints(document: EndpointDocument): Promise<void> {
    return this.write(ARTIFACTS.endpoints, encodeEndpointDocument(document));
  }

  saveDeadLinks(deadLinks: DeadLinks): Promise<void> {
    return this.write(ARTIFACTS.deadLinks, encodeDeadLinks(deadLinks));
  }

  loadChannels(): Promise<ChannelRecord[]> {
    return this.read(ARTIFACTS.channels, decodeChannels);
  }

  saveChannels(channels: readonly ChannelRecord[]): Promise<void> {
    return this.write(ARTIFACTS.channels, encodeChannels(channels));
  }

  loadGuides(): Promise<GuideGroups> {
    return this.read(ARTIFACTS.guides, decodeGuides);
  }

  saveGuides(groups: GuideGroups): Promise<void> {
    return this.write(ARTIFACTS.guides, encodeGuides(groups));
  }

  /**
   * Close the Redis connection
   */
  async close(): Promise<void> {
    if (this.redis.status === 'wait') {
      // Never connected
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
  }
}
