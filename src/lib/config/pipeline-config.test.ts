/**
 * Pipeline Config Tests
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
  ConfigError,
  DEFAULT_CONFIG,
  loadPipelineConfig,
  parseMirrorTable,
} from './pipeline-config';
import { DEFAULT_MIRROR_TABLE } from '@/lib/mirror';

describe('Pipeline Config', () => {
  describe('defaults', () => {
    it('retries three times with a one second base delay', () => {
      expect(DEFAULT_CONFIG.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000 });
    });

    it('matches at 0.85 similarity', () => {
      expect(DEFAULT_CONFIG.matchThreshold).toBe(0.85);
    });

    it('uses the file store', () => {
      expect(DEFAULT_CONFIG.store.driver).toBe('file');
    });
  });

  describe('loadPipelineConfig', () => {
    it('returns defaults for an empty environment', () => {
      const config = loadPipelineConfig({});

      expect(config.fetch).toEqual(DEFAULT_CONFIG.fetch);
      expect(config.retry).toEqual(DEFAULT_CONFIG.retry);
      expect(config.concurrency).toBe(5);
      expect(config.store.dataDir).toBe(resolve('./data'));
      expect(config.mirrors).toBe(DEFAULT_MIRROR_TABLE);
    });

    it('reads overrides', () => {
      const config = loadPipelineConfig({
        DATA_DIR: '/tmp/iptv',
        STORE_DRIVER: 'Redis',
        REDIS_URL: 'redis://cache:6379',
        REDIS_KEY_PREFIX: 'test:',
        LIVENESS_TIMEOUT_MS: '2000',
        FETCH_TIMEOUT_MS: '3000',
        RETRY_BASE_DELAY_MS: '0',
        MAX_ATTEMPTS: '5',
        CONCURRENCY: '2',
        MATCH_THRESHOLD: '0.6',
        USER_AGENT: 'test-agent',
      });

      expect(config).toEqual({
        fetch: { userAgent: 'test-agent', livenessTimeoutMs: 2000, fetchTimeoutMs: 3000 },
        retry: { maxAttempts: 5, baseDelayMs: 0 },
        store: {
          driver: 'redis',
          dataDir: '/tmp/iptv',
          redisUrl: 'redis://cache:6379',
          redisKeyPrefix: 'test:',
        },
        concurrency: 2,
        matchThreshold: 0.6,
        mirrors: DEFAULT_MIRROR_TABLE,
      });
    });

    it('rejects non-integer timeouts', () => {
      expect(() => loadPipelineConfig({ FETCH_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    });

    it('rejects a zero worker pool', () => {
      expect(() => loadPipelineConfig({ CONCURRENCY: '0' })).toThrow(
        'CONCURRENCY must be an integer >= 1, got "0"'
      );
    });

    it('rejects thresholds outside [0, 1]', () => {
      expect(() => loadPipelineConfig({ MATCH_THRESHOLD: '1.5' })).toThrow(ConfigError);
    });

    it('rejects unknown store drivers', () => {
      expect(() => loadPipelineConfig({ STORE_DRIVER: 'sqlite' })).toThrow(
        'STORE_DRIVER must be "file" or "redis", got "sqlite"'
      );
    });
  });

  describe('parseMirrorTable', () => {
    it('keeps key order', () => {
      expect(parseMirrorTable('{"b.example":"b.mirror","a.example":"a.mirror"}')).toEqual([
        ['b.example', 'b.mirror'],
        ['a.example', 'a.mirror'],
      ]);
    });

    it('rejects invalid JSON', () => {
      expect(() => parseMirrorTable('{')).toThrow('MIRROR_MAP must be valid JSON');
    });

    it('rejects arrays', () => {
      expect(() => parseMirrorTable('[]')).toThrow('MIRROR_MAP must be a JSON object');
    });

    it('rejects non-string replacements', () => {
      expect(() => parseMirrorTable('{"a.example":1}')).toThrow(ConfigError);
    });
  });
});
