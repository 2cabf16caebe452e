/**
 * Pipeline Configuration
 *
 * Typed configuration passed explicitly into every pipeline operation.
 * Values come from environment variables with defaults.
 *
 * Environment variables:
 *   - DATA_DIR: directory of the JSON file store (default ./data)
 *   - STORE_DRIVER: "file" or "redis" (default file)
 *   - REDIS_URL / REDIS_KEY_PREFIX: Redis store connection
 *   - LIVENESS_TIMEOUT_MS, FETCH_TIMEOUT_MS: per-request timeouts
 *   - RETRY_BASE_DELAY_MS, MAX_ATTEMPTS: liveness retry policy
 *   - CONCURRENCY: per-stage worker pool size
 *   - MATCH_THRESHOLD: reconciliation similarity cutoff in [0, 1]
 *   - MIRROR_MAP: JSON object of domain substring -> replacement
 *   - USER_AGENT: User-Agent header for all requests
 */

import { resolve } from 'node:path';
import { DEFAULT_MIRROR_TABLE, type MirrorTable } from '@/lib/mirror';

export type StoreDriver = 'file' | 'redis';

export interface FetchConfig {
  userAgent: string;
  /** Timeout for a single liveness check (ms) */
  livenessTimeoutMs: number;
  /** Timeout for a content fetch (ms) */
  fetchTimeoutMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  /** Backoff before attempt n+1 is baseDelayMs * 2^(n-1) */
  baseDelayMs: number;
}

export interface StoreConfig {
  driver: StoreDriver;
  dataDir: string;
  redisUrl: string;
  redisKeyPrefix: string;
}

export interface PipelineConfig {
  fetch: FetchConfig;
  retry: RetryConfig;
  store: StoreConfig;
  concurrency: number;
  matchThreshold: number;
  mirrors: MirrorTable;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; IPTV-Guide-Pipeline/1.0)';

export const DEFAULT_CONFIG: PipelineConfig = {
  fetch: {
    userAgent: DEFAULT_USER_AGENT,
    livenessTimeoutMs: 10_000,
    fetchTimeoutMs: 15_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
  },
  store: {
    driver: 'file',
    dataDir: './data',
    redisUrl: 'redis://localhost:6379',
    redisKeyPrefix: 'iptv:pipeline:',
  },
  concurrency: 5,
  matchThreshold: 0.85,
  mirrors: DEFAULT_MIRROR_TABLE,
};

type Env = Record<string, string | undefined>;

/**
 * Error for invalid configuration values
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readThreshold(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${name} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

function readDriver(env: Env): StoreDriver {
  const raw = env.STORE_DRIVER?.trim().toLowerCase();
  if (!raw) return DEFAULT_CONFIG.store.driver;
  if (raw === 'file' || raw === 'redis') return raw;
  throw new ConfigError(`STORE_DRIVER must be "file" or "redis", got "${raw}"`);
}

/**
 * Parse MIRROR_MAP, a JSON object whose key order is the lookup order
 */
export function parseMirrorTable(raw: string | undefined): MirrorTable {
  if (!raw?.trim()) return DEFAULT_MIRROR_TABLE;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError('MIRROR_MAP must be valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('MIRROR_MAP must be a JSON object');
  }

  const table: Array<readonly [string, string]> = [];
  for (const [domain, replacement] of Object.entries(parsed)) {
    if (typeof replacement !== 'string' || !domain) {
      throw new ConfigError(`MIRROR_MAP entry "${domain}" must map to a string`);
    }
    table.push([domain, replacement]);
  }
  return table;
}

/**
 * Build the pipeline configuration from environment variables
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  return {
    fetch: {
      userAgent: env.USER_AGENT?.trim() || DEFAULT_CONFIG.fetch.userAgent,
      livenessTimeoutMs: readInteger(
        env,
        'LIVENESS_TIMEOUT_MS',
        DEFAULT_CONFIG.fetch.livenessTimeoutMs,
        1
      ),
      fetchTimeoutMs: readInteger(env, 'FETCH_TIMEOUT_MS', DEFAULT_CONFIG.fetch.fetchTimeoutMs, 1),
    },
    retry: {
      maxAttempts: readInteger(env, 'MAX_ATTEMPTS', DEFAULT_CONFIG.retry.maxAttempts, 1),
      baseDelayMs: readInteger(env, 'RETRY_BASE_DELAY_MS', DEFAULT_CONFIG.retry.baseDelayMs, 0),
    },
    store: {
      driver: readDriver(env),
      dataDir: resolve(env.DATA_DIR?.trim() || DEFAULT_CONFIG.store.dataDir),
      redisUrl: env.REDIS_URL?.trim() || DEFAULT_CONFIG.store.redisUrl,
      redisKeyPrefix: env.REDIS_KEY_PREFIX?.trim() || DEFAULT_CONFIG.store.redisKeyPrefix,
    },
    concurrency: readInteger(env, 'CONCURRENCY', DEFAULT_CONFIG.concurrency, 1),
    matchThreshold: readThreshold(env, 'MATCH_THRESHOLD', DEFAULT_CONFIG.matchThreshold),
    mirrors: parseMirrorTable(env.MIRROR_MAP),
  };
}
