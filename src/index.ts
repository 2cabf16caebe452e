/**
 * IPTV Guide Pipeline
 *
 * Validates playlist and XMLTV guide endpoints, extracts channel and guide
 * records, and reconciles channels with guide entries by name similarity.
 */

export * from './types';
export * from './lib/logger';
export * from './lib/errors';
export * from './lib/config';
export * from './lib/mirror';
export * from './lib/http';
export * from './lib/concurrency';
export * from './lib/retry';
export * from './lib/endpoint-validator';
export * from './lib/playlist-extractor';
export * from './lib/guide-extractor';
export * from './lib/reconciler';
export * from './lib/integrity-auditor';
export * from './lib/deduplicator';
export * from './lib/channel-query';
export * from './lib/storage';
export * from './lib/pipeline';
