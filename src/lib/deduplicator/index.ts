export { dedupeChannels, type DedupeResult } from './deduplicator';
