import type { StoreConfig } from '@/lib/config';
import type { Logger } from '@/lib/logger';
import { JsonFileStore } from './json-file-store';
import { RedisStore } from './redis-store';
import type { RecordStore } from './record-store';

export { ARTIFACTS, type Artifact, type RecordStore } from './record-store';
export { JsonFileStore } from './json-file-store';
export { MemoryStore, type MemoryStoreContents } from './memory-store';
export { RedisStore, type RedisStoreOptions } from './redis-store';
export {
  RecordFormatError,
  decodeChannels,
  decodeEndpointDocument,
  decodeGuides,
  encodeChannels,
  encodeDeadLinks,
  encodeEndpointDocument,
  encodeGuides,
} from './records';

/**
 * Create the record store selected by configuration
 */
export function createRecordStore(config: StoreConfig, logger?: Logger): RecordStore {
  if (config.driver === 'redis') {
    return new RedisStore({ redisUrl: config.redisUrl, keyPrefix: config.redisKeyPrefix, logger });
  }
  return new JsonFileStore(config.dataDir);
}
