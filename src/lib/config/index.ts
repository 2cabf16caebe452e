/**
 * Configuration Module
 *
 * Exports the pipeline configuration loader and defaults.
 */

export {
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_USER_AGENT,
  loadPipelineConfig,
  parseMirrorTable,
  type FetchConfig,
  type PipelineConfig,
  type RetryConfig,
  type StoreConfig,
  type StoreDriver,
} from './pipeline-config';
