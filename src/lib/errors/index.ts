/**
 * Errors Module
 */

export {
  PipelineError,
  LoadError,
  SaveError,
  ParseError,
  NetworkError,
  classifyNetworkError,
  describeError,
  errorMessage,
} from './errors';
