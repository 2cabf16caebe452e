/**
 * Logger Module
 *
 * Centralized logging for the pipeline.
 */

export {
  Logger,
  createLogger,
  formatError,
  generateRunId,
  logger,
  shouldLog,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';
