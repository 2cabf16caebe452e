export {
  backoffDelay,
  runWithRetry,
  type AttemptOutcome,
  type RetryPolicy,
  type RetryState,
} from './retry';
