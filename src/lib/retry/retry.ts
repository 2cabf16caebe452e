/**
 * Bounded Retry
 *
 * Explicit retry state machine: attempting(n) -> success | exhausted.
 * The backoff between attempts is a suspension on the injected clock, so
 * one retrying task never blocks another and tests need no real delays.
 */

import type { Clock } from '@/lib/concurrency';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; value: T };

export type RetryState<T> =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'success'; attempt: number; value: T }
  | { kind: 'exhausted'; attempts: number; last: T };

/**
 * Backoff applied before the attempt at `attemptIndex` (0-based).
 * There is no delay before the first attempt.
 */
export function backoffDelay(policy: RetryPolicy, attemptIndex: number): number {
  if (attemptIndex <= 0) return 0;
  return policy.baseDelayMs * 2 ** (attemptIndex - 1);
}

/**
 * Run `attempt` until it reports ok or the policy's attempts are used up.
 * `attempt` is expected to contain its own failures and report them as
 * `{ ok: false }`.
 */
export async function runWithRetry<T>(
  policy: RetryPolicy,
  clock: Pick<Clock, 'sleep'>,
  attempt: (attemptIndex: number) => Promise<AttemptOutcome<T>>,
  onTransition?: (state: RetryState<T>) => void
): Promise<Exclude<RetryState<T>, { kind: 'attempting' }>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let state: RetryState<T> = { kind: 'attempting', attempt: 1 };

  while (state.kind === 'attempting') {
    const attemptIndex = state.attempt - 1;
    onTransition?.(state);

    const delay = backoffDelay(policy, attemptIndex);
    if (delay > 0) {
      await clock.sleep(delay);
    }

    const outcome = await attempt(attemptIndex);

    if (outcome.ok) {
      state = { kind: 'success', attempt: state.attempt, value: outcome.value };
    } else if (state.attempt >= maxAttempts) {
      state = { kind: 'exhausted', attempts: state.attempt, last: outcome.value };
    } else {
      state = { kind: 'attempting', attempt: state.attempt + 1 };
    }
  }

  onTransition?.(state);
  return state;
}
