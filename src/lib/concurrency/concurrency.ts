/**
 * Concurrency helpers
 *
 * Bounded worker pool for per-URL stage work, and the clock abstraction
 * that lets retry delays be replaced in tests.
 */

/**
 * Time source and suspension point used by retrying operations
 */
export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep,
};

/**
 * Map items through an async task with at most `concurrency` tasks in flight.
 * Results keep the input order. A rejected task rejects the whole map, so
 * tasks are expected to contain their own failures.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await task(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Remove repeated values, keeping first appearance order
 */
export function uniqueInOrder(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
