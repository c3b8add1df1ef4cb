/**
 * Concurrency helpers for the refresh pipeline
 */

import { OperationTimeoutError } from './errors.js';

/**
 * Race a promise against a timer. The timer is always cleared, and the
 * rejection is built lazily so callers can raise their own error type.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error = () => new OperationTimeoutError('operation', timeoutMs)
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep input order; a rejected call rejects the whole run, so workers
 * that must not fail the batch should return a result type instead of throwing.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await worker(item, index);
    }
  });

  await Promise.all(runners);
  return results;
}
