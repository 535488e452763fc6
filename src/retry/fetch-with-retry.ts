import type { RetryPolicy } from './retry-policy.js';
import { parseDuration } from '../cache/duration-utils.js';
import { toError } from '../paginator/paginator-errors.js';

/**
 * Waits the given number of milliseconds.
 */
export type WaitFn = (ms: number) => Promise<void>;

export const sleep: WaitFn = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface FetchWithRetryOptions {
  /** Called before every retry with its number (1 for the first retry) */
  onRetry?: (attempt: number) => void;
  /** Backoff wait; defaults to a timer */
  wait?: WaitFn;
}

/**
 * Runs `attempt`, retrying failures with exponential backoff.
 *
 * The first call happens immediately. After a failure the call is repeated
 * while `attempt + 1 < maxAttempts` and `retryIf` (when set) accepts the
 * error, waiting `initialDelay`, then twice that, and so on up to `maxDelay`.
 * Once the budget is spent or the predicate refuses, the last error is
 * rethrown as it was thrown.
 *
 * @example
 * ```ts
 * const page = await fetchWithRetry(
 *   () => source.fetch(query),
 *   exponentialRetryPolicy({ maxAttempts: 3, initialDelay: '1s' }),
 *   { onRetry: attempt => console.log(`retry #${attempt}`) }
 * );
 * ```
 */
export async function fetchWithRetry<R>(
  attempt: () => Promise<R>,
  policy: RetryPolicy | undefined,
  options: FetchWithRetryOptions = {}
): Promise<R> {
  if (!policy) {
    return attempt();
  }

  const wait = options.wait ?? sleep;
  const maxDelay = parseDuration(policy.maxDelay);
  let delay = parseDuration(policy.initialDelay);
  let attemptNumber = 0;

  for (;;) {
    if (attemptNumber > 0) {
      options.onRetry?.(attemptNumber);
    }

    try {
      return await attempt();
    } catch (caught) {
      const shouldRetry =
        attemptNumber + 1 < policy.maxAttempts &&
        (policy.retryIf === undefined || policy.retryIf(toError(caught)));

      if (!shouldRetry) {
        throw caught;
      }

      await wait(delay);
      delay = Math.min(delay * 2, maxDelay);
      attemptNumber++;
    }
  }
}
