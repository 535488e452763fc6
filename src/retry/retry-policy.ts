import type { Duration } from '../cache/cache-interfaces.js';
import { isValidDuration, parseDuration } from '../cache/duration-utils.js';

/**
 * Retry configuration for transient fetch failures.
 */
export interface RetryPolicy {
  /** Total attempts, first one included; 0 and 1 both mean "no retry" */
  readonly maxAttempts: number;
  /** Wait before the first retry; doubled after each retry */
  readonly initialDelay: Duration;
  /** Cap for the doubled delay */
  readonly maxDelay: Duration;
  /** Only retry when this returns true */
  readonly retryIf?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialDelay: '1s',
  maxDelay: '30s',
});

/**
 * Exponential backoff policy, defaults filled in.
 *
 * @example
 * ```ts
 * exponentialRetryPolicy({ maxAttempts: 5, initialDelay: 200 });
 * ```
 */
export function exponentialRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = Object.freeze({ ...DEFAULT_RETRY_POLICY, ...overrides });
  assertValidRetryPolicy(policy);
  return policy;
}

/**
 * @throws Error when attempts or delays are out of range
 */
export function assertValidRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 0) {
    throw new Error(`maxAttempts must be a non-negative integer, received ${policy.maxAttempts}`);
  }
  if (!isValidDuration(policy.initialDelay)) {
    throw new Error(`Invalid initialDelay: ${String(policy.initialDelay)}`);
  }
  if (!isValidDuration(policy.maxDelay)) {
    throw new Error(`Invalid maxDelay: ${String(policy.maxDelay)}`);
  }
}

/**
 * Delays (ms) waited before each retry, in order.
 *
 * @example
 * backoffDelays({ maxAttempts: 5, initialDelay: 100, maxDelay: 300 })
 * // → [100, 200, 300, 300]
 */
export function backoffDelays(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  const maxDelay = parseDuration(policy.maxDelay);
  let delay = parseDuration(policy.initialDelay);
  for (let retry = 1; retry < policy.maxAttempts; retry++) {
    delays.push(delay);
    delay = Math.min(delay * 2, maxDelay);
  }
  return delays;
}
