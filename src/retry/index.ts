export {
  DEFAULT_RETRY_POLICY,
  exponentialRetryPolicy,
  assertValidRetryPolicy,
  backoffDelays,
  type RetryPolicy,
} from './retry-policy.js';
export { fetchWithRetry, sleep, type WaitFn, type FetchWithRetryOptions } from './fetch-with-retry.js';
