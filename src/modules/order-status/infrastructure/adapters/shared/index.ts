export { fetchWithTimeout, parseJson } from './http-client';
export {
  computeBackoffMs,
  executeWithRetry,
  resolveMaxAttempts,
  sleep,
  type ExecuteWithRetryOptions,
  type RetryOutcome,
  type RetryPolicy,
  type Sleep,
} from './retry';
