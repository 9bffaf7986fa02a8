/**
 * Retry engine public API
 */

export { executeWithRetry } from "./executeWithRetry";
export { retryFunction } from "./retryFunction";
export type { RetryFunctionOptions } from "./retryFunction";
export {
  computeBackoffDelay,
  computeRetryDelay,
  computeDelaySchedule,
  parseRetryAfter,
} from "./backoff";
export type { BackoffSettings, RetryDelaySettings } from "./backoff";
export {
  createRetryPolicy,
  retryPolicyFromPreset,
  toRetryPolicy,
  assertValidRetryPolicy,
  DEFAULT_RETRY_POLICY,
} from "./retryPolicy";
export {
  PermanentFailureError,
  ExhaustedRetriesError,
  RetryableResultError,
  InvalidRetryPolicyError,
} from "./retryErrors";
