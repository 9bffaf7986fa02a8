/**
 * Retry policy defaults
 */

import type { HttpMethod, RetryPolicy, RetryPresetName, TransientErrorKind } from "@/types";

/**
 * Default maximum number of attempts (1 initial + 4 retries)
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

export const DEFAULT_BASE_DELAY_MS = 200;

/**
 * Constant delay by default; the exponential preset raises it
 */
export const DEFAULT_BACKOFF_MULTIPLIER = 1;

export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Maximum time in milliseconds to respect Retry-After header
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Jitter window, as factors of the nominal delay: [min, max)
 */
export const JITTER_MIN_FACTOR = 0.5;
export const JITTER_MAX_FACTOR = 1.5;

/**
 * Largest delay setTimeout accepts without overflowing to 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * HTTP status codes that warrant a retry
 * - 408: Request Timeout
 * - 429: Too Many Requests (rate limit)
 * - 5xx: Server errors (temporary issues)
 */
export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [
  408, 429, 500, 502, 503, 504,
];

/**
 * Statuses on which a Retry-After header is read
 */
export const RETRY_AFTER_STATUS_CODES: readonly number[] = [429, 503];

export const DEFAULT_RETRYABLE_ERROR_KINDS: readonly TransientErrorKind[] = [
  "connect-timeout",
  "read-timeout",
  "network",
];

export const DEFAULT_RETRYABLE_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
];

export const DEFAULT_RETRY_POLICY_VALUES: RetryPolicy = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  baseDelayMs: DEFAULT_BASE_DELAY_MS,
  backoffMultiplier: DEFAULT_BACKOFF_MULTIPLIER,
  jitter: false,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
  retryableStatusCodes: DEFAULT_RETRYABLE_STATUS_CODES,
  retryableErrorKinds: DEFAULT_RETRYABLE_ERROR_KINDS,
  retryableMethods: DEFAULT_RETRYABLE_METHODS,
  respectRetryAfter: true,
  maxRetryAfterMs: DEFAULT_MAX_RETRY_AFTER_MS,
};

/**
 * Preset overrides applied on top of DEFAULT_RETRY_POLICY_VALUES
 */
export const RETRY_PRESETS: Record<RetryPresetName, Partial<RetryPolicy>> = {
  immediate: { baseDelayMs: 0, backoffMultiplier: 1, jitter: false },
  linear: { backoffMultiplier: 1, jitter: false },
  jitter: { backoffMultiplier: 1, jitter: true },
  exponential: { baseDelayMs: 500, backoffMultiplier: 2, jitter: true },
};
