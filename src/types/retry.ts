/**
 * Retry policy and retry engine type definitions
 */

import type { HttpMethod, TransientErrorKind } from "./clients/http";

/**
 * Immutable retry policy, built with createRetryPolicy()
 */
export interface RetryPolicy {
  /** Maximum number of attempts, including the initial one */
  readonly maxAttempts: number;
  /** Delay before the first retry */
  readonly baseDelayMs: number;
  /** Growth factor between consecutive delays (1 = constant) */
  readonly backoffMultiplier: number;
  /** Randomize each delay within [0.5, 1.5) of its nominal value */
  readonly jitter: boolean;
  /** Upper bound for any delay, null for none */
  readonly maxDelayMs: number | null;
  readonly retryableStatusCodes: readonly number[];
  readonly retryableErrorKinds: readonly TransientErrorKind[];
  readonly retryableMethods: readonly HttpMethod[];
  /** Honor Retry-After on 429/503 instead of the computed backoff */
  readonly respectRetryAfter: boolean;
  readonly maxRetryAfterMs: number;
}

export type RetryPolicyOptions = Partial<RetryPolicy>;

export type RetryPresetName = "immediate" | "linear" | "jitter" | "exponential";

export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; error: unknown; retryAfterMs?: number }
  | { kind: "permanent"; error: unknown };

export interface RetryAttemptInfo {
  /** Attempt that just failed (1-based) */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Source of randomness for jitter, returns a value in [0, 1) */
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}
