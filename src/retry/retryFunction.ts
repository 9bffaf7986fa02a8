/**
 * retryFunction: retry any async call with a retry policy
 */

import type { RetryHooks, RetryPolicy } from "@/types";
import * as logger from "@/logger";
import { describeError } from "@/utils";
import { executeWithRetry } from "./executeWithRetry";
import { RetryableResultError } from "./retryErrors";
import { DEFAULT_RETRY_POLICY } from "./retryPolicy";

export interface RetryFunctionOptions<T> {
  /** Returns true when a resolved value should be retried (default: never) */
  isRetryNeeded?: (result: T) => boolean;
  /** Returns false for errors that must not be retried (default: every error is retried) */
  isErrorRetryable?: (error: unknown) => boolean;
  policy?: RetryPolicy;
  hooks?: RetryHooks;
}

/**
 * Call `fn` until it resolves with a value that needs no retry
 *
 * @returns The first accepted result
 * @throws {ExhaustedRetriesError} When every attempt failed or needed a retry;
 *   `lastError` is the last thrown error or a RetryableResultError holding the last result
 * @throws {PermanentFailureError} When isErrorRetryable rejected an error
 */
export async function retryFunction<T>(
  fn: () => Promise<T>,
  options: RetryFunctionOptions<T> = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const isRetryNeeded = options.isRetryNeeded ?? (() => false);
  const isErrorRetryable = options.isErrorRetryable ?? (() => true);

  return executeWithRetry<T>(
    async (attempt) => {
      try {
        const result = await fn();
        if (!isRetryNeeded(result)) {
          return { kind: "success", value: result };
        }
        logger.info("Attempt returned a result that needs a retry", {
          attempt,
          maxAttempts: policy.maxAttempts,
        });
        return { kind: "retryable", error: new RetryableResultError(result) };
      } catch (error) {
        logger.warn("Attempt failed", {
          attempt,
          maxAttempts: policy.maxAttempts,
          error: describeError(error),
        });
        return isErrorRetryable(error)
          ? { kind: "retryable", error }
          : { kind: "permanent", error };
      }
    },
    policy,
    options.hooks,
  );
}
