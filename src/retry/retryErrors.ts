/**
 * Retry-level errors: how a logical call ends when it does not succeed
 */

import type { RetryPolicy } from "@/types";

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A non-retryable failure; raised without any further attempt
 */
export class PermanentFailureError extends Error {
  /** Attempts made before giving up (0 when the request was rejected before sending) */
  public readonly attempts: number;

  constructor(cause: unknown, attempts: number) {
    super(`Permanent failure after ${attempts} attempt(s): ${causeMessage(cause)}`, { cause });
    this.name = "PermanentFailureError";
    this.attempts = attempts;
  }
}

/**
 * Every attempt failed with a retryable error
 */
export class ExhaustedRetriesError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(lastError: unknown, attempts: number) {
    super(`Retries exhausted after ${attempts} attempt(s): ${causeMessage(lastError)}`, {
      cause: lastError,
    });
    this.name = "ExhaustedRetriesError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * A call returned normally but its result asked for another attempt
 */
export class RetryableResultError<T = unknown> extends Error {
  public readonly result: T;

  constructor(result: T) {
    super("Result requires a retry");
    this.name = "RetryableResultError";
    this.result = result;
  }
}

export class InvalidRetryPolicyError extends Error {
  public readonly field: keyof RetryPolicy;

  constructor(field: keyof RetryPolicy, message: string) {
    super(`Invalid retry policy: ${field} ${message}`);
    this.name = "InvalidRetryPolicyError";
    this.field = field;
  }
}
