/**
 * Retry loop shared by the HTTP channel and retryFunction()
 */

import type { AttemptOutcome, RetryHooks, RetryPolicy } from "@/types";
import { sleep as defaultSleep } from "@/utils";
import { computeRetryDelay } from "./backoff";
import { assertValidRetryPolicy } from "./retryPolicy";
import { ExhaustedRetriesError, PermanentFailureError } from "./retryErrors";

/**
 * Run `operation` until it succeeds, fails permanently, or the policy runs out of attempts
 *
 * `operation` receives the 1-based attempt number and reports how the attempt
 * went; if it throws, the error is treated as a permanent failure.
 *
 * @throws {PermanentFailureError} On the first permanent outcome, without retrying
 * @throws {ExhaustedRetriesError} After `policy.maxAttempts` retryable outcomes
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  assertValidRetryPolicy(policy);

  const sleep = hooks.sleep ?? defaultSleep;
  const random = hooks.random ?? Math.random;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let outcome: AttemptOutcome<T>;
    try {
      outcome = await operation(attempt);
    } catch (error) {
      outcome = { kind: "permanent", error };
    }

    if (outcome.kind === "success") {
      return outcome.value;
    }
    if (outcome.kind === "permanent") {
      throw new PermanentFailureError(outcome.error, attempt);
    }

    lastError = outcome.error;

    // Don't wait after the last attempt
    if (attempt === policy.maxAttempts) {
      break;
    }

    const delayMs = computeRetryDelay(attempt, policy, outcome.retryAfterMs, random);
    hooks.onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error: outcome.error });
    await sleep(delayMs);
  }

  throw new ExhaustedRetriesError(lastError, policy.maxAttempts);
}
