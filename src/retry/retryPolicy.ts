/**
 * Retry policy construction and validation
 *
 * Policies are plain frozen objects: build one with createRetryPolicy() or
 * retryPolicyFromPreset() and share it across any number of calls.
 */

import type { RetryPolicy, RetryPolicyOptions, RetryPresetName } from "@/types";
import {
  DEFAULT_RETRY_POLICY_VALUES,
  RETRY_PRESETS,
  SUPPORTED_HTTP_METHODS,
  DEFAULT_RETRYABLE_ERROR_KINDS,
} from "@/constants";
import { InvalidRetryPolicyError } from "./retryErrors";

function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Throw InvalidRetryPolicyError on the first field that breaks a policy invariant
 */
export function assertValidRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidRetryPolicyError("maxAttempts", `must be a positive integer, got ${policy.maxAttempts}`);
  }
  if (!isNonNegativeFinite(policy.baseDelayMs)) {
    throw new InvalidRetryPolicyError("baseDelayMs", `must be a non-negative number, got ${policy.baseDelayMs}`);
  }
  // Below 1 the delays would shrink between attempts
  if (!Number.isFinite(policy.backoffMultiplier) || policy.backoffMultiplier < 1) {
    throw new InvalidRetryPolicyError(
      "backoffMultiplier",
      `must be a number >= 1, got ${policy.backoffMultiplier}`,
    );
  }
  if (policy.maxDelayMs !== null && !isNonNegativeFinite(policy.maxDelayMs)) {
    throw new InvalidRetryPolicyError("maxDelayMs", `must be a non-negative number or null, got ${policy.maxDelayMs}`);
  }
  if (!isNonNegativeFinite(policy.maxRetryAfterMs)) {
    throw new InvalidRetryPolicyError(
      "maxRetryAfterMs",
      `must be a non-negative number, got ${policy.maxRetryAfterMs}`,
    );
  }
  const badStatus = policy.retryableStatusCodes.find(
    (code) => !Number.isInteger(code) || code < 100 || code > 599,
  );
  if (badStatus !== undefined) {
    throw new InvalidRetryPolicyError("retryableStatusCodes", `contains invalid status ${badStatus}`);
  }
  const badKind = policy.retryableErrorKinds.find((kind) => !DEFAULT_RETRYABLE_ERROR_KINDS.includes(kind));
  if (badKind !== undefined) {
    throw new InvalidRetryPolicyError("retryableErrorKinds", `contains unknown kind ${badKind}`);
  }
  const badMethod = policy.retryableMethods.find((method) => !SUPPORTED_HTTP_METHODS.includes(method));
  if (badMethod !== undefined) {
    throw new InvalidRetryPolicyError("retryableMethods", `contains unsupported method ${badMethod}`);
  }
}

/**
 * Build a validated, frozen policy; omitted fields take the library defaults
 */
export function createRetryPolicy(options: RetryPolicyOptions = {}): RetryPolicy {
  const defaults = DEFAULT_RETRY_POLICY_VALUES;
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? defaults.baseDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? defaults.backoffMultiplier,
    jitter: options.jitter ?? defaults.jitter,
    // null is meaningful here (no cap), only undefined falls back
    maxDelayMs: options.maxDelayMs === undefined ? defaults.maxDelayMs : options.maxDelayMs,
    retryableStatusCodes: Object.freeze([
      ...(options.retryableStatusCodes ?? defaults.retryableStatusCodes),
    ]),
    retryableErrorKinds: Object.freeze([
      ...(options.retryableErrorKinds ?? defaults.retryableErrorKinds),
    ]),
    retryableMethods: Object.freeze([...(options.retryableMethods ?? defaults.retryableMethods)]),
    respectRetryAfter: options.respectRetryAfter ?? defaults.respectRetryAfter,
    maxRetryAfterMs: options.maxRetryAfterMs ?? defaults.maxRetryAfterMs,
  };

  assertValidRetryPolicy(policy);
  return Object.freeze(policy);
}

export function retryPolicyFromPreset(
  name: RetryPresetName,
  overrides: RetryPolicyOptions = {},
): RetryPolicy {
  return createRetryPolicy({ ...RETRY_PRESETS[name], ...overrides });
}

/**
 * Accept either a ready policy or options for one
 */
export function toRetryPolicy(input: RetryPolicy | RetryPolicyOptions | undefined): RetryPolicy {
  if (input !== undefined && Object.isFrozen(input) && isCompletePolicy(input)) {
    return input;
  }
  return createRetryPolicy(input);
}

function isCompletePolicy(input: RetryPolicy | RetryPolicyOptions): input is RetryPolicy {
  return (Object.keys(DEFAULT_RETRY_POLICY_VALUES) as (keyof RetryPolicy)[]).every(
    (key) => input[key] !== undefined,
  );
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();
