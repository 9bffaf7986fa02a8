/**
 * HTTP client configuration from environment variables
 *
 * Every variable is optional; unset or blank variables keep the library
 * defaults. Values that are set but malformed raise ConfigError.
 *
 * Environment variables:
 *   - HTTP_TIMEOUT_MS: per-attempt timeout
 *   - HTTP_MAX_ATTEMPTS: attempts per call, including the first
 *   - HTTP_BASE_DELAY_MS: delay before the first retry
 *   - HTTP_BACKOFF_MULTIPLIER: growth factor between delays (>= 1)
 *   - HTTP_MAX_DELAY_MS: delay cap, or "none"
 *   - HTTP_JITTER: true|false
 *   - HTTP_RETRYABLE_STATUS_CODES: comma-separated statuses, e.g. "429,503"
 */

import type { HttpClientSettings, RetryPolicyOptions } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  FALSY_ENV_VALUES,
  HTTP_BACKOFF_MULTIPLIER_ENV,
  HTTP_BASE_DELAY_MS_ENV,
  HTTP_JITTER_ENV,
  HTTP_MAX_ATTEMPTS_ENV,
  HTTP_MAX_DELAY_MS_ENV,
  HTTP_RETRYABLE_STATUS_CODES_ENV,
  HTTP_TIMEOUT_MS_ENV,
  MAX_TIMER_DELAY_MS,
  TRUTHY_ENV_VALUES,
  UNCAPPED_DELAY_VALUE,
} from "@/constants";
import { createRetryPolicy, InvalidRetryPolicyError } from "@/retry";
import { ConfigError } from "./configError";

export type Env = Record<string, string | undefined>;

function readRaw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, name: string): number | undefined {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(name, `must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = readRaw(env, name)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (TRUTHY_ENV_VALUES.includes(raw)) return true;
  if (FALSY_ENV_VALUES.includes(raw)) return false;
  throw new ConfigError(name, `must be a boolean (true/false), got "${raw}"`);
}

function readMaxDelay(env: Env): number | null | undefined {
  const raw = readRaw(env, HTTP_MAX_DELAY_MS_ENV);
  if (raw?.toLowerCase() === UNCAPPED_DELAY_VALUE) {
    return null;
  }
  return readNumber(env, HTTP_MAX_DELAY_MS_ENV);
}

function readStatusCodes(env: Env): number[] | undefined {
  const raw = readRaw(env, HTTP_RETRYABLE_STATUS_CODES_ENV);
  if (raw === undefined) {
    return undefined;
  }
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const code = Number(part);
      if (!Number.isInteger(code)) {
        throw new ConfigError(HTTP_RETRYABLE_STATUS_CODES_ENV, `contains non-integer status "${part}"`);
      }
      return code;
    });
}

const POLICY_FIELD_ENV: Partial<Record<keyof RetryPolicyOptions, string>> = {
  maxAttempts: HTTP_MAX_ATTEMPTS_ENV,
  baseDelayMs: HTTP_BASE_DELAY_MS_ENV,
  backoffMultiplier: HTTP_BACKOFF_MULTIPLIER_ENV,
  maxDelayMs: HTTP_MAX_DELAY_MS_ENV,
  jitter: HTTP_JITTER_ENV,
  retryableStatusCodes: HTTP_RETRYABLE_STATUS_CODES_ENV,
};

/**
 * Build client settings from `env` (defaults to process.env)
 * @throws {ConfigError} Naming the first offending variable
 */
export function loadHttpConfigFromEnv(env: Env = process.env): HttpClientSettings {
  const timeoutMs = readNumber(env, HTTP_TIMEOUT_MS_ENV) ?? DEFAULT_HTTP_TIMEOUT_MS;
  if (timeoutMs <= 0) {
    throw new ConfigError(HTTP_TIMEOUT_MS_ENV, `must be positive, got ${timeoutMs}`);
  }
  if (timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new ConfigError(HTTP_TIMEOUT_MS_ENV, `must be at most ${MAX_TIMER_DELAY_MS}, got ${timeoutMs}`);
  }

  const options: RetryPolicyOptions = {
    maxAttempts: readNumber(env, HTTP_MAX_ATTEMPTS_ENV),
    baseDelayMs: readNumber(env, HTTP_BASE_DELAY_MS_ENV),
    backoffMultiplier: readNumber(env, HTTP_BACKOFF_MULTIPLIER_ENV),
    maxDelayMs: readMaxDelay(env),
    jitter: readBoolean(env, HTTP_JITTER_ENV),
    retryableStatusCodes: readStatusCodes(env),
  };

  try {
    return { timeoutMs, retryPolicy: createRetryPolicy(options) };
  } catch (error) {
    if (error instanceof InvalidRetryPolicyError) {
      throw new ConfigError(POLICY_FIELD_ENV[error.field] ?? error.field, error.message);
    }
    throw error;
  }
}
