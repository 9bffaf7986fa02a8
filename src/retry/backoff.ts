/**
 * Backoff delay computation
 *
 * delay(n) = baseDelayMs * backoffMultiplier^(n-1), where n is the retry number
 * (n = 1 is the wait between the first and second attempt). Jitter scales the
 * nominal delay by a factor in [0.5, 1.5); the cap applies last, to
 * server-requested delays as well.
 */

import type { RetryPolicy } from "@/types";
import { JITTER_MAX_FACTOR, JITTER_MIN_FACTOR, MAX_TIMER_DELAY_MS } from "@/constants";

export type BackoffSettings = Pick<
  RetryPolicy,
  "baseDelayMs" | "backoffMultiplier" | "jitter" | "maxDelayMs"
>;

export type RetryDelaySettings = BackoffSettings &
  Pick<RetryPolicy, "respectRetryAfter" | "maxRetryAfterMs">;

function clampDelay(delayMs: number, maxDelayMs: number | null): number {
  const capped = maxDelayMs === null ? delayMs : Math.min(delayMs, maxDelayMs);
  return Math.max(0, Math.floor(Math.min(capped, MAX_TIMER_DELAY_MS)));
}

/**
 * Delay to wait before retry number `retryNumber` (1-based)
 */
export function computeBackoffDelay(
  retryNumber: number,
  settings: BackoffSettings,
  random: () => number = Math.random,
): number {
  // 0 * Infinity would be NaN once the power overflows
  const nominal =
    settings.baseDelayMs === 0
      ? 0
      : settings.baseDelayMs * Math.pow(settings.backoffMultiplier, retryNumber - 1);
  const factor = settings.jitter
    ? JITTER_MIN_FACTOR + random() * (JITTER_MAX_FACTOR - JITTER_MIN_FACTOR)
    : 1;
  return clampDelay(nominal * factor, settings.maxDelayMs);
}

/**
 * Compute retry delay considering a server-requested delay and the backoff
 */
export function computeRetryDelay(
  retryNumber: number,
  settings: RetryDelaySettings,
  retryAfterMs: number | undefined,
  random: () => number = Math.random,
): number {
  if (settings.respectRetryAfter && retryAfterMs !== undefined) {
    // Respect Retry-After, clamped to maxRetryAfterMs and the policy cap
    return clampDelay(Math.min(retryAfterMs, settings.maxRetryAfterMs), settings.maxDelayMs);
  }
  return computeBackoffDelay(retryNumber, settings, random);
}

/**
 * Jitter-free delays between consecutive attempts: maxAttempts - 1 entries
 */
export function computeDelaySchedule(
  settings: BackoffSettings & Pick<RetryPolicy, "maxAttempts">,
): number[] {
  const schedule: number[] = [];
  for (let retry = 1; retry < settings.maxAttempts; retry++) {
    schedule.push(computeBackoffDelay(retry, { ...settings, jitter: false }));
  }
  return schedule;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing/in the past
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  now: number = Date.now(),
): number | null {
  const value = retryAfterHeader?.trim();
  if (!value) {
    return null;
  }

  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  const delayMs = date - now;
  return delayMs > 0 ? delayMs : null;
}
