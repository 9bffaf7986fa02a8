/**
 * Environment variable names read by loadHttpConfigFromEnv()
 */

export const HTTP_TIMEOUT_MS_ENV = "HTTP_TIMEOUT_MS";
export const HTTP_MAX_ATTEMPTS_ENV = "HTTP_MAX_ATTEMPTS";
export const HTTP_BASE_DELAY_MS_ENV = "HTTP_BASE_DELAY_MS";
export const HTTP_BACKOFF_MULTIPLIER_ENV = "HTTP_BACKOFF_MULTIPLIER";
export const HTTP_MAX_DELAY_MS_ENV = "HTTP_MAX_DELAY_MS";
export const HTTP_JITTER_ENV = "HTTP_JITTER";
export const HTTP_RETRYABLE_STATUS_CODES_ENV = "HTTP_RETRYABLE_STATUS_CODES";

export const LOG_LEVEL_ENV = "LOG_LEVEL";

/**
 * Value of HTTP_MAX_DELAY_MS that disables the delay cap
 */
export const UNCAPPED_DELAY_VALUE = "none";

export const TRUTHY_ENV_VALUES: readonly string[] = ["true", "1", "yes", "on"];
export const FALSY_ENV_VALUES: readonly string[] = ["false", "0", "no", "off"];
