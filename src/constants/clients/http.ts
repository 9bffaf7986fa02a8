/**
 * HTTP client constants: defaults and transport error tables
 */

import type { HttpMethod } from "@/types";

/**
 * Default per-attempt timeout in milliseconds
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 2_000;

export const SUPPORTED_HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
];

/**
 * Methods whose convenience wrappers require a body (`data` or `json`)
 */
export const BODY_REQUIRED_METHODS: readonly HttpMethod[] = ["POST", "PUT", "PATCH"];

export const JSON_CONTENT_TYPE = "application/json";

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Header names whose values are never written to logs (compared lowercased)
 */
export const SENSITIVE_HEADER_NAMES: readonly string[] = [
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
  "x-api-key",
];

export const REDACTED_HEADER_VALUE = "[redacted]";

/**
 * Error codes undici reports for timeouts it enforces itself
 */
export const CONNECT_TIMEOUT_ERROR_CODES: readonly string[] = [
  "UND_ERR_CONNECT_TIMEOUT",
  "ETIMEDOUT",
];

export const READ_TIMEOUT_ERROR_CODES: readonly string[] = [
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
];

/**
 * Connection-level failures: nothing usable came back from the server
 */
export const NETWORK_ERROR_CODES: readonly string[] = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
];
