/**
 * Attempt classification: success, retryable or permanent
 */

import type { AttemptOutcome, HttpMethod, RetryPolicy } from "@/types";
import { ERROR_BODY_SNIPPET_MAX_LENGTH, RETRY_AFTER_STATUS_CODES } from "@/constants";
import { parseRetryAfter } from "@/retry/backoff";
import { HttpClientError, HttpError, isTransientKind } from "./httpError";
import type { HttpResponse } from "./httpResponse";

/**
 * Extract a snippet of the error response body for debugging
 */
function extractBodySnippet(response: HttpResponse): string | undefined {
  const text = response.text();
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

export function httpErrorFromResponse(response: HttpResponse): HttpError {
  return new HttpError({
    status: response.status,
    statusText: response.statusText,
    url: response.url,
    bodySnippet: extractBodySnippet(response),
    headers: response.headers,
  });
}

export function isMethodRetryable(method: HttpMethod, policy: RetryPolicy): boolean {
  return policy.retryableMethods.includes(method);
}

/**
 * Server-requested delay for 429/503 responses, when the policy honors it
 */
function retryAfterFor(response: HttpResponse, policy: RetryPolicy): number | undefined {
  if (!policy.respectRetryAfter || !RETRY_AFTER_STATUS_CODES.includes(response.status)) {
    return undefined;
  }
  return parseRetryAfter(response.headers.get("retry-after")) ?? undefined;
}

/**
 * 2xx is success; configured statuses are retryable; everything else is permanent
 */
export function classifyResponse(
  response: HttpResponse,
  method: HttpMethod,
  policy: RetryPolicy,
): AttemptOutcome<HttpResponse> {
  if (response.ok) {
    return { kind: "success", value: response };
  }

  const error = httpErrorFromResponse(response);
  if (!isMethodRetryable(method, policy) || !policy.retryableStatusCodes.includes(response.status)) {
    return { kind: "permanent", error };
  }
  return { kind: "retryable", error, retryAfterMs: retryAfterFor(response, policy) };
}

/**
 * Transport failures are retryable only for transient kinds the policy lists
 */
export function classifyError(
  error: HttpClientError,
  method: HttpMethod,
  policy: RetryPolicy,
): AttemptOutcome<HttpResponse> {
  if (
    isTransientKind(error.kind) &&
    policy.retryableErrorKinds.includes(error.kind) &&
    isMethodRetryable(method, policy)
  ) {
    return { kind: "retryable", error };
  }
  return { kind: "permanent", error };
}
