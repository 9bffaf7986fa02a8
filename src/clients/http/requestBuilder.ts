/**
 * Request preparation: turns an HttpRequest into what a transport sends
 *
 * All input validation happens here, before any I/O, and fails with
 * InvalidRequestError.
 */

import type {
  HttpHeaders,
  HttpMethod,
  HttpRequest,
  PreparedRequest,
  QueryParams,
  RequestData,
} from "@/types";
import {
  FORM_CONTENT_TYPE,
  JSON_CONTENT_TYPE,
  MAX_TIMER_DELAY_MS,
  SUPPORTED_HTTP_METHODS,
} from "@/constants";
import { hasHeader, mergeHeaders } from "@/utils";
import { InvalidRequestError } from "./httpError";

export interface RequestDefaults {
  timeoutMs: number;
  headers?: HttpHeaders;
}

function isSupportedMethod(method: string): method is HttpMethod {
  return SUPPORTED_HTTP_METHODS.some((supported) => supported === method);
}

/**
 * Upper-case and validate a method name
 * @throws {InvalidRequestError} For methods outside SUPPORTED_HTTP_METHODS
 */
export function normalizeMethod(method: string): HttpMethod {
  const upper = method.trim().toUpperCase();
  if (!isSupportedMethod(upper)) {
    throw new InvalidRequestError(
      `Unsupported method: ${method} (expected one of ${SUPPORTED_HTTP_METHODS.join(", ")})`,
    );
  }
  return upper;
}

/**
 * Build URL with query parameters (supports arrays for repeated params)
 * @throws {InvalidRequestError} When the URL is not absolute http(s)
 */
export function buildUrl(baseUrl: string, query?: QueryParams): string {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw new InvalidRequestError(`Invalid URL: ${baseUrl}`, { cause: error });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidRequestError(`Unsupported URL scheme: ${url.protocol} in ${baseUrl}`);
  }

  if (!query) {
    return url.toString();
  }

  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

function encodeData(data: RequestData): { body: string; contentType?: string } {
  if (typeof data === "string") {
    return { body: data };
  }
  const form = new URLSearchParams();
  Object.entries(data).forEach(([key, value]) => form.append(key, String(value)));
  return { body: form.toString(), contentType: FORM_CONTENT_TYPE };
}

function validateTimeout(timeoutMs: number): number {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidRequestError(`Timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }
  // setTimeout fires after 1ms beyond this
  if (timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new InvalidRequestError(`Timeout must be at most ${MAX_TIMER_DELAY_MS}ms, got ${timeoutMs}`);
  }
  return timeoutMs;
}

/**
 * Resolve URL, headers, body and timeout for one logical call
 *
 * Header precedence: defaults, then body content type, then caller headers.
 * A caller-supplied Content-Type is never overridden.
 */
export function prepareRequest(req: HttpRequest, defaults: RequestDefaults): PreparedRequest {
  const method = normalizeMethod(req.method);

  if (req.data !== undefined && req.json !== undefined) {
    throw new InvalidRequestError("Only one of data or json can be provided");
  }

  const url = buildUrl(req.url, req.query);
  const timeoutMs = validateTimeout(req.timeoutMs ?? defaults.timeoutMs);

  let body: string | undefined;
  let contentType: string | undefined;

  if (req.json !== undefined) {
    body = JSON.stringify(req.json);
    contentType = JSON_CONTENT_TYPE;
  } else if (req.data !== undefined) {
    ({ body, contentType } = encodeData(req.data));
  }

  const callerHeaders = mergeHeaders(defaults.headers, req.headers);
  const headers =
    contentType && !hasHeader(callerHeaders, "content-type")
      ? mergeHeaders({ "Content-Type": contentType }, callerHeaders)
      : callerHeaders;

  if (body !== undefined && (method === "GET" || method === "HEAD")) {
    throw new InvalidRequestError(`${method} requests cannot carry a body`);
  }

  return { method, url, headers, body, timeoutMs };
}
