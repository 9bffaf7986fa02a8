/**
 * HTTP client error classes
 *
 * Every failure a transport or the request preparation step can produce is an
 * HttpClientError subclass with a stable `kind`, which the classifier matches
 * against the retry policy.
 */

import type { HttpErrorDetails, HttpErrorKind, TransientErrorKind } from "@/types";

export class HttpClientError extends Error {
  public readonly kind: HttpErrorKind;

  constructor(kind: HttpErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpClientError";
    this.kind = kind;
  }
}

/**
 * No response headers arrived before the timeout, or the connection could not be opened in time
 */
export class ConnectTimeoutError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connect-timeout", message, options);
    this.name = "ConnectTimeoutError";
  }
}

/**
 * The response started but its body did not arrive before the timeout
 */
export class ReadTimeoutError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("read-timeout", message, options);
    this.name = "ReadTimeoutError";
  }
}

/**
 * Connection refused, reset, or host not resolvable
 */
export class NetworkError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

/**
 * Protocol-level failure (redirect loop, malformed response, ...)
 */
export class RequestError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("request", message, options);
    this.name = "RequestError";
  }
}

export class JsonDecodeError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("json-decode", message, options);
    this.name = "JsonDecodeError";
  }
}

/**
 * The request could not be built: bad URL, unsupported method, conflicting body
 */
export class InvalidRequestError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid-request", message, options);
    this.name = "InvalidRequestError";
  }
}

/**
 * Anything a transport threw that none of the other classes describe
 */
export class UnknownRequestError extends HttpClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("unknown", message, options);
    this.name = "UnknownRequestError";
  }
}

/**
 * Structured error for non-2xx responses
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends HttpClientError {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      "http-status",
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }
}

const TRANSIENT_KINDS: readonly HttpErrorKind[] = ["connect-timeout", "read-timeout", "network"];

export function isTransientKind(kind: HttpErrorKind): kind is TransientErrorKind {
  return TRANSIENT_KINDS.includes(kind);
}

/**
 * Wrap anything thrown by a transport so it can be classified
 */
export function toHttpClientError(error: unknown): HttpClientError {
  if (error instanceof HttpClientError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UnknownRequestError(`Unrecognized request failure: ${message}`, { cause: error });
}
