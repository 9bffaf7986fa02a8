/**
 * Fetch transport: one HTTP attempt over native fetch
 * Arms a per-attempt timeout and maps fetch/undici failures to classified errors
 */

import type { PreparedRequest } from "@/types";
import type { HttpTransport } from "@/interfaces";
import {
  CONNECT_TIMEOUT_ERROR_CODES,
  NETWORK_ERROR_CODES,
  READ_TIMEOUT_ERROR_CODES,
} from "@/constants";
import {
  ConnectTimeoutError,
  HttpClientError,
  NetworkError,
  ReadTimeoutError,
  RequestError,
  UnknownRequestError,
} from "./httpError";
import { HttpResponse } from "./httpResponse";

/**
 * Which part of the exchange an attempt was in when it failed
 */
export type FetchPhase = "connect" | "read";

export interface FetchFailureContext {
  url: string;
  phase: FetchPhase;
  timeoutMs: number;
  /** The attempt's own timeout fired */
  timedOut: boolean;
}

function getErrorCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value) {
    const { code } = value;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function getCause(value: unknown): unknown {
  return value instanceof Error ? value.cause : undefined;
}

/**
 * Map anything fetch or body reading threw to an HttpClientError
 *
 * undici reports network failures as `TypeError("fetch failed")` with the
 * underlying socket/DNS error as `cause`.
 */
export function mapFetchError(error: unknown, context: FetchFailureContext): HttpClientError {
  if (error instanceof HttpClientError) {
    return error;
  }

  const { url, phase, timeoutMs } = context;

  if (context.timedOut) {
    return phase === "connect"
      ? new ConnectTimeoutError(`No response from ${url} within ${timeoutMs}ms`, { cause: error })
      : new ReadTimeoutError(`Response body from ${url} not received within ${timeoutMs}ms`, {
          cause: error,
        });
  }

  const cause = getCause(error);
  const code = getErrorCode(cause) ?? getErrorCode(error);

  if (code !== undefined) {
    if (CONNECT_TIMEOUT_ERROR_CODES.includes(code)) {
      return new ConnectTimeoutError(`Connection to ${url} timed out (${code})`, { cause: error });
    }
    if (READ_TIMEOUT_ERROR_CODES.includes(code)) {
      return new ReadTimeoutError(`Reading from ${url} timed out (${code})`, { cause: error });
    }
    if (NETWORK_ERROR_CODES.includes(code)) {
      return new NetworkError(`Network failure for ${url} (${code})`, { cause: error });
    }
  }

  if (error instanceof TypeError) {
    const detail = cause instanceof Error ? cause.message : error.message;
    // Remaining fetch TypeErrors: redirect limits, bad responses, unsupported bodies
    return new RequestError(`Request to ${url} failed: ${detail}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UnknownRequestError(`Unrecognized failure for ${url}: ${message}`, { cause: error });
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
export const fetchTransport: HttpTransport = async (req: PreparedRequest) => {
  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), req.timeoutMs);
  let phase: FetchPhase = "connect";

  try {
    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: controller.signal,
    });

    phase = "read";
    const body = await response.text();

    return new HttpResponse({
      status: response.status,
      statusText: response.statusText,
      url: response.url || req.url,
      headers: response.headers,
      body,
    });
  } catch (error) {
    throw mapFetchError(error, {
      url: req.url,
      phase,
      timeoutMs: req.timeoutMs,
      timedOut: controller.signal.aborted,
    });
  } finally {
    clearTimeout(timeoutId);
  }
};
