/**
 * Unit tests for transport failure mapping and response decoding
 *
 * Each fetch/undici failure shape maps to exactly one client error class.
 */

import { describe, it, expect } from "vitest";
import {
  ConnectTimeoutError,
  HttpClientError,
  HttpResponse,
  JsonDecodeError,
  mapFetchError,
  NetworkError,
  ReadTimeoutError,
  RequestError,
  toHttpClientError,
  UnknownRequestError,
} from "@/clients/http";
import { isTransientKind } from "@/clients/http/httpError";
import type { HttpErrorKind } from "@/types";

const ITEMS_URL = "https://api.test/items";
const context = { url: ITEMS_URL, phase: "connect" as const, timeoutMs: 100, timedOut: false };

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function fetchFailed(cause: unknown): TypeError {
  return new TypeError("fetch failed", { cause });
}

describe("mapFetchError", () => {
  it.each([
    ["ECONNREFUSED", NetworkError],
    ["ECONNRESET", NetworkError],
    ["ENOTFOUND", NetworkError],
    ["UND_ERR_SOCKET", NetworkError],
    ["UND_ERR_CONNECT_TIMEOUT", ConnectTimeoutError],
    ["UND_ERR_HEADERS_TIMEOUT", ReadTimeoutError],
    ["UND_ERR_BODY_TIMEOUT", ReadTimeoutError],
  ])("maps cause code %s", (code, expected) => {
    const mapped = mapFetchError(fetchFailed(systemError(`failed with ${code}`, code)), context);
    expect(mapped).toBeInstanceOf(expected);
    expect(mapped.message).toContain(code);
  });

  it("maps our own timeout before headers to ConnectTimeoutError", () => {
    const abort = new DOMException("This operation was aborted", "AbortError");
    const mapped = mapFetchError(abort, { ...context, timedOut: true });
    expect(mapped).toBeInstanceOf(ConnectTimeoutError);
    expect(mapped.message).toBe(`No response from ${ITEMS_URL} within 100ms`);
    expect(mapped.cause).toBe(abort);
  });

  it("maps our own timeout while reading the body to ReadTimeoutError", () => {
    const abort = new DOMException("This operation was aborted", "AbortError");
    const mapped = mapFetchError(abort, { ...context, phase: "read", timedOut: true });
    expect(mapped).toBeInstanceOf(ReadTimeoutError);
  });

  it("maps other fetch TypeErrors to RequestError", () => {
    const mapped = mapFetchError(fetchFailed(new Error("redirect count exceeded")), context);
    expect(mapped).toBeInstanceOf(RequestError);
    expect(mapped.message).toBe(`Request to ${ITEMS_URL} failed: redirect count exceeded`);
  });

  it("maps anything else to UnknownRequestError", () => {
    expect(mapFetchError(new Error("weird"), context)).toBeInstanceOf(UnknownRequestError);
    expect(mapFetchError("thrown string", context)).toBeInstanceOf(UnknownRequestError);
  });

  it("passes client errors through unchanged", () => {
    const original = new NetworkError("already classified");
    expect(mapFetchError(original, context)).toBe(original);
  });
});

describe("toHttpClientError", () => {
  it("wraps foreign errors as UnknownRequestError keeping the cause", () => {
    const boom = new Error("boom");
    const wrapped = toHttpClientError(boom);
    expect(wrapped).toBeInstanceOf(UnknownRequestError);
    expect(wrapped.kind).toBe("unknown");
    expect(wrapped.message).toBe("Unrecognized request failure: boom");
    expect(wrapped.cause).toBe(boom);
  });

  it("keeps client errors as they are", () => {
    const original = new RequestError("protocol");
    expect(toHttpClientError(original)).toBe(original);
  });

  it("gives every subclass the common base class", () => {
    expect(new ReadTimeoutError("x")).toBeInstanceOf(HttpClientError);
  });
});

describe("isTransientKind", () => {
  it("accepts only timeout and network kinds", () => {
    const kinds: HttpErrorKind[] = [
      "connect-timeout",
      "read-timeout",
      "network",
      "http-status",
      "request",
      "json-decode",
      "invalid-request",
      "unknown",
    ];
    expect(kinds.filter(isTransientKind)).toEqual(["connect-timeout", "read-timeout", "network"]);
  });
});

describe("HttpResponse", () => {
  function response(body: string, status = 200): HttpResponse {
    return new HttpResponse({ status, statusText: "OK", url: ITEMS_URL, headers: new Headers(), body });
  }

  it("parses a JSON body", () => {
    expect(response('{"id":7}').json<{ id: number }>()).toEqual({ id: 7 });
  });

  it("throws JsonDecodeError on a non-JSON body", () => {
    expect(() => response("<html>").json()).toThrow(JsonDecodeError);
  });

  it("throws JsonDecodeError on an empty body", () => {
    expect(() => response("").json()).toThrow(`Response body from ${ITEMS_URL} is not valid JSON (status 200)`);
  });

  it("reports ok only for 2xx", () => {
    expect(response("", 204).ok).toBe(true);
    expect(response("", 302).ok).toBe(false);
  });
});
