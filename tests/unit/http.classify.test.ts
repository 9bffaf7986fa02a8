/**
 * Unit tests for attempt classification
 */

import { describe, it, expect } from "vitest";
import { classifyError, classifyResponse } from "@/clients/http/classify";
import {
  ConnectTimeoutError,
  HttpError,
  NetworkError,
  ReadTimeoutError,
  RequestError,
  JsonDecodeError,
  UnknownRequestError,
} from "@/clients/http";
import { createRetryPolicy } from "@/retry";
import { toResponse } from "../helpers/mockHttp";

const ITEMS_URL = "https://api.test/items";
const policy = createRetryPolicy();

describe("classifyResponse", () => {
  it.each([200, 201, 204, 299])("treats %i as success", (status) => {
    const response = toResponse(ITEMS_URL, { status });
    expect(classifyResponse(response, "GET", policy)).toEqual({ kind: "success", value: response });
  });

  it.each([408, 429, 500, 502, 503, 504])("treats %i as retryable", (status) => {
    const outcome = classifyResponse(toResponse(ITEMS_URL, { status }), "GET", policy);
    expect(outcome.kind).toBe("retryable");
  });

  it.each([301, 400, 401, 403, 404, 422, 501])("treats %i as permanent", (status) => {
    const outcome = classifyResponse(toResponse(ITEMS_URL, { status }), "GET", policy);
    expect(outcome.kind).toBe("permanent");
  });

  it("carries an HttpError describing the response", () => {
    const outcome = classifyResponse(toResponse(ITEMS_URL, { status: 404, body: "missing" }), "GET", policy);
    if (outcome.kind !== "permanent") throw new Error(`unexpected ${outcome.kind}`);
    expect(outcome.error).toBeInstanceOf(HttpError);
    expect(outcome.error).toMatchObject({ status: 404, statusText: "Not Found", url: ITEMS_URL, bodySnippet: "missing" });
    expect(String(outcome.error)).toBe(`HttpError: HTTP 404 Not Found - ${ITEMS_URL} - missing`);
  });

  it("truncates long bodies in the error snippet", () => {
    const outcome = classifyResponse(toResponse(ITEMS_URL, { status: 500, body: "x".repeat(250) }), "GET", policy);
    if (outcome.kind !== "retryable") throw new Error(`unexpected ${outcome.kind}`);
    expect(outcome.error).toMatchObject({ bodySnippet: "x".repeat(200) + "..." });
  });

  it("makes a retryable status permanent for methods the policy does not retry", () => {
    const getOnly = createRetryPolicy({ retryableMethods: ["GET"] });
    expect(classifyResponse(toResponse(ITEMS_URL, { status: 503 }), "POST", getOnly).kind).toBe("permanent");
  });

  it("reads Retry-After on 429 and 503", () => {
    const outcome = classifyResponse(
      toResponse(ITEMS_URL, { status: 429, headers: { "Retry-After": "2" } }),
      "GET",
      policy,
    );
    expect(outcome).toMatchObject({ kind: "retryable", retryAfterMs: 2000 });
  });

  it("ignores Retry-After on other statuses", () => {
    const outcome = classifyResponse(
      toResponse(ITEMS_URL, { status: 500, headers: { "Retry-After": "2" } }),
      "GET",
      policy,
    );
    expect(outcome).toMatchObject({ kind: "retryable", retryAfterMs: undefined });
  });

  it("ignores Retry-After when the policy does not respect it", () => {
    const outcome = classifyResponse(
      toResponse(ITEMS_URL, { status: 503, headers: { "Retry-After": "2" } }),
      "GET",
      createRetryPolicy({ respectRetryAfter: false }),
    );
    expect(outcome).toMatchObject({ kind: "retryable", retryAfterMs: undefined });
  });
});

describe("classifyError", () => {
  it.each([
    ["ConnectTimeoutError", new ConnectTimeoutError("slow connect")],
    ["ReadTimeoutError", new ReadTimeoutError("slow body")],
    ["NetworkError", new NetworkError("reset")],
  ])("retries %s", (_name, error) => {
    expect(classifyError(error, "GET", policy)).toEqual({ kind: "retryable", error });
  });

  it.each([
    ["RequestError", new RequestError("redirect loop")],
    ["JsonDecodeError", new JsonDecodeError("bad json")],
    ["UnknownRequestError", new UnknownRequestError("???")],
  ])("never retries %s", (_name, error) => {
    expect(classifyError(error, "GET", policy)).toEqual({ kind: "permanent", error });
  });

  it("only retries the error kinds the policy lists", () => {
    const networkOnly = createRetryPolicy({ retryableErrorKinds: ["network"] });
    expect(classifyError(new ConnectTimeoutError("slow"), "GET", networkOnly).kind).toBe("permanent");
    expect(classifyError(new NetworkError("reset"), "GET", networkOnly).kind).toBe("retryable");
  });

  it("does not retry transient errors for methods the policy excludes", () => {
    const getOnly = createRetryPolicy({ retryableMethods: ["GET", "HEAD"] });
    expect(classifyError(new NetworkError("reset"), "PATCH", getOnly).kind).toBe("permanent");
  });
});
