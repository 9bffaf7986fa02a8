/**
 * Unit tests for the one-shot request helpers
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  httpDelete,
  httpGet,
  httpHead,
  httpPatch,
  httpPost,
  httpPut,
  httpRequest,
  InvalidRequestError,
} from "@/clients/http";
import type { HttpMethod } from "@/types";
import { ExhaustedRetriesError, PermanentFailureError } from "@/retry";
import { createMockHttp } from "../helpers/mockHttp";
import { expectRejection } from "../helpers/capture";

const ITEMS_URL = "https://api.test/items";

describe("single-request helpers", () => {
  const mockHttp = createMockHttp();
  const settings = { transport: mockHttp.transport, sleep: mockHttp.sleep };

  beforeEach(() => {
    mockHttp.reset();
  });

  it("httpGet sends a GET with query params", async () => {
    mockHttp.enqueue("GET", ITEMS_URL, { status: 200, body: { ok: true } });

    const response = await httpGet(ITEMS_URL, { query: { q: "test" } }, settings);

    expect(response.json()).toEqual({ ok: true });
    expect(mockHttp.getRecordedRequests()[0].url).toBe("https://api.test/items?q=test");
  });

  const bodyHelpers: [HttpMethod, typeof httpPost][] = [
    ["POST", httpPost],
    ["PUT", httpPut],
    ["PATCH", httpPatch],
  ];

  it.each(bodyHelpers)("sends %s with a JSON body", async (method, send) => {
    mockHttp.enqueue(method, ITEMS_URL, { status: 200 });

    await send(ITEMS_URL, { json: { key: "value" } }, settings);

    const [request] = mockHttp.getRecordedRequests();
    expect(request.method).toBe(method);
    expect(request.body).toBe('{"key":"value"}');
  });

  it("httpDelete and httpHead send no body", async () => {
    mockHttp.enqueue("DELETE", ITEMS_URL, { status: 204 });
    mockHttp.enqueue("HEAD", ITEMS_URL, { status: 200 });

    await httpDelete(ITEMS_URL, {}, settings);
    await httpHead(ITEMS_URL, {}, settings);

    expect(mockHttp.getRecordedRequests().map((r) => [r.method, r.body])).toEqual([
      ["DELETE", undefined],
      ["HEAD", undefined],
    ]);
  });

  it("httpRequest dispatches on a case-insensitive method", async () => {
    mockHttp.enqueue("PATCH", ITEMS_URL, { status: 200 });

    await httpRequest(
      { method: "patch", url: ITEMS_URL, json: { key: "value" }, headers: { Authorization: "Bearer test-token" } },
      settings,
    );

    const [request] = mockHttp.getRecordedRequests();
    expect(request.method).toBe("PATCH");
    expect(request.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-token" });
  });

  it("httpRequest rejects unsupported methods", async () => {
    const error = await expectRejection(httpRequest({ method: "options", url: ITEMS_URL }, settings), PermanentFailureError);

    expect(error.cause).toBeInstanceOf(InvalidRequestError);
  });

  it("honors the retry policy given in settings", async () => {
    mockHttp.enqueue("GET", ITEMS_URL, { status: 500 });

    const error = await expectRejection(
      httpGet(ITEMS_URL, {}, { ...settings, retryPolicy: { maxAttempts: 2, baseDelayMs: 25 } }),
      ExhaustedRetriesError,
    );

    expect(error.attempts).toBe(2);
    expect(mockHttp.getSleeps()).toEqual([25]);
  });
});
