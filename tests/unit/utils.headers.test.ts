/**
 * Unit tests for header helpers
 */

import { describe, it, expect } from "vitest";
import { hasHeader, mergeHeaders, redactHeaders } from "@/utils";

describe("redactHeaders", () => {
  it("hides credential-bearing values only", () => {
    expect(
      redactHeaders({ Authorization: "Bearer test-token", "x-api-key": "test-key", Accept: "application/json" }),
    ).toEqual({ Authorization: "[redacted]", "x-api-key": "[redacted]", Accept: "application/json" });
  });
});

describe("mergeHeaders", () => {
  it("lets later sources win regardless of case", () => {
    expect(mergeHeaders({ Accept: "text/plain", "X-A": "1" }, undefined, { accept: "application/json" })).toEqual({
      accept: "application/json",
      "X-A": "1",
    });
  });
});

describe("hasHeader", () => {
  it("matches names case-insensitively", () => {
    expect(hasHeader({ "Content-Type": "text/plain" }, "content-type")).toBe(true);
    expect(hasHeader({ Accept: "text/plain" }, "content-type")).toBe(false);
  });
});
