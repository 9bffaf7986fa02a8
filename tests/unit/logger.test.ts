/**
 * Unit tests for the micro-logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as logger from "@/logger";

describe("logger", () => {
  const originalLevel = logger.getLogLevel();

  beforeEach(() => {
    logger.setLogLevel("info");
  });

  afterEach(() => {
    logger.setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  it("writes timestamped lines with JSON meta", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.info("hello", { a: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] hello \{"a":1\}$/);
  });

  it("omits empty meta", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.info("plain", {});

    expect(log.mock.calls[0][0]).toMatch(/\[INFO\] plain$/);
  });

  it("filters messages below the current level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.debug("hidden");
    expect(log).not.toHaveBeenCalled();

    logger.setLogLevel("debug");
    logger.debug("shown");
    expect(log).toHaveBeenCalledTimes(1);
  });

  it("routes warn and error to their console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.warn("careful");
    logger.error("broken");

    expect(warn.mock.calls[0][0]).toMatch(/\[WARN\] careful$/);
    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] broken$/);
  });

  it("merges bound context into every call", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.withContext({ channel: "channel-1" }).info("sent", { status: 200 });

    expect(log.mock.calls[0][0]).toMatch(/ sent \{"channel":"channel-1","status":200\}$/);
  });

  it("reports whether a level is enabled", () => {
    logger.setLogLevel("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  describe("resolveLogLevel", () => {
    it("accepts known levels in any case", () => {
      expect(logger.resolveLogLevel("DEBUG")).toBe("debug");
      expect(logger.resolveLogLevel(" warn ")).toBe("warn");
    });

    it("falls back to info", () => {
      expect(logger.resolveLogLevel("verbose")).toBe("info");
      expect(logger.resolveLogLevel(undefined)).toBe("info");
    });
  });
});
