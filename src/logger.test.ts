import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, isLogLevel, scopedLogger, silentLogger } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  it("routes levels to the matching console method", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("debug");

    logger.log("a", "debug");
    logger.log("b");
    logger.log("c", "warning");
    logger.log("d", "error");
    logger.log("e", "critical");

    expect(log).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[1]?.[0]).toMatch(/^\[INFO\] \[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] b$/);
    expect(error.mock.calls[1]?.[0]).toMatch(/^\[CRITICAL\] \[.+\] e$/);
  });

  it("drops messages below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("warning");

    logger.log("quiet", "info");
    logger.log("loud", "warning");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("scopedLogger", () => {
  it("prefixes the component name and keeps the level", () => {
    const inner = { log: vi.fn() };
    scopedLogger(inner, "Dispatcher:primary").log("Stopped", "info");
    expect(inner.log).toHaveBeenCalledWith("[Dispatcher:primary] Stopped", "info");
  });

  it("nests", () => {
    const inner = { log: vi.fn() };
    scopedLogger(scopedLogger(inner, "Outer"), "Inner").log("x", "debug");
    expect(inner.log).toHaveBeenCalledWith("[Outer] [Inner] x", "debug");
  });
});

describe("silentLogger", () => {
  it("accepts messages without output", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    silentLogger.log("nothing", "critical");
    expect(log).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("recognises the five levels", () => {
    expect(isLogLevel("warning")).toBe(true);
    expect(isLogLevel("warn")).toBe(false);
  });
});
