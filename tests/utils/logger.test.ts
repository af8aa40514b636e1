import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  createLogger,
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  isLogLevel,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  describe("log level filtering", () => {
    test("debug logs when level is debug", () => {
      setLogLevel("debug");
      debug("test message");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("debug is dropped at info", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn and error go to their own streams", () => {
      setLogLevel("info");
      info("i");
      warn("w");
      error("e");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("only errors at error level", () => {
      setLogLevel("error");
      info("i");
      warn("w");
      error("e");
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("formatMessage", () => {
    test("includes level, scope and message", () => {
      const line = formatMessage("info", "hello", undefined, "store");
      expect(line).toContain("INFO ");
      expect(line.endsWith("\x1b[0m [store] hello")).toBe(true);
    });

    test("appends errors by message and objects as JSON", () => {
      expect(formatMessage("error", "failed:", new Error("boom")).endsWith("failed: boom")).toBe(true);
      expect(formatMessage("debug", "data", { a: 1 }).endsWith('data {\n  "a": 1\n}')).toBe(true);
    });
  });

  describe("createLogger", () => {
    test("tags lines with its scope", () => {
      setLogLevel("info");
      createLogger("scheduler").info("tick");
      const [line] = consoleLogSpy.mock.calls[0] ?? [];
      expect(String(line).endsWith(" [scheduler] tick")).toBe(true);
    });
  });

  describe("isLogLevel", () => {
    test("accepts known levels only", () => {
      expect(isLogLevel("warn")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
