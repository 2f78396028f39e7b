/**
 * Logger Utility Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  LOG_LEVELS,
  createLogger,
  createServiceLogger,
  serviceLoggers,
  type LogLevel,
} from "../../src/utils/logger";

function lastJson(spy: ReturnType<typeof vi.spyOn>): unknown {
  const call = spy.mock.calls[spy.mock.calls.length - 1];
  return JSON.parse(String(call?.[0]));
}

describe("Logger Utility", () => {
  let consoleSpy: {
    debug: ReturnType<typeof vi.spyOn>;
    info: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
      info: vi.spyOn(console, "info").mockImplementation(() => {}),
      warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
      error: vi.spyOn(console, "error").mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("LOG_LEVELS", () => {
    it("should increase with severity", () => {
      const levels: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
      for (let i = 1; i < levels.length; i++) {
        const current = levels[i];
        const previous = levels[i - 1];
        if (current && previous) {
          expect(LOG_LEVELS[current]).toBeGreaterThan(LOG_LEVELS[previous]);
        }
      }
      expect(LOG_LEVELS.silent).toBe(Infinity);
    });
  });

  describe("createLogger", () => {
    it("should write JSON entries with context", () => {
      const log = createLogger({ level: "info", prettyPrint: false, name: "test" });

      log.info("Run started", { lookbackDays: 7 });

      expect(lastJson(consoleSpy.info)).toMatchObject({
        level: "info",
        levelNum: 30,
        msg: "Run started",
        lookbackDays: 7,
        service: "test",
      });
    });

    it("should accept the context-first call form", () => {
      const log = createLogger({ level: "info", prettyPrint: false });

      log.warn({ wallet: "0xabc" }, "Balance lookup failed");

      expect(lastJson(consoleSpy.warn)).toMatchObject({ msg: "Balance lookup failed", wallet: "0xabc" });
    });

    it("should drop entries below the configured level", () => {
      const log = createLogger({ level: "warn", prettyPrint: false });

      log.debug("hidden");
      log.info("hidden");
      log.error("shown");

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it("should write nothing when silent", () => {
      const log = createLogger({ level: "silent", prettyPrint: false });

      log.fatal("hidden");

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it("should serialize bigints and errors", () => {
      const log = createLogger({ level: "info", prettyPrint: false });

      log.info("Resolved", { blockNumber: 57000000n, error: new Error("boom") });

      expect(lastJson(consoleSpy.info)).toMatchObject({
        blockNumber: "57000000",
        error: { name: "Error", message: "boom" },
      });
    });

    it("should carry bindings into child loggers", () => {
      const log = createLogger({ level: "info", prettyPrint: false }).child({
        service: "WalletScreener",
        runId: "r1",
      });

      log.info("child entry");

      expect(lastJson(consoleSpy.info)).toMatchObject({ service: "WalletScreener", runId: "r1" });
    });

    it("should pretty print with the service name", () => {
      const log = createLogger({ level: "info", prettyPrint: true, name: "Report" });

      log.info("pretty entry");

      expect(String(consoleSpy.info.mock.calls[0]?.[0])).toContain("[Report]");
    });
  });

  describe("service loggers", () => {
    it("should return the same instance on each access", () => {
      expect(serviceLoggers.screener).toBe(serviceLoggers.screener);
    });

    it("should honour LOG_LEVEL from the environment", () => {
      expect(createServiceLogger("Any").level).toBe("silent");
    });
  });
});
