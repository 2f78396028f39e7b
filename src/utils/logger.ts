/**
 * Structured Logging Utility
 *
 * Pino-style logger used by every stage of the screening run.
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error, fatal (plus "silent")
 * - Structured logging with context/metadata
 * - Child loggers for service-specific logging
 * - Level from LOG_LEVEL, pretty printing unless production or LOG_PRETTY=false
 *
 * Usage:
 *   import { logger } from "../utils/logger";
 *   logger.info("Run started", { lookbackDays: 7 });
 *
 *   const log = logger.child({ service: "WalletScreener" });
 *   log.warn({ wallet }, "Balance lookup failed");
 */

// ============================================================================
// Types
// ============================================================================

/** Log levels in order of severity */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Threshold accepted by a logger; "silent" suppresses everything */
export type LogThreshold = LogLevel | "silent";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogThreshold, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

/** Log context/metadata */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Additional context */
  [key: string]: unknown;
}

/** Log entry structure */
export interface LogEntry {
  time: string;
  level: LogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogThreshold;
  /** Service/component name for this logger */
  name?: string;
  prettyPrint: boolean;
  /** Base context for all log entries */
  base: LogContext;
}

/** Logger interface (pino-compatible) */
export interface Logger {
  level: LogThreshold;
  trace(msg: string, context?: LogContext): void;
  trace(context: LogContext, msg: string): void;
  debug(msg: string, context?: LogContext): void;
  debug(context: LogContext, msg: string): void;
  info(msg: string, context?: LogContext): void;
  info(context: LogContext, msg: string): void;
  warn(msg: string, context?: LogContext): void;
  warn(context: LogContext, msg: string): void;
  error(msg: string, context?: LogContext): void;
  error(context: LogContext, msg: string): void;
  fatal(msg: string, context?: LogContext): void;
  fatal(context: LogContext, msg: string): void;
  child(bindings: LogContext): Logger;
}

// ============================================================================
// Configuration
// ============================================================================

function isLogThreshold(value: string): value is LogThreshold {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogThreshold {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogThreshold(level)) {
    return level;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  return process.env.NODE_ENV !== "production";
}

// ============================================================================
// Color utilities for pretty printing
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.red + COLORS.bold,
};

const RESERVED_KEYS = new Set(["time", "level", "levelNum", "msg", "service"]);

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * JSON.stringify replacer: bigints (block numbers, raw token amounts) and
 * errors would otherwise throw or serialize as {}
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Create a structured logger instance
 */
function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    base: config.base ?? {},
  };

  const currentLevelNum = LOG_LEVELS[fullConfig.level];

  function formatPretty(entry: LogEntry): string {
    const clock = entry.time.split("T")[1]?.replace("Z", "") ?? entry.time;
    const time = COLORS.dim + clock + COLORS.reset;
    const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + COLORS.reset;
    const name =
      typeof entry.service === "string"
        ? COLORS.cyan + `[${entry.service}]` + COLORS.reset + " "
        : "";

    const context: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!RESERVED_KEYS.has(key)) {
        context[key] = value;
      }
    }

    const contextStr =
      Object.keys(context).length > 0
        ? " " + COLORS.dim + JSON.stringify(context, jsonReplacer) + COLORS.reset
        : "";

    return `${time} ${level} ${name}${entry.msg}${contextStr}`;
  }

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (LOG_LEVELS[level] < currentLevelNum) {
      return;
    }

    const entry: LogEntry = {
      time: new Date().toISOString(),
      level,
      levelNum: LOG_LEVELS[level],
      msg,
      ...fullConfig.base,
      ...context,
    };

    if (fullConfig.name) {
      entry.service = fullConfig.name;
    }

    const formatted = fullConfig.prettyPrint
      ? formatPretty(entry)
      : JSON.stringify(entry, jsonReplacer);

    switch (level) {
      case "trace":
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
      case "fatal":
        console.error(formatted);
        break;
    }
  }

  /**
   * Supports both (msg, context) and (context, msg) call forms
   */
  function emit(level: LogLevel, arg1: string | LogContext, arg2?: string | LogContext): void {
    if (typeof arg1 === "string") {
      output(level, arg1, typeof arg2 === "object" ? arg2 : {});
    } else {
      output(level, typeof arg2 === "string" ? arg2 : "", arg1);
    }
  }

  function child(bindings: LogContext): Logger {
    return createLogger({
      ...fullConfig,
      name: bindings.service ?? fullConfig.name,
      base: { ...fullConfig.base, ...bindings },
    });
  }

  return {
    level: fullConfig.level,
    trace: (arg1: string | LogContext, arg2?: string | LogContext) => emit("trace", arg1, arg2),
    debug: (arg1: string | LogContext, arg2?: string | LogContext) => emit("debug", arg1, arg2),
    info: (arg1: string | LogContext, arg2?: string | LogContext) => emit("info", arg1, arg2),
    warn: (arg1: string | LogContext, arg2?: string | LogContext) => emit("warn", arg1, arg2),
    error: (arg1: string | LogContext, arg2?: string | LogContext) => emit("error", arg1, arg2),
    fatal: (arg1: string | LogContext, arg2?: string | LogContext) => emit("fatal", arg1, arg2),
    child,
  };
}

// ============================================================================
// Singleton logger instance
// ============================================================================

export const logger = createLogger({
  name: "wallet-screener",
});

/**
 * Create a logger for a specific service
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

// ============================================================================
// Pre-configured service loggers (lazy initialization)
// ============================================================================

const serviceLoggerCache = new Map<string, Logger>();

function lazyServiceLogger(serviceName: string): Logger {
  let existing = serviceLoggerCache.get(serviceName);
  if (!existing) {
    existing = createServiceLogger(serviceName);
    serviceLoggerCache.set(serviceName, existing);
  }
  return existing;
}

export const serviceLoggers = {
  get screener(): Logger {
    return lazyServiceLogger("WalletScreener");
  },
  get oracle(): Logger {
    return lazyServiceLogger("BalanceOracle");
  },
  get trades(): Logger {
    return lazyServiceLogger("TradeWindow");
  },
  get markets(): Logger {
    return lazyServiceLogger("MarketDirectory");
  },
  get chain(): Logger {
    return lazyServiceLogger("PolygonClient");
  },
  get report(): Logger {
    return lazyServiceLogger("Report");
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
