/**
 * Structured Logging Utility
 *
 * Consistent pino-style logging for the watcher, its workers and the admin server.
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error, fatal
 * - Structured context on every entry
 * - Child loggers carrying bindings (service, address, cycle)
 * - LOG_LEVEL / LOG_PRETTY / NODE_ENV driven defaults
 * - Colored single-line output in development, JSON lines in production
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Admin server listening', { port: 8080 });
 *
 *   const log = logger.child({ service: 'ScanOrchestrator' });
 *   log.warn({ address }, 'Address scan failed');
 */

// ============================================================================
// Types
// ============================================================================

/** Log levels in order of severity */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/** Log context/metadata */
export interface LogContext {
  /** Component name */
  service?: string;
  /** Cycle sequence number, when logged from the scan loop */
  cycle?: number;
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

/** Where formatted lines are written; defaults to the console */
export type LogSink = (level: LogLevel, line: string) => void;

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service/component name for this logger */
  name?: string;
  prettyPrint: boolean;
  /** Base context for all log entries */
  base?: LogContext;
  sink?: LogSink;
}

/** Logger interface (pino-compatible) */
export interface Logger {
  level: LogLevel;
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

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  if (process.env.NODE_ENV === "test") {
    return "warn";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Check if we should pretty print
 */
function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  if (process.env.LOG_PRETTY === "true") {
    return true;
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
// Formatting
// ============================================================================

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry): string {
  const clock = entry.time.split("T")[1]?.replace("Z", "") ?? entry.time;
  const time = COLORS.dim + clock + COLORS.reset;
  const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + COLORS.reset;
  const name =
    typeof entry.service === "string" ? `${COLORS.cyan}[${entry.service}]${COLORS.reset} ` : "";

  const context: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!RESERVED_KEYS.has(key)) {
      context[key] = value;
    }
  }

  const contextStr =
    Object.keys(context).length > 0 ? ` ${COLORS.dim}${JSON.stringify(context)}${COLORS.reset}` : "";

  return `${time} ${level} ${name}${entry.msg}${contextStr}`;
}

/* eslint-disable no-console */
function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
    case "fatal":
      console.error(line);
      break;
  }
}
/* eslint-enable no-console */

/**
 * Accept both (msg, context) and (context, msg) call shapes
 */
function parseArgs(
  arg1: string | LogContext,
  arg2?: string | LogContext
): { msg: string; context: LogContext } {
  if (typeof arg1 === "string") {
    return { msg: arg1, context: typeof arg2 === "object" ? arg2 : {} };
  }
  return { msg: typeof arg2 === "string" ? arg2 : "", context: arg1 };
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a structured logger instance
 */
function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    base: config.base ?? {},
    sink: config.sink ?? consoleSink,
  };

  const threshold = LOG_LEVELS[fullConfig.level];
  const sink = fullConfig.sink ?? consoleSink;

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (LOG_LEVELS[level] < threshold) {
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

    sink(level, fullConfig.prettyPrint ? formatPretty(entry) : formatJson(entry));
  }

  function at(level: LogLevel) {
    return (arg1: string | LogContext, arg2?: string | LogContext): void => {
      const { msg, context } = parseArgs(arg1, arg2);
      output(level, msg, context);
    };
  }

  return {
    level: fullConfig.level,
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    fatal: at("fatal"),
    child(bindings: LogContext): Logger {
      return createLogger({
        ...fullConfig,
        name: bindings.service ?? fullConfig.name,
        base: { ...fullConfig.base, ...bindings },
      });
    },
  };
}

// ============================================================================
// Singleton logger instance
// ============================================================================

export const logger = createLogger({
  name: "ledger-watch",
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

const cache = new Map<string, Logger>();

function lazy(serviceName: string): Logger {
  let existing = cache.get(serviceName);
  if (!existing) {
    existing = createServiceLogger(serviceName);
    cache.set(serviceName, existing);
  }
  return existing;
}

export const serviceLoggers = {
  get store(): Logger {
    return lazy("EventStore");
  },
  get api(): Logger {
    return lazy("HyperliquidAPI");
  },
  get detector(): Logger {
    return lazy("ClusterDetector");
  },
  get watchlist(): Logger {
    return lazy("Watchlist");
  },
  get orchestrator(): Logger {
    return lazy("ScanOrchestrator");
  },
  get notifier(): Logger {
    return lazy("Notifier");
  },
  get health(): Logger {
    return lazy("FetchHealth");
  },
  get admin(): Logger {
    return lazy("AdminServer");
  },
  get startup(): Logger {
    return lazy("Startup");
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
