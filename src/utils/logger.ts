/**
 * Structured Logging Utility
 *
 * Provides a consistent logging interface throughout the scorer.
 * Uses a pino-style API so the backend can be swapped for pino later.
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error, fatal (and silent)
 * - Structured logging with context/metadata
 * - Child loggers for service-specific logging
 * - Environment-based log level configuration
 * - Pretty printing in development, JSON output in production
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Run started', { wallets: 120 });
 *
 *   const log = logger.child({ service: 'Collector' });
 *   log.warn('Retrying chain', { chainId: 137, attempt: 2 });
 */

// ============================================================================
// Types
// ============================================================================

/** Log levels in order of severity */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Levels that can actually be emitted */
export type EmittedLogLevel = Exclude<LogLevel, "silent">;

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

/** Log context/metadata */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Run identifier for correlating a batch */
  runId?: string;
  /** Wallet being processed */
  wallet?: string;
  /** Additional context */
  [key: string]: unknown;
}

/** Log entry structure */
export interface LogEntry {
  time: string;
  level: EmittedLogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service/component name for this logger */
  name?: string;
  /** Pretty print in development */
  prettyPrint: boolean;
  /** Base context for all log entries */
  base?: LogContext;
  /** Output sink, defaults to the console */
  write?: (level: EmittedLogLevel, line: string) => void;
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

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  if (process.env.NODE_ENV === "test") {
    return "silent";
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

const LEVEL_COLORS: Record<EmittedLogLevel, string> = {
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

function consoleWrite(level: EmittedLogLevel, line: string): void {
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

/**
 * Format a log entry for pretty printing
 */
function formatPretty(entry: LogEntry): string {
  const timeParts = entry.time.split("T");
  const time = COLORS.dim + (timeParts[1]?.replace("Z", "") ?? entry.time) + COLORS.reset;
  const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + COLORS.reset;
  const name =
    typeof entry.service === "string" ? COLORS.cyan + `[${entry.service}]` + COLORS.reset + " " : "";

  const context: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!RESERVED_KEYS.has(key)) {
      context[key] = value;
    }
  }

  const contextStr =
    Object.keys(context).length > 0 ? " " + COLORS.dim + JSON.stringify(context) + COLORS.reset : "";

  return `${time} ${level} ${name}${entry.msg}${contextStr}`;
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
    write: config.write ?? consoleWrite,
  };

  const currentLevelNum = LOG_LEVELS[fullConfig.level];
  const write = fullConfig.write ?? consoleWrite;

  function output(level: EmittedLogLevel, msg: string, context: LogContext): void {
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

    write(level, fullConfig.prettyPrint ? formatPretty(entry) : JSON.stringify(entry));
  }

  /**
   * Support both (msg, context) and (context, msg) call patterns
   */
  function log(level: EmittedLogLevel, arg1: string | LogContext, arg2?: string | LogContext): void {
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
    trace: (arg1: string | LogContext, arg2?: string | LogContext) => log("trace", arg1, arg2),
    debug: (arg1: string | LogContext, arg2?: string | LogContext) => log("debug", arg1, arg2),
    info: (arg1: string | LogContext, arg2?: string | LogContext) => log("info", arg1, arg2),
    warn: (arg1: string | LogContext, arg2?: string | LogContext) => log("warn", arg1, arg2),
    error: (arg1: string | LogContext, arg2?: string | LogContext) => log("error", arg1, arg2),
    fatal: (arg1: string | LogContext, arg2?: string | LogContext) => log("fatal", arg1, arg2),
    child,
  };
}

// ============================================================================
// Singleton logger instance
// ============================================================================

/**
 * Default logger instance for the application
 */
export const logger = createLogger({
  name: "wallet-risk-scorer",
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

let _collectorLogger: Logger | null = null;
let _balancesLogger: Logger | null = null;
let _pipelineLogger: Logger | null = null;
let _checkpointLogger: Logger | null = null;

export const serviceLoggers = {
  get collector(): Logger {
    if (!_collectorLogger) {
      _collectorLogger = createServiceLogger("Collector");
    }
    return _collectorLogger;
  },

  get balances(): Logger {
    if (!_balancesLogger) {
      _balancesLogger = createServiceLogger("BalancesClient");
    }
    return _balancesLogger;
  },

  get pipeline(): Logger {
    if (!_pipelineLogger) {
      _pipelineLogger = createServiceLogger("Pipeline");
    }
    return _pipelineLogger;
  },

  get checkpoint(): Logger {
    if (!_checkpointLogger) {
      _checkpointLogger = createServiceLogger("Checkpoint");
    }
    return _checkpointLogger;
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
