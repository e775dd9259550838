/**
 * Structured Logging Utility
 *
 * Consistent logging interface for the analysis pipeline.
 * Call signatures follow pino: (msg, context) or (context, msg).
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error, fatal
 * - Structured logging with context/metadata
 * - Child loggers per pipeline stage
 * - Environment-based log level configuration
 * - Pretty printing in development, JSON output otherwise
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Trace normalized', { validCount: 1200 });
 *
 *   const log = logger.child({ service: 'SessionSegmenter' });
 *   log.debug('Segmentation finished');
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
  /** Pipeline stage or component name */
  service?: string;
  /** Identifier of the run this entry belongs to */
  runId?: string;
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
  level: LogLevel;
  /** Component name attached as `service` */
  name?: string;
  prettyPrint: boolean;
  timestamp: boolean;
  /** Base context for all log entries */
  base?: LogContext;
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
 * Get log level from the LOG_LEVEL environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
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
 * Create a structured logger instance
 */
function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    timestamp: config.timestamp ?? true,
    base: config.base ?? {},
  };

  const currentLevelNum = LOG_LEVELS[fullConfig.level];

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= currentLevelNum;
  }

  function formatPretty(entry: LogEntry): string {
    const timeParts = entry.time.split("T");
    const time = entry.time
      ? COLORS.dim + (timeParts[1]?.replace("Z", "") ?? entry.time) + COLORS.reset + " "
      : "";
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
        ? " " + COLORS.dim + JSON.stringify(context) + COLORS.reset
        : "";

    return `${time}${level} ${name}${entry.msg}${contextStr}`;
  }

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (!shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      time: fullConfig.timestamp ? new Date().toISOString() : "",
      level,
      levelNum: LOG_LEVELS[level],
      msg,
      ...fullConfig.base,
      ...context,
    };

    if (fullConfig.name) {
      entry.service = fullConfig.name;
    }

    const formatted = fullConfig.prettyPrint ? formatPretty(entry) : JSON.stringify(entry);

    switch (level) {
      case "trace":
      case "debug":
        // eslint-disable-next-line no-console
        console.debug(formatted);
        break;
      case "info":
        // eslint-disable-next-line no-console
        console.info(formatted);
        break;
      case "warn":
        // eslint-disable-next-line no-console
        console.warn(formatted);
        break;
      case "error":
      case "fatal":
        // eslint-disable-next-line no-console
        console.error(formatted);
        break;
    }
  }

  /**
   * Support both (msg, context) and (context, msg) call patterns
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

  function child(bindings: LogContext): Logger {
    return createLogger({
      ...fullConfig,
      name: bindings.service ?? fullConfig.name,
      base: { ...fullConfig.base, ...bindings },
    });
  }

  function method(level: LogLevel) {
    return (arg1: string | LogContext, arg2?: string | LogContext): void => {
      const { msg, context } = parseArgs(arg1, arg2);
      output(level, msg, context);
    };
  }

  return {
    level: fullConfig.level,
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child,
  };
}

// ============================================================================
// Singleton logger instance
// ============================================================================

export const logger = createLogger({
  name: "trace-analytics",
});

/**
 * Create a logger for a specific pipeline stage
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

/**
 * Create a logger bound to one analysis run, optionally under a stage logger
 */
export function createRunLogger(runId: string, parent: Logger = logger): Logger {
  return parent.child({ runId });
}

// ============================================================================
// Pre-configured stage loggers (lazy initialization)
// ============================================================================

const stageLoggers = new Map<string, Logger>();

function lazyStageLogger(serviceName: string): Logger {
  let stageLogger = stageLoggers.get(serviceName);
  if (!stageLogger) {
    stageLogger = createServiceLogger(serviceName);
    stageLoggers.set(serviceName, stageLogger);
  }
  return stageLogger;
}

export const serviceLoggers = {
  get normalizer(): Logger {
    return lazyStageLogger("TimestampNormalizer");
  },

  get segmenter(): Logger {
    return lazyStageLogger("SessionSegmenter");
  },

  get windows(): Logger {
    return lazyStageLogger("WindowAggregator");
  },

  get variance(): Logger {
    return lazyStageLogger("VarianceDecomposer");
  },

  get concurrency(): Logger {
    return lazyStageLogger("ConcurrencyEstimator");
  },

  get sensitivity(): Logger {
    return lazyStageLogger("SensitivityRunner");
  },

  get analyzer(): Logger {
    return lazyStageLogger("TraceAnalyzer");
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
