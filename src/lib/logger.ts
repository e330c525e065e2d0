/**
 * Named, level-aware logging for the dashboard core.
 *
 * Usage:
 *   import { createLogger } from "@/lib/logger";
 *
 *   const logger = createLogger("FigureCache");
 *   logger.debug("miss %s", key);          // suppressed outside dev mode
 *   logger.warn("falling back to", axis);
 *
 * Output goes to the console unless a sink is installed with `setLogSink`
 * (the host application can forward records to its own transport).
 */

const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LOG_LEVELS;

export interface LogRecord {
  level: LogLevel;
  name: string;
  args: unknown[];
}

export type LogSink = (record: LogRecord) => void;

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVELS;
}

function initialLevel(): LogLevel {
  const configured: unknown = import.meta.env?.VITE_LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return import.meta.env?.DEV ? "debug" : "warn";
}

let currentLevel: LogLevel = initialLevel();

const consoleSink: LogSink = ({ level, name, args }) => {
  const prefix = `[${name}]`;
  switch (level) {
    case "debug":
      console.debug(prefix, ...args);
      break;
    case "info":
      console.log(prefix, ...args);
      break;
    case "warn":
      console.warn(prefix, ...args);
      break;
    case "error":
      console.error(prefix, ...args);
      break;
  }
};

let sink: LogSink = consoleSink;

/** Change the minimum log level at runtime. */
export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

/** Return the current minimum log level. */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Route log records somewhere other than the console.
 * Passing `null` restores console output.
 */
export function setLogSink(next: LogSink | null) {
  sink = next ?? consoleSink;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a named logger instance.
 *
 * Messages below the current log level are suppressed.
 * Errors are always emitted regardless of level.
 */
export function createLogger(name: string): Logger {
  const emit = (level: LogLevel, args: unknown[]) => {
    if (level !== "error" && LOG_LEVELS[currentLevel] > LOG_LEVELS[level]) return;
    sink({ level, name, args });
  };

  return {
    debug: (...args: unknown[]) => emit("debug", args),
    info: (...args: unknown[]) => emit("info", args),
    warn: (...args: unknown[]) => emit("warn", args),
    error: (...args: unknown[]) => emit("error", args),
  };
}
