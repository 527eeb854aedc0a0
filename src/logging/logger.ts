/**
 * Lightweight logging utility.
 * Outputs to console and/or a log file with timestamps and run ID.
 *
 * Loggers carry bindings: key/value pairs merged into every entry's
 * context. `child()` adds bindings for a narrower scope (one run, one
 * agent) without touching the parent. A `runId` binding replaces the
 * process run ID in the entry prefix.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

/** Receives each formatted line; replaces console output when set */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Context merged into every entry */
  bindings?: LogContext;
  /** Custom line sink (tests, embedding applications) */
  sink?: LogSink;
  /** Timestamp source */
  now?: () => Date;
}

interface ResolvedOptions {
  level: LogLevel;
  logDir: string;
  logFile: string;
  console: boolean;
  file: boolean;
  bindings: LogContext;
  sink: LogSink | undefined;
  now: () => Date;
}

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
  bindings: {},
  sink: undefined,
  now: () => new Date(),
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose entries also carry `bindings` */
  child(bindings: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  timestamp: Date,
  level: LogLevel,
  message: string,
  context: LogContext
): string {
  const { runId, ...rest } = context;
  const runLabel = typeof runId === "string" ? runId : (getRunId() ?? "no-run-id");
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp.toISOString()}] [${levelStr}] [${runLabel}] ${message}`;

  if (Object.keys(rest).length > 0) {
    entry += ` ${JSON.stringify(rest, jsonReplacer)}`;
  }

  return entry;
}

/** Errors stringify to `{}` by default */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

function buildLogger(opts: ResolvedOptions, logFilePath: string): Logger {
  function log(level: LogLevel, message: string, context?: LogContext): void {
    // Check if this level should be logged
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(opts.now(), level, message, {
      ...opts.bindings,
      ...context,
    });

    if (opts.sink) {
      opts.sink(level, entry);
    } else if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${String(err)}`);
      }
    }
  }

  return {
    level: opts.level,
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (bindings) =>
      buildLogger({ ...opts, bindings: { ...opts.bindings, ...bindings } }, logFilePath),
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: ResolvedOptions = {
    level: options.level ?? DEFAULT_OPTIONS.level,
    logDir: options.logDir ?? DEFAULT_OPTIONS.logDir,
    logFile: options.logFile ?? DEFAULT_OPTIONS.logFile,
    console: options.console ?? DEFAULT_OPTIONS.console,
    file: options.file ?? DEFAULT_OPTIONS.file,
    bindings: options.bindings ?? DEFAULT_OPTIONS.bindings,
    sink: options.sink,
    now: options.now ?? DEFAULT_OPTIONS.now,
  };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  return buildLogger(opts, logFilePath);
}

/**
 * Logger that drops everything. Default for library components that were
 * not handed one.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
