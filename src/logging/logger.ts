/**
 * Lightweight leveled logger.
 * Writes timestamped, run-tagged lines to the console and to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

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
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "data/logs",
  logFile: "harvest.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that merges `bindings` into every entry's context */
  child(bindings: LogContext): Logger;
}

function formatLogEntry(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;
  if (Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }
  return entry;
}

/** Errors serialize to `{}` by default; keep name and message. */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

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

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function write(level: LogLevel, message: string, context: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    if (opts.console) {
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

  function bind(bindings: LogContext): Logger {
    const merge = (context?: LogContext): LogContext => ({ ...bindings, ...context });
    return {
      debug: (message, context) => write("debug", message, merge(context)),
      info: (message, context) => write("info", message, merge(context)),
      warn: (message, context) => write("warn", message, merge(context)),
      error: (message, context) => write("error", message, merge(context)),
      child: (more) => bind({ ...bindings, ...more }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything. Used where a collaborator requires a
 * logger but the caller wants no output.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
