/**
 * @lxconf/logger
 *
 * Structured logging with per-session identifiers for configuration reads
 */

import { nanoid } from "nanoid";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  sessionId: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Partial<LogContext>): Logger;
}

/**
 * Receives one serialized entry per call
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
  /** Destination for serialized entries (default: console) */
  sink?: LogSink;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  sessionId: string;
  message: string;
  [key: string]: unknown;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
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
      console.error(line);
      break;
  }
};

/**
 * Sink writing every entry to stderr, keeping stdout free for command output
 */
export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a structured logger bound to a session
 */
export function createLogger(context: LogContext, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? consoleSink;

  const write = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      sessionId: context.sessionId,
      message,
      ...Object.fromEntries(
        Object.entries(context).filter(([key]) => key !== "sessionId")
      ),
      ...meta,
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (childContext) =>
      createLogger(
        {
          ...context,
          ...childContext,
          sessionId: childContext.sessionId ?? context.sessionId,
        },
        options
      ),
  };
}

/**
 * Generate a unique identifier for one configuration read
 */
export function generateSessionId(): string {
  return `cfg_${nanoid(12)}`;
}
