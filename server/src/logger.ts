/**
 * JSON-lines logger for the gateway process. Matches the Logger contract
 * used by the gateway packages (structured context + message) and hands out
 * prefixed child loggers through get(prefix).
 */

import type { Logger } from "@shelflight/gateway";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMethod = (ctx: object, msg: string) => void;

export interface LoggerInstance extends Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/**
 * Create a node-style logger factory. The factory itself logs under the
 * service name; get(prefix) returns a logger that also records the prefix.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel; sink?: LogSink } = {},
): LoggerInstance & { get: (prefix: string) => LoggerInstance } {
  const threshold = LEVELS[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const make = (prefix?: string): LoggerInstance => {
    const method =
      (level: LogLevel): LogMethod =>
      (ctx, msg) => {
        if (LEVELS[level] < threshold) return;
        const entry = { level, service: serviceName, ...(prefix ? { prefix } : {}), ...ctx, msg };
        sink(level, JSON.stringify(entry));
      };
    return {
      debug: method("debug"),
      info: method("info"),
      warn: method("warn"),
      error: method("error"),
    };
  };

  return { ...make(), get: (prefix: string) => make(prefix) };
}
