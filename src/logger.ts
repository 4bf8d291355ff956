/**
 * Scoped console logger honoring SM_LOG_LEVEL
 */

import { config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export function parseLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  return lower === "debug" || lower === "warn" || lower === "error" ? lower : "info";
}

/**
 * Console sink, swappable in tests
 */
export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(
  scope: string,
  level: LogLevel = parseLogLevel(config.LOG_LEVEL),
  sink: LogSink = console
): Logger {
  const min = LEVELS[level];
  const prefix = `[${scope}]`;

  return {
    debug(msg, ...args) {
      if (min <= LEVELS.debug) sink.log(prefix, msg, ...args);
    },
    info(msg, ...args) {
      if (min <= LEVELS.info) sink.log(prefix, msg, ...args);
    },
    warn(msg, ...args) {
      if (min <= LEVELS.warn) sink.warn(prefix, msg, ...args);
    },
    error(msg, ...args) {
      // Errors go out with their stack
      const detail = args.map((a) => (a instanceof Error ? a.stack ?? a.message : a));
      if (min <= LEVELS.error) sink.error(prefix, msg, ...detail);
    },
  };
}
