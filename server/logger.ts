/**
 * Leveled console logger.
 */

import type { LogLevel } from "./config.js";

type Method = "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export type ConsoleLike = Pick<Console, Method>;

export function createLogger(level: LogLevel, target: ConsoleLike = console): Logger {
  const at =
    (method: Method) =>
    (...args: unknown[]): void => {
      if (LEVEL_ORDER[method] <= LEVEL_ORDER[level]) {
        target[method](...args);
      }
    };
  return {
    error: at("error"),
    warn: at("warn"),
    info: at("info"),
    debug: at("debug"),
  };
}
