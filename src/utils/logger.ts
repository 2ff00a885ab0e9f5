/**
 * Console logger shared by all components.
 *
 * Output: `<ISO timestamp> [Component] [LEVEL] message...`, coloured per level
 * and filtered by `config.logging.level`.
 */

import { config, type LogLevel } from "../config.ts";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const RESET = "\x1b[0m";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function write(prefix: string, level: LogLevel, args: unknown[]): void {
  if (!config.logging.console || LEVEL_ORDER[level] < LEVEL_ORDER[config.logging.level]) {
    return;
  }
  const timestamp = new Date().toISOString();
  const line = `${LEVEL_COLORS[level]}${timestamp} [${prefix}] [${level.toUpperCase()}]${RESET}`;
  if (level === "error") {
    console.error(line, ...args);
  } else if (level === "warn") {
    console.warn(line, ...args);
  } else {
    console.log(line, ...args);
  }
}

/**
 * Create a logger bound to a component prefix, e.g. `createLogger("BrewTracker")`.
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args) => write(prefix, "debug", args),
    info: (...args) => write(prefix, "info", args),
    warn: (...args) => write(prefix, "warn", args),
    error: (...args) => write(prefix, "error", args),
  };
}
