export type LogLevel = "quiet" | "info" | "verbose";

const LEVELS: LogLevel[] = ["quiet", "info", "verbose"];

let currentLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((l) => l === value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger that prefixes every line with `[tag]`.
 * Warnings and errors are always printed; `quiet` drops info, only
 * `verbose` prints debug.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message) {
      if (currentLevel === "verbose") console.log(`${prefix} ${message}`);
    },
    info(message) {
      if (currentLevel !== "quiet") console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} Warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix} Error: ${message}`);
    },
  };
}
