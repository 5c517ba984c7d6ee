/**
 * Micro-logger: console output with level filtering and bound context
 *
 * Lines read `[ISO timestamp] [LEVEL] message {"meta":...}`. Debug and info
 * go to stdout, warn and error to stderr.
 */

import type { Logger, LogLevel, LogMeta } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// Resolved from LOG_LEVEL on first use unless set explicitly
let activeLevel: LogLevel | null = null;

export function getLogLevel(): LogLevel {
  if (activeLevel === null) {
    const fromEnv = process.env.LOG_LEVEL;
    activeLevel = isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
  }
  return activeLevel;
}

/** Override the threshold; null goes back to LOG_LEVEL */
export function setLogLevel(level: LogLevel | null): void {
  activeLevel = level;
}

function write(level: LogLevel, message: string, meta: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[getLogLevel()]) {
    return;
  }

  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`;

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a logger whose context is merged under every call's meta
 */
export function withContext(context: LogMeta): Logger {
  const bind =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void =>
      write(level, message, { ...context, ...meta });

  return {
    debug: bind("debug"),
    info: bind("info"),
    warn: bind("warn"),
    error: bind("error"),
  };
}

const root = withContext({});

export const debug = root.debug;
export const info = root.info;
export const warn = root.warn;
export const error = root.error;
