/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/** Severity order; a message is written when it ranks at or above the threshold */
export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "info";
