/**
 * Logger that records messages instead of printing them
 */

import type { Logger, LogLevel } from "@/types";

export type RecordedLog = {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
};

export function createRecordingLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      entries.push({ level, message, meta });
    };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
