/**
 * Run statistics: counters owned by a single collection run
 */

import type { CollectionOutcome, RunStatistics } from "@/types";
import { ERROR_LOG_CAP } from "@/constants";

export function createRunStatistics(now: Date = new Date()): RunStatistics {
  return {
    startedAt: now,
    finishedAt: null,
    pagesProcessed: 0,
    itemsEncountered: 0,
    savedComplete: 0,
    savedIncomplete: 0,
    duplicates: 0,
    failed: 0,
    retries: 0,
    consecutiveDuplicates: 0,
    errors: [],
    errorsDropped: 0,
  };
}

/**
 * Append to the error log; past the cap only the dropped count grows
 */
export function recordError(stats: RunStatistics, message: string): void {
  if (stats.errors.length < ERROR_LOG_CAP) {
    stats.errors.push(message);
  } else {
    stats.errorsDropped++;
  }
}

/**
 * Count one item outcome
 *
 * Saves reset the consecutive-duplicate counter; failures leave it as is.
 */
export function recordOutcome(
  stats: RunStatistics,
  outcome: CollectionOutcome,
  location: string,
): void {
  switch (outcome.kind) {
    case "saved_complete":
      stats.savedComplete++;
      stats.consecutiveDuplicates = 0;
      break;
    case "saved_incomplete":
      stats.savedIncomplete++;
      stats.consecutiveDuplicates = 0;
      break;
    case "duplicate":
      stats.duplicates++;
      stats.consecutiveDuplicates++;
      break;
    case "failed":
      stats.failed++;
      recordError(
        stats,
        outcome.postingId
          ? `${location} (${outcome.postingId}): ${outcome.reason}`
          : `${location}: ${outcome.reason}`,
      );
      break;
  }
}

export function finishRunStatistics(stats: RunStatistics, now: Date = new Date()): void {
  stats.finishedAt = now;
}

/**
 * Run duration in milliseconds (up to now while the run is still going)
 */
export function runDurationMs(stats: RunStatistics, now: Date = new Date()): number {
  return (stats.finishedAt ?? now).getTime() - stats.startedAt.getTime();
}
