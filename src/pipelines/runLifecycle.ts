/**
 * Run lifecycle helpers: track stage runs in the database
 *
 * One run = one execution of a single stage (collect, normalize or classify).
 * These helpers ensure every run is finalized, even when the stage throws.
 */

import type { RunAccumulator, RunCounters, RunStage, RunStatus } from "@/types";
import { createRun, finishRun as repoFinishRun } from "@/db";

/**
 * Start a new run for a stage
 *
 * @returns The run ID
 */
export function startRun(stage: RunStage): number {
  return createRun(stage);
}

/**
 * Finish a run with status and optional counters
 */
export function finishRun(
  runId: number,
  status: RunStatus,
  counters?: RunCounters,
): void {
  repoFinishRun(runId, {
    finished_at: new Date().toISOString(),
    status,
    ...counters,
  });
}

/**
 * Create a fresh run accumulator for tracking counters during execution
 *
 * @returns A mutable accumulator with zeroed counters
 */
export function createRunAccumulator(): RunAccumulator {
  return {
    counters: {
      pages_processed: 0,
      items_encountered: 0,
      saved_complete: 0,
      saved_incomplete: 0,
      duplicates: 0,
      failed: 0,
      errors: [],
    },
  };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On success: status = `acc.status` if the stage set one, else "success".
 * On error: status = "failure", then rethrows the error.
 *
 * Counters are persisted in the `finally` block, so whatever the stage
 * counted before throwing is kept.
 *
 * @param stage - The stage being run
 * @param fn - Async function to execute, receives (runId, acc)
 * @returns The result of fn
 */
export async function withRun<T>(
  stage: RunStage,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(stage);
  const acc = createRunAccumulator();
  let succeeded = false;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } finally {
    finishRun(runId, succeeded ? (acc.status ?? "success") : "failure", acc.counters);
  }
}
