/**
 * Pipeline runs repository (pipeline_runs)
 *
 * One row per stage execution. Rows are created as running and finished
 * once by the run lifecycle helpers.
 */

import type { PipelineRun, PipelineRunUpdate, RunCounters, RunStage } from "@/types";
import { getDb } from "../connection";

type SqlValue = string | number | null;

const NUMERIC_COUNTERS: ReadonlyArray<Exclude<keyof RunCounters, "errors">> = [
  "pages_processed",
  "items_encountered",
  "saved_complete",
  "saved_incomplete",
  "duplicates",
  "failed",
];

/**
 * Open a run for a stage
 *
 * @returns The new run id
 */
export function createRun(stage: RunStage): number {
  const result = getDb()
    .prepare<[RunStage]>("INSERT INTO pipeline_runs (stage) VALUES (?)")
    .run(stage);
  return Number(result.lastInsertRowid);
}

/**
 * Close a run with its final status. Counters left undefined keep their
 * stored value; errors are stored as a JSON array.
 */
export function finishRun(runId: number, update: PipelineRunUpdate): void {
  const assignments = ["finished_at = ?", "status = ?"];
  const values: SqlValue[] = [update.finished_at, update.status];

  for (const column of NUMERIC_COUNTERS) {
    const value = update[column];
    if (value !== undefined) {
      assignments.push(`${column} = ?`);
      values.push(value);
    }
  }
  if (update.errors !== undefined) {
    assignments.push("errors_json = ?");
    values.push(JSON.stringify(update.errors));
  }

  getDb()
    .prepare<SqlValue[]>(`UPDATE pipeline_runs SET ${assignments.join(", ")} WHERE id = ?`)
    .run(...values, runId);
}

export function getRunById(id: number): PipelineRun | undefined {
  return getDb()
    .prepare<[number], PipelineRun>("SELECT * FROM pipeline_runs WHERE id = ?")
    .get(id);
}
