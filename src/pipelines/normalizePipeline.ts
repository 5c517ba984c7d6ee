/**
 * Normalization pipeline entrypoint
 *
 * collected postings → record normalizer → normalized postings store,
 * inside a tracked run.
 */

import type { RunNormalizationResult } from "@/types";
import { CollectedPostingStore } from "@/collection";
import { NormalizedPostingStore, runNormalization } from "@/normalization";
import { withRun } from "./runLifecycle";
import * as logger from "@/logger";

export type RunNormalizePipelineResult = {
  runId: number;
  result: RunNormalizationResult;
};

export async function runNormalizePipeline(): Promise<RunNormalizePipelineResult> {
  return withRun("normalize", async (runId, acc) => {
    const runLogger = logger.withContext({ runId, stage: "normalize" });
    const result = runNormalization(
      { source: new CollectedPostingStore(), store: new NormalizedPostingStore() },
      acc,
      runLogger,
    );

    runLogger.info("Normalization run completed", {
      processed: result.processed,
      savedComplete: result.savedComplete,
      savedIncomplete: result.savedIncomplete,
      duplicates: result.duplicates,
      failed: result.failed,
    });

    return { runId, result };
  });
}
