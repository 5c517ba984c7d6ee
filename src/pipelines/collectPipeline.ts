/**
 * Collection pipeline entrypoint
 *
 * Connects a page source → collection orchestrator → collected postings store,
 * inside a tracked run. The page source is injected so tests can script it.
 */

import type {
  CollectionRunResult,
  PageSource,
  StoreCounts,
} from "@/types";
import { CollectedPostingStore, collectPostings } from "@/collection";
import { withRun } from "./runLifecycle";
import * as logger from "@/logger";

export type RunCollectPipelineInput = {
  source: PageSource;
  duplicateThreshold?: number;
  signal?: AbortSignal;
};

export type RunCollectPipelineResult = CollectionRunResult & {
  runId: number;
  storeCounts: StoreCounts;
};

export async function runCollectPipeline(
  input: RunCollectPipelineInput,
): Promise<RunCollectPipelineResult> {
  const store = new CollectedPostingStore();

  return withRun("collect", async (runId, acc) => {
    const before = store.count();
    const { status, stats } = await collectPostings({
      source: input.source,
      store,
      duplicateThreshold: input.duplicateThreshold,
      signal: input.signal,
      logger: logger.withContext({ runId, stage: "collect" }),
    });

    acc.status = status;
    acc.counters = {
      pages_processed: stats.pagesProcessed,
      items_encountered: stats.itemsEncountered,
      saved_complete: stats.savedComplete,
      saved_incomplete: stats.savedIncomplete,
      duplicates: stats.duplicates,
      failed: stats.failed,
      errors: stats.errors,
    };

    return { runId, status, stats, storeCounts: { before, after: store.count() } };
  });
}
