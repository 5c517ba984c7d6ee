/**
 * Title classification pipeline entrypoint
 *
 * taxonomy + embedding provider → title classifier → title_candidates,
 * inside a tracked run.
 */

import type { EmbeddingProvider, RunTitleClassificationResult } from "@/types";
import { TitleClassifier, loadTaxonomy, runTitleClassification } from "@/classification";
import { withRun } from "./runLifecycle";
import * as logger from "@/logger";

export type RunClassifyPipelineInput = {
  provider: EmbeddingProvider;
  taxonomyPath?: string;
};

export type RunClassifyPipelineResult = {
  runId: number;
  result: RunTitleClassificationResult;
};

export async function runClassifyPipeline(
  input: RunClassifyPipelineInput,
): Promise<RunClassifyPipelineResult> {
  return withRun("classify", async (runId, acc) => {
    const runLogger = logger.withContext({ runId, stage: "classify" });
    const taxonomy = loadTaxonomy(input.taxonomyPath);
    const classifier = await TitleClassifier.create(taxonomy, input.provider);

    const result = await runTitleClassification(classifier, acc, runLogger);

    runLogger.info("Classification run completed", {
      taxonomyVersion: taxonomy.version,
      provider: input.provider.name,
      processed: result.processed,
      classified: result.classified,
      skipped: result.skipped,
      failed: result.failed,
    });

    return { runId, result };
  });
}
