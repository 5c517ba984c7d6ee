/**
 * Runner core: executes the requested pipeline stages in order
 *
 * collect → normalize → classify. With RUN_STAGE=all a stage that fails
 * (throws, or collection ends aborted) stops the sequence; later stages
 * would only work on stale data.
 */

import type {
  EmbeddingProvider,
  RunStage,
  RunnerConfig,
  RunnerSequenceResult,
  RunnerStepResult,
} from "@/types";
import { openDb, applyMigrations } from "@/db";
import {
  runClassifyPipeline,
  runCollectPipeline,
  runNormalizePipeline,
} from "@/pipelines";
import { SnapshotPageSource, formatRunReport } from "@/collection";
import { HashedNgramEmbeddingProvider } from "@/classification";
import { EmbeddingsClient } from "@/clients/embeddings";
import * as logger from "@/logger";

export type RunStagesOptions = {
  signal?: AbortSignal;
  /** Overrides the provider chosen from config (tests) */
  embeddingProvider?: EmbeddingProvider;
};

function stagesFor(config: RunnerConfig): RunStage[] {
  return config.stage === "all" ? ["collect", "normalize", "classify"] : [config.stage];
}

function buildEmbeddingProvider(config: RunnerConfig): EmbeddingProvider {
  if (config.embeddings) {
    return new EmbeddingsClient({
      baseUrl: config.embeddings.url,
      model: config.embeddings.model,
      apiKey: config.embeddings.apiKey,
    });
  }
  return new HashedNgramEmbeddingProvider();
}

async function runStage(
  stage: RunStage,
  config: RunnerConfig,
  options: RunStagesOptions,
): Promise<RunnerStepResult> {
  switch (stage) {
    case "collect": {
      const result = await runCollectPipeline({
        source: new SnapshotPageSource(config.snapshotPath),
        duplicateThreshold: config.duplicateThreshold,
        signal: options.signal,
      });
      logger.info(formatRunReport(result.stats, result.status, result.storeCounts));
      return {
        stage,
        status: result.status === "aborted" ? "ERROR" : "DONE",
        runId: result.runId,
        counters: {
          savedComplete: result.stats.savedComplete,
          savedIncomplete: result.stats.savedIncomplete,
          duplicates: result.stats.duplicates,
          failed: result.stats.failed,
        },
        note: result.status,
      };
    }
    case "normalize": {
      const { runId, result } = await runNormalizePipeline();
      return {
        stage,
        status: "DONE",
        runId,
        counters: {
          processed: result.processed,
          savedComplete: result.savedComplete,
          savedIncomplete: result.savedIncomplete,
          failed: result.failed,
        },
      };
    }
    case "classify": {
      const { runId, result } = await runClassifyPipeline({
        provider: options.embeddingProvider ?? buildEmbeddingProvider(config),
        taxonomyPath: config.taxonomyPath,
      });
      return {
        stage,
        status: "DONE",
        runId,
        counters: {
          processed: result.processed,
          classified: result.classified,
          skipped: result.skipped,
          failed: result.failed,
        },
      };
    }
  }
}

/**
 * Run the configured stages once against the database at DB_PATH
 *
 * Errors from a stage are caught and reported in its step result.
 */
export async function runStages(
  config: RunnerConfig,
  options: RunStagesOptions = {},
): Promise<RunnerSequenceResult> {
  applyMigrations(openDb());

  const stepResults: RunnerStepResult[] = [];
  for (const stage of stagesFor(config)) {
    if (options.signal?.aborted) {
      break;
    }

    let step: RunnerStepResult;
    try {
      step = await runStage(stage, config, options);
    } catch (error) {
      logger.error("Stage failed", {
        stage,
        error: error instanceof Error ? error.message : String(error),
      });
      step = {
        stage,
        status: "ERROR",
        note: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      };
    }

    stepResults.push(step);
    if (step.status === "ERROR") {
      break;
    }
  }

  const success = stepResults.filter((s) => s.status === "DONE").length;
  return {
    total: stepResults.length,
    success,
    failed: stepResults.length - success,
    stepResults,
  };
}
