/**
 * Runner entrypoint: executes pipeline stages once and exits
 *
 * Usage:
 *   npm start                      # all stages
 *   RUN_STAGE=collect npm start    # one stage
 *
 * Environment variables:
 *   - RUN_STAGE: collect | normalize | classify | all (default all)
 *   - DB_PATH: Path to SQLite database file (optional, defaults to data/app.db)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - SNAPSHOT_PATH: Listing snapshot replayed by the collect stage
 *   - DUPLICATE_THRESHOLD: Consecutive duplicates that end collection (default 10)
 *   - TAXONOMY_PATH: Occupational taxonomy JSON (default data/taxonomy.json)
 *   - EMBEDDINGS_URL / EMBEDDINGS_MODEL / EMBEDDINGS_API_KEY: Remote embeddings
 *     service; the local hashed embeddings are used when unset
 *
 * Ctrl-C cancels the running collection between items; postings already
 * stored are kept.
 */

import "dotenv/config";
import { readRunnerConfig } from "./orchestration/runnerConfig";
import { runStages } from "./orchestration/runner";
import { closeDb } from "./db";
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK } from "./constants";
import * as logger from "./logger";

async function main(): Promise<number> {
  const config = readRunnerConfig();
  logger.setLogLevel(config.logLevel);
  const controller = new AbortController();

  process.once("SIGINT", () => {
    logger.warn("Interrupt received, stopping after the current item");
    controller.abort();
  });

  logger.info("Starting runner", { stage: config.stage });

  try {
    const result = await runStages(config, { signal: controller.signal });

    logger.info("Runner finished", {
      total: result.total,
      success: result.success,
      failed: result.failed,
      steps: result.stepResults.map((s) => `${s.stage}:${s.status}`),
    });

    if (controller.signal.aborted) {
      return EXIT_INTERRUPTED;
    }
    return result.failed > 0 ? EXIT_FAILURE : EXIT_OK;
  } finally {
    closeDb();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(EXIT_FAILURE);
  });
