/**
 * Runner constants
 *
 * Environment variable names and defaults for the command-line entrypoint.
 */

import type { RunnerStage } from "@/types";

/**
 * Stage executed when RUN_STAGE is not set
 */
export const DEFAULT_RUN_STAGE: RunnerStage = "all";

/**
 * Accepted RUN_STAGE values
 */
export const RUN_STAGES: readonly RunnerStage[] = ["collect", "normalize", "classify", "all"];

/**
 * Listing snapshot replayed by the collect stage when SNAPSHOT_PATH is not set
 */
export const DEFAULT_SNAPSHOT_PATH = "data/listing-snapshot.json";

/**
 * Exit codes
 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** Run interrupted by SIGINT */
export const EXIT_INTERRUPTED = 130;
