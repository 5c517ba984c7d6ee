/**
 * Runner type definitions
 *
 * Types for the command-line entrypoint that executes pipeline stages.
 */

import type { RunStage } from "./db";
import type { LogLevel } from "./logger";

/**
 * Value of RUN_STAGE: one stage, or every stage in order
 */
export type RunnerStage = RunStage | "all";

/**
 * Status of a single stage within a runner sequence
 *
 * - DONE: Stage completed (collection may still have stopped early)
 * - ERROR: Stage threw or ended aborted
 */
export type RunnerStepStatus = "DONE" | "ERROR";

/**
 * Result of a single runner step
 */
export type RunnerStepResult = {
  stage: RunStage;
  status: RunnerStepStatus;
  /** Run ID in pipeline_runs */
  runId?: number;
  /** Arbitrary counters (items processed, saved, etc.) */
  counters?: Record<string, number>;
  /** Optional note (error message, status detail, etc.) */
  note?: string;
};

/**
 * Result of a sequential runner execution (one or more stages)
 */
export type RunnerSequenceResult = {
  total: number;
  success: number;
  failed: number;
  stepResults: RunnerStepResult[];
};

/**
 * Runner configuration resolved from the environment
 */
export type RunnerConfig = {
  stage: RunnerStage;
  logLevel: LogLevel;
  snapshotPath: string;
  duplicateThreshold: number;
  taxonomyPath: string;
  embeddings: {
    url: string;
    model: string;
    apiKey?: string;
  } | null;
};
