/**
 * Runner configuration: read and validate environment variables
 *
 * Invalid values throw with the variable name; unset values fall back to
 * the defaults in @/constants.
 */

import type { LogLevel, RunnerConfig, RunnerStage } from "@/types";
import { isLogLevel } from "@/logger";
import {
  DEFAULT_DUPLICATE_THRESHOLD,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  DEFAULT_RUN_STAGE,
  DEFAULT_SNAPSHOT_PATH,
  RUN_STAGES,
  TAXONOMY_PATH,
} from "@/constants";

export class RunnerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunnerConfigError";
  }
}

function isRunnerStage(value: string): value is RunnerStage {
  return RUN_STAGES.some((stage) => stage === value);
}

function readStage(env: NodeJS.ProcessEnv): RunnerStage {
  const value = (env.RUN_STAGE || DEFAULT_RUN_STAGE).toLowerCase();
  if (!isRunnerStage(value)) {
    throw new RunnerConfigError(
      `RUN_STAGE must be one of ${RUN_STAGES.join(", ")}, got "${value}"`,
    );
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const value = (env.LOG_LEVEL || DEFAULT_LOG_LEVEL).toLowerCase();
  if (!isLogLevel(value)) {
    throw new RunnerConfigError(
      `LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS).join(", ")}, got "${value}"`,
    );
  }
  return value;
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim()) || parseInt(raw, 10) < 1) {
    throw new RunnerConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function readRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const embeddingsUrl = env.EMBEDDINGS_URL?.trim();
  const embeddingsModel = env.EMBEDDINGS_MODEL?.trim();

  if (embeddingsUrl && !embeddingsModel) {
    throw new RunnerConfigError("EMBEDDINGS_MODEL is required when EMBEDDINGS_URL is set");
  }

  return {
    stage: readStage(env),
    logLevel: readLogLevel(env),
    snapshotPath: env.SNAPSHOT_PATH || DEFAULT_SNAPSHOT_PATH,
    duplicateThreshold: readPositiveInt(
      env,
      "DUPLICATE_THRESHOLD",
      DEFAULT_DUPLICATE_THRESHOLD,
    ),
    taxonomyPath: env.TAXONOMY_PATH || TAXONOMY_PATH,
    embeddings:
      embeddingsUrl && embeddingsModel
        ? {
            url: embeddingsUrl,
            model: embeddingsModel,
            apiKey: env.EMBEDDINGS_API_KEY || undefined,
          }
        : null,
  };
}
