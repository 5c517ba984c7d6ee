/**
 * Pipelines barrel exports
 */

export {
  startRun,
  finishRun,
  withRun,
  createRunAccumulator,
} from "./runLifecycle";
export { runCollectPipeline } from "./collectPipeline";
export type { RunCollectPipelineInput, RunCollectPipelineResult } from "./collectPipeline";
export { runNormalizePipeline } from "./normalizePipeline";
export type { RunNormalizePipelineResult } from "./normalizePipeline";
export { runClassifyPipeline } from "./classifyPipeline";
export type { RunClassifyPipelineInput, RunClassifyPipelineResult } from "./classifyPipeline";
