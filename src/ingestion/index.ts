/**
 * Ingestion module barrel exports
 */

export {
  startRun,
  finishRun,
  withRun,
  createRunAccumulator,
  createCycleCounters,
} from "./runLifecycle";

export { IngestionPipeline, classifyCycleError } from "./ingestionPipeline";
export type { IngestionPipelineDeps } from "./ingestionPipeline";
