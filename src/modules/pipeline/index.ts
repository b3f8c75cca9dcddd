export { runPipeline, type RunPipelineDeps } from './core/usecases/run-pipeline.js';
export type { PipelineError } from './core/errors.js';
