/**
 * @reelscope/orchestrator
 *
 * Run context and the download/upload pipeline.
 */

export { createRunContext, disposeRunContext } from './run-context.js';
export type { RunContext, CreateRunContextOptions } from './run-context.js';

export { Pipeline, controllerConfigFrom } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';

export { formatRunSummary, formatDuration } from './summary.js';

export { pipelineConfigFrom } from './types.js';
export type {
  PipelineMode,
  PipelinePhase,
  PipelineConfig,
  UploadCounts,
  RunSummary,
  PipelineEventType,
  PipelineEvent,
  PipelineEventHandler,
} from './types.js';
