/**
 * Pipeline module exports.
 */

export type { ContextConfig, AssembledContext } from './context-assembler.js';
export { assembleContext } from './context-assembler.js';
export type {
  PipelineDeps,
  PipelineConfig,
  ProcessOptions,
  PipelineOutcome,
  PipelineMetrics,
} from './interaction-pipeline.js';
export { InteractionPipeline } from './interaction-pipeline.js';
