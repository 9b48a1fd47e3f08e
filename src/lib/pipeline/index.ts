/**
 * Pipeline Module
 *
 * Provides:
 * - DesignPipeline: load a Figma file, export frames, classify tasks
 * - analyzeDocument: task analysis for an already-fetched document
 */

export {
  DesignPipeline,
  createDesignPipeline,
  pipelineConfigFrom,
  analyzeDocument,
  type PipelineConfig,
  type LoadedDesign,
  type TaskAnalysis,
  type PipelineResult,
} from './runner.js';
