/**
 * Roadmap Module
 *
 * Provides:
 * - RoadmapGenerator: per-image descriptions plus a synthesized task list
 *   from a vision model
 */

export {
  RoadmapGenerator,
  createRoadmapGenerator,
  buildSynthesisPrompt,
  ANALYSIS_FAILED,
  type RoadmapOptions,
  type ImageAnalysis,
  type Roadmap,
} from './generator.js';
