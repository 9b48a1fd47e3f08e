/**
 * figtask - Figma design tree export and task analysis
 *
 * Walks a Figma document, renders every frame worth keeping as a PNG and
 * infers a Frontend / Backend / AI task list from the layer structure.
 */

// Errors
export * from './lib/errors.js';

// Design tree loading
export * from './lib/tree/index.js';

// Exportable node selection and naming
export * from './lib/traversal/index.js';

// Frame export
export * from './lib/export/index.js';

// Task classification
export * from './lib/tasks/index.js';

// Summary rendering
export * from './lib/summary/index.js';

// Figma API
export * from './lib/figma/index.js';

// Configuration
export * from './lib/config/index.js';

// Pipeline entry point
export * from './lib/pipeline/index.js';

// Roadmap generation
export * from './lib/roadmap/index.js';

// Version
export const VERSION = '0.1.0';
