/**
 * Traversal Module
 *
 * Provides:
 * - TraversalEngine: pre-order walk and exportable node selection
 * - ExportableUnit: per-node export state
 * - Deterministic, collision-free file naming
 */

export {
  TraversalEngine,
  ExportableUnit,
  createTraversalEngine,
  type ExportStatus,
  type TraversalOptions,
} from './engine.js';
export { sanitizeName, NameRegistry, UNNAMED } from './naming.js';
