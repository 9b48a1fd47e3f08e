/**
 * Tree Module
 *
 * Provides:
 * - loadTree / loadFigmaFile: validate raw documents into a node arena
 * - NodeTree: read-only, index-based traversal helpers
 * - Node type vocabulary and geometry helpers
 */

export { loadTree, loadFigmaFile, type LoadTreeOptions } from './loader.js';
export { NodeTree, type WalkOptions } from './tree.js';
export {
  NODE_TYPES,
  normalizeNodeType,
  boundingBox,
  isZeroSize,
  textContent,
  type NodeType,
  type DesignNode,
  type BoundingBox,
} from './types.js';
