/**
 * Traversal Engine
 *
 * Walks a NodeTree depth-first (parent before children, children in
 * document order) and selects the nodes worth rendering on their own.
 *
 * Selection heuristic: FRAME, COMPONENT_INSTANCE and GROUP nodes are
 * exportable unless they have an explicit zero-size bounding box. A GROUP
 * whose children are all exportable themselves (or that has no children)
 * is treated as a structural wrapper and skipped, since exporting it would
 * mostly duplicate its children's images. This is a guess about author
 * intent, not a guarantee: a group that adds a shared background will
 * still be skipped.
 */

import type { ExportFailure } from '../errors.js';
import { isZeroSize, type DesignNode, type NodeTree, type NodeType } from '../tree/index.js';
import { NameRegistry, sanitizeName } from './naming.js';

// ============================================================================
// Types
// ============================================================================

export type ExportStatus = 'pending' | 'succeeded' | 'failed';

export interface TraversalOptions {
  /** Stop after this many units; unlimited when unset */
  maxUnits?: number;
}

const EXPORTABLE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  'FRAME',
  'COMPONENT_INSTANCE',
  'GROUP',
]);

// ============================================================================
// Exportable Unit
// ============================================================================

/**
 * A node selected for rendering. Status moves from pending to succeeded or
 * failed exactly once.
 */
export class ExportableUnit {
  readonly node: DesignNode;
  /** Filesystem-safe, unique within the run */
  readonly name: string;

  private currentStatus: ExportStatus = 'pending';
  private outputPath?: string;
  private failureCause?: ExportFailure;

  constructor(node: DesignNode, name: string) {
    this.node = node;
    this.name = name;
  }

  get status(): ExportStatus {
    return this.currentStatus;
  }

  get path(): string | undefined {
    return this.outputPath;
  }

  get failure(): ExportFailure | undefined {
    return this.failureCause;
  }

  markSucceeded(path: string): void {
    this.assertPending();
    this.currentStatus = 'succeeded';
    this.outputPath = path;
  }

  markFailed(failure: ExportFailure): void {
    this.assertPending();
    this.currentStatus = 'failed';
    this.failureCause = failure;
  }

  private assertPending(): void {
    if (this.currentStatus !== 'pending') {
      throw new Error(`Unit "${this.name}" already ${this.currentStatus}`);
    }
  }
}

// ============================================================================
// Traversal Engine
// ============================================================================

export class TraversalEngine implements Iterable<ExportableUnit> {
  private tree: NodeTree;
  private options: TraversalOptions;
  private exportable?: boolean[];
  private skippedUnits = 0;

  constructor(tree: NodeTree, options: TraversalOptions = {}) {
    this.tree = tree;
    this.options = options;
  }

  /**
   * Every node, once, in pre-order
   */
  visit(): Generator<DesignNode> {
    return this.tree.preorder();
  }

  isExportable(node: DesignNode): boolean {
    return this.exportableFlags()[node.index] ?? false;
  }

  /**
   * Flags for the whole arena. Arena order is pre-order, so walking it
   * backwards settles every child before its parent.
   */
  private exportableFlags(): boolean[] {
    if (this.exportable) return this.exportable;

    const flags: boolean[] = new Array<boolean>(this.tree.size).fill(false);
    for (let index = this.tree.size - 1; index >= 0; index--) {
      const node = this.tree.node(index);
      let result = EXPORTABLE_TYPES.has(node.type) && !isZeroSize(node);
      if (result && node.type === 'GROUP') {
        result = node.children.length > 0 && !node.children.every(child => flags[child]);
      }
      flags[index] = result;
    }

    this.exportable = flags;
    return flags;
  }

  /**
   * Exportable nodes left out by `maxUnits` in the last fully drained run
   */
  get skipped(): number {
    return this.skippedUnits;
  }

  /**
   * Fresh, lazily evaluated unit sequence. Names are assigned in traversal
   * order, so an unchanged tree always yields the same names. Once the cap
   * is reached the rest of the tree is still scanned to count what was left
   * out.
   */
  *units(): Generator<ExportableUnit> {
    const registry = new NameRegistry();
    const { maxUnits } = this.options;
    let count = 0;
    this.skippedUnits = 0;

    for (const node of this.tree.preorder()) {
      if (!this.isExportable(node)) continue;

      if (maxUnits !== undefined && count >= maxUnits) {
        this.skippedUnits++;
        continue;
      }

      count++;
      yield new ExportableUnit(node, registry.claim(sanitizeName(node.name)));
    }
  }

  [Symbol.iterator](): Iterator<ExportableUnit> {
    return this.units();
  }

  names(): string[] {
    return Array.from(this.units(), unit => unit.name);
  }
}

export function createTraversalEngine(
  tree: NodeTree,
  options?: TraversalOptions
): TraversalEngine {
  return new TraversalEngine(tree, options);
}
