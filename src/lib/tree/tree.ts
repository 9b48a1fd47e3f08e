/**
 * Node Tree
 *
 * Read-only view over a node arena. All walks use an explicit stack over
 * arena indexes, so they terminate after at most `size` steps.
 */

import type { DesignNode } from './types.js';

export interface WalkOptions {
  /**
   * Return false to skip a node's children. The node itself is still
   * yielded.
   */
  enter?: (node: DesignNode) => boolean;
}

export class NodeTree {
  private readonly arena: readonly DesignNode[];
  private readonly idIndex: Map<string, number>;

  constructor(arena: readonly DesignNode[]) {
    this.arena = arena;
    this.idIndex = new Map(arena.map(node => [node.id, node.index] as const));
  }

  static empty(): NodeTree {
    return new NodeTree([]);
  }

  get size(): number {
    return this.arena.length;
  }

  isEmpty(): boolean {
    return this.arena.length === 0;
  }

  /**
   * The root is always arena slot 0
   */
  get root(): DesignNode | undefined {
    return this.arena[0];
  }

  node(index: number): DesignNode {
    const node = this.arena[index];
    if (!node) {
      throw new RangeError(`No node at index ${index} (tree size ${this.arena.length})`);
    }
    return node;
  }

  findById(id: string): DesignNode | undefined {
    const index = this.idIndex.get(id);
    return index === undefined ? undefined : this.arena[index];
  }

  children(node: DesignNode): DesignNode[] {
    return node.children.map(index => this.node(index));
  }

  parent(node: DesignNode): DesignNode | undefined {
    return node.parent === null ? undefined : this.node(node.parent);
  }

  /**
   * Ancestors from the nearest parent up to the root
   */
  ancestors(node: DesignNode): DesignNode[] {
    const result: DesignNode[] = [];
    let current = this.parent(node);
    while (current) {
      result.push(current);
      current = this.parent(current);
    }
    return result;
  }

  /**
   * Depth-first pre-order walk starting at `start` (the root by default)
   */
  *preorder(start?: DesignNode, options: WalkOptions = {}): Generator<DesignNode> {
    const first = start ?? this.root;
    if (!first) return;

    const stack: number[] = [first.index];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;

      const node = this.node(index);
      yield node;

      if (options.enter && !options.enter(node)) continue;

      // Push in reverse so the first child is visited first
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  /**
   * Pre-order walk of everything below `node`, excluding `node` itself
   */
  *descendants(node: DesignNode, options: WalkOptions = {}): Generator<DesignNode> {
    for (const current of this.preorder(node, options)) {
      if (current.index !== node.index) yield current;
    }
  }

  /**
   * Copy the subtree under `id` into its own arena, re-rooted at depth 0
   */
  subtree(id: string): NodeTree | undefined {
    const top = this.findById(id);
    if (!top) return undefined;

    const sources = [...this.preorder(top)];
    const remap = new Map(sources.map((node, index) => [node.index, index] as const));
    const lookup = (index: number): number => {
      const mapped = remap.get(index);
      if (mapped === undefined) {
        throw new RangeError(`Index ${index} is outside the copied subtree`);
      }
      return mapped;
    };

    return new NodeTree(
      sources.map((node, index) => ({
        ...node,
        index,
        parent: index === 0 || node.parent === null ? null : lookup(node.parent),
        depth: node.depth - top.depth,
        children: node.children.map(lookup),
      }))
    );
  }
}
