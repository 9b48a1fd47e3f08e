/**
 * Node Tree Loader
 *
 * Turns a raw nested document (as returned by the Figma REST API, or built
 * by hand) into a NodeTree. Every node is validated; nothing is fetched or
 * written.
 */

import { z } from 'zod';
import { MalformedTreeError } from '../errors.js';
import { NodeTree } from './tree.js';
import { normalizeNodeType, type DesignNode } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const RawNodeSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    name: z.string().optional(),
    children: z.array(z.unknown()).optional(),
  })
  .passthrough();

type RawNode = z.infer<typeof RawNodeSchema>;

const RawFileSchema = z
  .object({
    name: z.string().optional(),
    document: z.unknown(),
  })
  .passthrough();

const STRUCTURAL_KEYS = new Set(['id', 'type', 'name', 'children']);

export interface LoadTreeOptions {
  /** Root the tree at this node id instead of the document root */
  rootId?: string;
}

// ============================================================================
// Loader
// ============================================================================

type WorkItem =
  | { kind: 'enter'; raw: unknown; parent: number | null }
  | { kind: 'exit'; id: string };

class ArenaBuilder {
  readonly arena: DesignNode[] = [];
  private readonly childLists: number[][] = [];
  private readonly seen = new Map<string, number>();

  /**
   * Pre-order build over an explicit work stack. An `exit` item is pushed
   * below each node's children, so `onPath` holds exactly the ids from the
   * root down to the node being entered. A child whose id is already on the
   * path is an ancestor listed as a child.
   */
  build(root: unknown): void {
    const stack: WorkItem[] = [{ kind: 'enter', raw: root, parent: null }];
    const onPath = new Set<string>();

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;

      if (item.kind === 'exit') {
        onPath.delete(item.id);
        continue;
      }

      const node = this.parse(item.raw, item.parent);
      if (onPath.has(node.id)) {
        throw new MalformedTreeError(`Cycle detected: node "${node.id}" is its own ancestor`, [
          ...this.pathTo(item.parent),
          node.id,
        ]);
      }
      if (this.seen.has(node.id)) {
        throw new MalformedTreeError(`Duplicate node id "${node.id}"`, [
          ...this.pathTo(item.parent),
          node.id,
        ]);
      }

      const index = this.push(node, item.parent);
      onPath.add(node.id);
      stack.push({ kind: 'exit', id: node.id });

      const children = node.children ?? [];
      // Reverse so the first child is entered first
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ kind: 'enter', raw: children[i], parent: index });
      }
    }
  }

  private push(node: RawNode, parent: number | null): number {
    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
      if (!STRUCTURAL_KEYS.has(key)) metadata[key] = value;
    }

    const index = this.arena.length;
    const children: number[] = [];
    this.childLists.push(children);
    if (parent !== null) this.childLists[parent].push(index);

    this.seen.set(node.id, index);
    this.arena.push({
      index,
      id: node.id,
      name: node.name ?? '',
      type: normalizeNodeType(node.type, metadata),
      rawType: node.type,
      parent,
      children,
      depth: parent === null ? 0 : this.arena[parent].depth + 1,
      metadata,
    });
    return index;
  }

  /**
   * Ids from the root down to `index`. Only built for error messages.
   */
  private pathTo(index: number | null): string[] {
    const path: string[] = [];
    for (let current = index; current !== null; current = this.arena[current].parent) {
      path.push(this.arena[current].id);
    }
    return path.reverse();
  }

  private parse(raw: unknown, parent: number | null): RawNode {
    const result = RawNodeSchema.safeParse(raw);
    if (result.success) return result.data;

    const path = this.pathTo(parent);
    const issue = result.error.issues[0];
    const field = issue?.path.length ? String(issue.path[0]) : undefined;
    if (issue?.code === 'invalid_type' && issue.received === 'undefined' && field) {
      throw new MalformedTreeError(`Node is missing required field "${field}"`, path);
    }
    if (issue?.code === 'invalid_type' && !field) {
      throw new MalformedTreeError(`Node must be an object, got ${issue.received}`, path);
    }
    throw new MalformedTreeError(
      `Invalid node field "${field ?? '?'}": ${issue?.message ?? 'invalid value'}`,
      path
    );
  }
}

function isEmptyDocument(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  return typeof raw === 'object' && !Array.isArray(raw) && Object.keys(raw).length === 0;
}

/**
 * Load a raw node structure. `null`, `undefined` and `{}` give an empty
 * tree; any other input must be a valid node.
 */
export function loadTree(raw: unknown, options: LoadTreeOptions = {}): NodeTree {
  if (isEmptyDocument(raw)) {
    if (options.rootId !== undefined) {
      throw new MalformedTreeError(`Root node "${options.rootId}" not found in empty document`);
    }
    return NodeTree.empty();
  }

  const builder = new ArenaBuilder();
  builder.build(raw);
  const tree = new NodeTree(builder.arena);

  if (options.rootId === undefined) return tree;

  const scoped = tree.subtree(options.rootId);
  if (!scoped) {
    throw new MalformedTreeError(`Root node "${options.rootId}" not found in document`);
  }
  return scoped;
}

/**
 * Load the `document` of a `GET /v1/files/:key` response
 */
export function loadFigmaFile(
  file: unknown,
  options: LoadTreeOptions = {}
): { name: string; tree: NodeTree } {
  const parsed = RawFileSchema.safeParse(file);
  if (!parsed.success) {
    throw new MalformedTreeError('Figma file response must be an object with a "document" field');
  }

  return {
    name: parsed.data.name ?? 'Unknown Project',
    tree: loadTree(parsed.data.document, options),
  };
}
