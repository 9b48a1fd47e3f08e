/**
 * Design Tree Types
 *
 * The tree is an arena: nodes live in one flat array and refer to each
 * other by index. Arena order is depth-first pre-order.
 */

import { z } from 'zod';

// ============================================================================
// Node Types
// ============================================================================

export const NODE_TYPES = [
  'FRAME',
  'GROUP',
  'TEXT',
  'VECTOR',
  'COMPONENT_INSTANCE',
  'IMAGE',
  'OTHER',
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

const RAW_TYPE_MAP: Record<string, NodeType> = {
  FRAME: 'FRAME',
  SECTION: 'FRAME',
  GROUP: 'GROUP',
  TEXT: 'TEXT',
  VECTOR: 'VECTOR',
  BOOLEAN_OPERATION: 'VECTOR',
  STAR: 'VECTOR',
  LINE: 'VECTOR',
  ELLIPSE: 'VECTOR',
  REGULAR_POLYGON: 'VECTOR',
  INSTANCE: 'COMPONENT_INSTANCE',
  COMPONENT: 'COMPONENT_INSTANCE',
  COMPONENT_SET: 'COMPONENT_INSTANCE',
  COMPONENT_INSTANCE: 'COMPONENT_INSTANCE',
  IMAGE: 'IMAGE',
};

const PaintListSchema = z.array(z.object({ type: z.string() }).passthrough());

/**
 * Map a raw Figma node type onto the closed vocabulary. Figma has no image
 * node; images are rectangles with an IMAGE fill.
 */
export function normalizeNodeType(
  rawType: string,
  metadata: Readonly<Record<string, unknown>> = {}
): NodeType {
  const mapped = RAW_TYPE_MAP[rawType.toUpperCase()];
  if (mapped) return mapped;

  if (rawType.toUpperCase() === 'RECTANGLE') {
    const fills = PaintListSchema.safeParse(metadata.fills);
    if (fills.success && fills.data.some(paint => paint.type === 'IMAGE')) {
      return 'IMAGE';
    }
  }

  return 'OTHER';
}

// ============================================================================
// Design Node
// ============================================================================

export interface DesignNode {
  /** Position in the arena */
  readonly index: number;
  /** Figma node id, unique within the document */
  readonly id: string;
  /** Author-controlled display name, may be empty */
  readonly name: string;
  readonly type: NodeType;
  /** Type tag exactly as it appeared in the source document */
  readonly rawType: string;
  readonly parent: number | null;
  /** Child indexes in document (z-)order */
  readonly children: readonly number[];
  /** Distance from the tree root */
  readonly depth: number;
  /** Remaining type-specific fields, e.g. `characters` on TEXT */
  readonly metadata: Readonly<Record<string, unknown>>;
}

const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

export type BoundingBox = z.infer<typeof BoundingBoxSchema>;

export function boundingBox(node: DesignNode): BoundingBox | undefined {
  const parsed = BoundingBoxSchema.safeParse(node.metadata.absoluteBoundingBox);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Only an explicit empty box counts as zero-size. Nodes without geometry
 * (hand-built or trimmed documents) are assumed to have content.
 */
export function isZeroSize(node: DesignNode): boolean {
  const box = boundingBox(node);
  return box !== undefined && (box.width <= 0 || box.height <= 0);
}

/**
 * Text content of a TEXT node, if the document carries it
 */
export function textContent(node: DesignNode): string | undefined {
  const characters = node.metadata.characters;
  return typeof characters === 'string' ? characters : undefined;
}
