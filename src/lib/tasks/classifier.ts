/**
 * Task Classification Engine
 *
 * Evaluates every rule against every node and collects the matches into
 * Frontend / Backend / AI task lists. A node may produce any number of
 * tasks in any number of categories; there is no precedence between rules.
 *
 * Classifying a node reads the tree around it (children, descendants) but
 * never changes it, and keeps no state between nodes, so the same tree
 * always gives the same report.
 */

import { EmptyTreeError } from '../errors.js';
import { textContent, type DesignNode, type NodeTree, type NodeType } from '../tree/index.js';
import { defaultRules, type RuleMatcher, type TaskCategory, type TaskRule } from './rules.js';
import { containsAnyKeyword, displayName, normalizeText, tokenize } from './tokens.js';

// ============================================================================
// Types
// ============================================================================

export interface TaskCandidate {
  readonly category: TaskCategory;
  readonly description: string;
  /** Rule that produced this candidate */
  readonly ruleId: string;
  readonly nodeId: string;
}

export interface ReportedTask {
  /** 1-based position within its category */
  number: number;
  description: string;
  /** Rule of the first candidate with this description */
  ruleId: string;
  /** Every node that produced this description, in discovery order */
  nodeIds: string[];
}

export interface TaskReport {
  tasks: Record<TaskCategory, ReportedTask[]>;
  /** All candidates before deduplication */
  candidates: TaskCandidate[];
}

type TemplateValues = Record<string, string>;

const CONTAINER_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  'FRAME',
  'GROUP',
  'COMPONENT_INSTANCE',
]);

// ============================================================================
// Matching
// ============================================================================

function nodeLabel(node: DesignNode): string {
  const name = displayName(node.name);
  return name || `unnamed ${node.rawType.toLowerCase()}`;
}

/**
 * TEXT nodes in the frame's own subtree whose name or content looks like an
 * input. Nested frames are separate forms and are not entered.
 */
function collectFormFields(tree: NodeTree, frame: DesignNode, fieldKeywords: readonly string[]): string[] {
  const fields: string[] = [];
  const seen = new Set<string>();

  const descendants = tree.descendants(frame, {
    enter: node => node.index === frame.index || node.type !== 'FRAME',
  });
  for (const node of descendants) {
    if (node.type !== 'TEXT') continue;

    const content = textContent(node) ?? '';
    const tokens = tokenize(`${node.name} ${content}`);
    if (!containsAnyKeyword(tokens, fieldKeywords)) continue;

    const label = displayName(node.name) || displayName(content);
    const key = normalizeText(label);
    if (label && !seen.has(key)) {
      seen.add(key);
      fields.push(label);
    }
  }

  return fields;
}

/**
 * Child name with trailing numbers dropped: "Card 1", "Card 2" -> "card"
 */
function nameStem(node: DesignNode): string {
  const tokens = tokenize(node.name);
  while (tokens.length > 0 && /^\d+$/.test(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

function hasRepeatedChildren(tree: NodeTree, node: DesignNode, minRepeats: number): boolean {
  const counts = new Map<string, number>();
  for (const child of tree.children(node)) {
    if (!CONTAINER_TYPES.has(child.type)) continue;

    const key = `${child.type}:${nameStem(child)}`;
    const count = (counts.get(key) ?? 0) + 1;
    if (count >= minRepeats) return true;
    counts.set(key, count);
  }
  return false;
}

/**
 * Single dispatch over the matcher variants. Returns the template values on
 * a match, undefined otherwise.
 */
function evaluate(matcher: RuleMatcher, node: DesignNode, tree: NodeTree): TemplateValues | undefined {
  const values: TemplateValues = { name: nodeLabel(node) };

  switch (matcher.kind) {
    case 'keyword': {
      if (matcher.types && !matcher.types.includes(node.type)) return undefined;
      if (matcher.excludeTypes?.includes(node.type)) return undefined;
      return containsAnyKeyword(tokenize(node.name), matcher.keywords) ? values : undefined;
    }

    case 'type': {
      const byType = matcher.types?.includes(node.type) ?? false;
      const byRawType = matcher.rawTypes?.includes(node.rawType) ?? false;
      return byType || byRawType ? values : undefined;
    }

    case 'structure': {
      if (matcher.pattern === 'repeated-children') {
        return hasRepeatedChildren(tree, node, matcher.minRepeats) ? values : undefined;
      }

      if (node.type !== 'FRAME') return undefined;
      if (matcher.keywords && !containsAnyKeyword(tokenize(node.name), matcher.keywords)) {
        return undefined;
      }
      const fields = collectFormFields(tree, node, matcher.fieldKeywords);
      if (fields.length < matcher.minFields) return undefined;
      return { ...values, fields: fields.join(', ') };
    }
  }
}

function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

// ============================================================================
// Classification Engine
// ============================================================================

export class ClassificationEngine {
  private rules: readonly TaskRule[];

  constructor(rules: readonly TaskRule[] = defaultRules()) {
    this.rules = rules;
  }

  /**
   * Every rule match, in node pre-order and then rule order
   */
  candidates(tree: NodeTree): TaskCandidate[] {
    if (tree.isEmpty()) {
      throw new EmptyTreeError('Cannot classify an empty design tree');
    }

    const candidates: TaskCandidate[] = [];
    for (const node of tree.preorder()) {
      for (const rule of this.rules) {
        const values = evaluate(rule.matcher, node, tree);
        if (!values) continue;

        candidates.push({
          category: rule.category,
          description: renderTemplate(rule.template, values),
          ruleId: rule.id,
          nodeId: node.id,
        });
      }
    }
    return candidates;
  }

  classify(tree: NodeTree): TaskReport {
    const candidates = this.candidates(tree);
    return {
      tasks: deduplicate(candidates),
      candidates,
    };
  }
}

/**
 * Keep the first candidate per (category, normalized description) and
 * number each category from 1
 */
export function deduplicate(candidates: readonly TaskCandidate[]): Record<TaskCategory, ReportedTask[]> {
  const tasks: Record<TaskCategory, ReportedTask[]> = { FRONTEND: [], BACKEND: [], AI: [] };
  const index = new Map<string, ReportedTask>();

  for (const candidate of candidates) {
    const key = `${candidate.category}\u0000${normalizeText(candidate.description)}`;
    const existing = index.get(key);
    if (existing) {
      if (!existing.nodeIds.includes(candidate.nodeId)) {
        existing.nodeIds.push(candidate.nodeId);
      }
      continue;
    }

    const list = tasks[candidate.category];
    const task: ReportedTask = {
      number: list.length + 1,
      description: candidate.description.trim(),
      ruleId: candidate.ruleId,
      nodeIds: [candidate.nodeId],
    };
    list.push(task);
    index.set(key, task);
  }

  return tasks;
}

export function createClassificationEngine(rules?: readonly TaskRule[]): ClassificationEngine {
  return new ClassificationEngine(rules);
}
