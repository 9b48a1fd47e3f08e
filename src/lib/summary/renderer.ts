/**
 * Summary Renderer
 *
 * Formats a TaskReport as plain text. Tasks are printed exactly in the
 * order and numbering the report already holds.
 *
 *   # Project Task Analysis Summary - Shop App
 *   ## Frontend Tasks:
 *   Task-1: Implement Login Page page/screen
 *
 *   ## Backend Tasks:
 *   Task-1: Implement user authentication system
 *
 *   ## AI Tasks:
 */

import type { DesignNode, NodeTree } from '../tree/index.js';
import type { TaskCategory, TaskReport } from '../tasks/index.js';

export interface ComponentReportOptions {
  projectName: string;
  fileKey?: string;
}

export interface SummaryOptions {
  /** Adds a title line when set */
  projectName?: string;
}

const SECTION_HEADERS: Array<[TaskCategory, string]> = [
  ['FRONTEND', '## Frontend Tasks:'],
  ['BACKEND', '## Backend Tasks:'],
  ['AI', '## AI Tasks:'],
];

export function renderSummary(report: TaskReport, options: SummaryOptions = {}): string {
  const lines: string[] = [];

  if (options.projectName !== undefined) {
    lines.push(`# Project Task Analysis Summary - ${options.projectName}`);
  }

  SECTION_HEADERS.forEach(([category, header], i) => {
    if (i > 0) lines.push('');
    lines.push(header);
    for (const task of report.tasks[category]) {
      lines.push(`Task-${task.number}: ${task.description}`);
    }
  });

  return lines.join('\n');
}

/**
 * One `TYPE: name` line per node, indented two spaces per level. Shows the
 * raw Figma type, which is what authors see in the layers panel.
 */
export function renderOutline(tree: NodeTree): string {
  return outlineLines(tree, node => `${node.rawType}: ${displayedName(node)}`).join('\n');
}

/**
 * Node inventory: per raw type counts (sorted by type), the total, and the
 * id-annotated tree
 */
export function renderComponentReport(tree: NodeTree, options: ComponentReportOptions): string {
  const counts = new Map<string, number>();
  for (const node of tree.preorder()) {
    counts.set(node.rawType, (counts.get(node.rawType) ?? 0) + 1);
  }

  const lines = ['# Figma Component Analysis Report', `## Project: ${options.projectName}`];
  if (options.fileKey !== undefined) {
    lines.push(`## File Key: ${options.fileKey}`);
  }
  lines.push(`## Total Components: ${tree.size}`, '', '## Component Type Statistics:');
  for (const rawType of [...counts.keys()].sort()) {
    lines.push(`- ${rawType}: ${counts.get(rawType) ?? 0}`);
  }

  lines.push('', '## Component Tree:', '```');
  lines.push(...outlineLines(tree, node => `${node.rawType}: ${displayedName(node)} (ID: ${node.id})`));
  lines.push('```');

  return lines.join('\n');
}

function displayedName(node: DesignNode): string {
  return node.name || 'Unnamed';
}

function outlineLines(tree: NodeTree, format: (node: DesignNode) => string): string[] {
  const lines: string[] = [];
  for (const node of tree.preorder()) {
    lines.push(`${'  '.repeat(node.depth)}${format(node)}`);
  }
  return lines;
}
