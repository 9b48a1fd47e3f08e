/**
 * Summary Module
 *
 * Provides:
 * - renderSummary: fixed-structure text for a TaskReport
 * - renderOutline: indented element listing for debugging rule matches
 * - renderComponentReport: node type statistics and id-annotated tree
 */

export {
  renderSummary,
  renderOutline,
  renderComponentReport,
  type SummaryOptions,
  type ComponentReportOptions,
} from './renderer.js';
