/**
 * Tasks Module
 *
 * Provides:
 * - ClassificationEngine: rule-based Frontend / Backend / AI task inference
 * - Rule schema, bundled default rules and custom rule loading
 * - Per-category deduplication and numbering
 */

export {
  ClassificationEngine,
  createClassificationEngine,
  deduplicate,
  type TaskCandidate,
  type ReportedTask,
  type TaskReport,
} from './classifier.js';
export {
  TASK_CATEGORIES,
  RuleSetSchema,
  parseRules,
  loadRules,
  defaultRules,
  type TaskCategory,
  type TaskRule,
  type RuleMatcher,
  type RuleSet,
} from './rules.js';
export { tokenize, containsKeyword, normalizeText } from './tokens.js';
