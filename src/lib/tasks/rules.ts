/**
 * Task Rules
 *
 * A rule pairs a category with a matcher and a description template. The
 * matcher is one of a closed set of variants:
 *
 * - keyword: name tokens contain one of the keywords
 * - type: node type or raw Figma type is in a set
 * - structure: a structural pattern over the node's subtree
 *   (`form-fields`, `repeated-children`)
 *
 * Default rules ship in `rules/default-rules.json` at the package root.
 */

import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { NODE_TYPES } from '../tree/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const TASK_CATEGORIES = ['FRONTEND', 'BACKEND', 'AI'] as const;

const CategorySchema = z.enum(TASK_CATEGORIES);
const NodeTypeSchema = z.enum(NODE_TYPES);
const KeywordListSchema = z.array(z.string().trim().min(1)).min(1);

const KeywordMatcherSchema = z.object({
  kind: z.literal('keyword'),
  keywords: KeywordListSchema,
  /** Only nodes of these types */
  types: z.array(NodeTypeSchema).optional(),
  excludeTypes: z.array(NodeTypeSchema).optional(),
});

const TypeMatcherSchema = z.object({
  kind: z.literal('type'),
  types: z.array(NodeTypeSchema).optional(),
  /** Raw Figma types, e.g. COMPONENT vs INSTANCE */
  rawTypes: z.array(z.string().min(1)).optional(),
});

const FormFieldsMatcherSchema = z.object({
  kind: z.literal('structure'),
  pattern: z.literal('form-fields'),
  /** TEXT nodes whose name or content holds one of these count as fields */
  fieldKeywords: KeywordListSchema,
  /** The form frame's own name must also match one of these */
  keywords: KeywordListSchema.optional(),
  minFields: z.number().int().positive().default(1),
});

const RepeatedChildrenMatcherSchema = z.object({
  kind: z.literal('structure'),
  pattern: z.literal('repeated-children'),
  minRepeats: z.number().int().min(2).default(3),
});

const MatcherSchema = z.union([
  KeywordMatcherSchema,
  TypeMatcherSchema,
  FormFieldsMatcherSchema,
  RepeatedChildrenMatcherSchema,
]);

const TaskRuleSchema = z.object({
  id: z.string().min(1),
  category: CategorySchema,
  matcher: MatcherSchema,
  /** Placeholders: {name}, and {fields} for form-fields rules */
  template: z.string().min(1),
});

export const RuleSetSchema = z
  .object({
    version: z.literal(1),
    rules: z.array(TaskRuleSchema),
  })
  .superRefine((ruleSet, ctx) => {
    const seen = new Set<string>();
    ruleSet.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate rule id "${rule.id}"`,
          path: ['rules', index, 'id'],
        });
      }
      seen.add(rule.id);
    });
  });

// ============================================================================
// Types
// ============================================================================

export type TaskCategory = z.infer<typeof CategorySchema>;
export type RuleMatcher = z.infer<typeof MatcherSchema>;
export type TaskRule = z.infer<typeof TaskRuleSchema>;
export type RuleSet = z.infer<typeof RuleSetSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse a rule set from JSON or YAML text
 */
export function parseRules(content: string, filename = 'rules.json'): TaskRule[] {
  const parsed: unknown = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  return RuleSetSchema.parse(parsed).rules;
}

export async function loadRules(path: string): Promise<TaskRule[]> {
  const content = await readFile(path, 'utf-8');
  return parseRules(content, path);
}

let defaults: TaskRule[] | undefined;

/**
 * Rules bundled with the package. Both src/lib/tasks and dist/lib/tasks sit
 * three levels below the package root.
 */
export function defaultRules(): TaskRule[] {
  if (!defaults) {
    const url = new URL('../../../rules/default-rules.json', import.meta.url);
    defaults = parseRules(readFileSync(url, 'utf-8'));
  }
  return defaults;
}
