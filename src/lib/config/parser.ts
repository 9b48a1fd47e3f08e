/**
 * Configuration Parser
 *
 * Parse figtask.yml (or .json) config files describing which Figma file to
 * read, where exports go and which task rules to apply. Secrets are never
 * read from the file; see `resolveFigmaToken`.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, isMissingFile } from '../errors.js';

// ============================================================================
// Schemas
// ============================================================================

const FigmaConfigSchema = z.object({
  /** File key or full Figma URL */
  file: z.string().min(1),
  /** Node id to treat as the document root */
  root: z.string().min(1).optional(),
});

const ExportConfigSchema = z.object({
  output_dir: z.string().optional(),
  concurrency: z.number().int().min(1).max(32).optional(),
  /** Unlimited when unset */
  max_units: z.number().int().positive().optional(),
  scale: z.number().min(0.01).max(4).optional(),
});

const TasksConfigSchema = z.object({
  /** Custom rules file replacing the bundled defaults */
  rules: z.string().optional(),
  output: z.string().optional(),
});

const RoadmapConfigSchema = z.object({
  model: z.string().optional(),
  synthesis_model: z.string().optional(),
});

export const FigtaskConfigSchema = z.object({
  figma: FigmaConfigSchema,
  export: ExportConfigSchema.optional(),
  tasks: TasksConfigSchema.optional(),
  roadmap: RoadmapConfigSchema.optional(),
});

// ============================================================================
// Types
// ============================================================================

export type FigmaConfig = z.infer<typeof FigmaConfigSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type TasksConfig = z.infer<typeof TasksConfigSchema>;
export type RoadmapConfig = z.infer<typeof RoadmapConfigSchema>;
export type FigtaskConfig = z.infer<typeof FigtaskConfigSchema>;

export interface ResolvedConfig {
  figma: FigmaConfig;
  export: Required<Omit<ExportConfig, 'max_units'>> & Pick<ExportConfig, 'max_units'>;
  tasks: TasksConfig & { output: string };
  roadmap: Required<RoadmapConfig>;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'figma'> = {
  export: {
    output_dir: './figma_screenshots',
    concurrency: 4,
    scale: 2,
  },
  tasks: {
    output: 'figma_analysis_summary.txt',
  },
  roadmap: {
    model: 'gpt-4o-mini',
    synthesis_model: 'gpt-4-turbo',
  },
};

export const CONFIG_FILENAMES = ['figtask.yml', 'figtask.yaml', '.figtask.yml', 'figtask.json'];

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ResolvedConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ResolvedConfig {
    let parsed: unknown;

    try {
      parsed = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigError(
        `Could not parse ${filename}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.mergeWithDefaults(this.validate(parsed));
  }

  /**
   * Validate config object
   */
  validate(config: unknown): FigtaskConfig {
    const result = FigtaskConfigSchema.safeParse(config);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config: ${issues}`);
    }
    return result.data;
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: FigtaskConfig): ResolvedConfig {
    const defaults = DEFAULT_CONFIG;
    return {
      figma: config.figma,
      export: {
        output_dir: config.export?.output_dir ?? defaults.export.output_dir,
        concurrency: config.export?.concurrency ?? defaults.export.concurrency,
        scale: config.export?.scale ?? defaults.export.scale,
        ...(config.export?.max_units !== undefined ? { max_units: config.export.max_units } : {}),
      },
      tasks: {
        ...(config.tasks?.rules !== undefined ? { rules: config.tasks.rules } : {}),
        output: config.tasks?.output ?? defaults.tasks.output,
      },
      roadmap: {
        model: config.roadmap?.model ?? defaults.roadmap.model,
        synthesis_model: config.roadmap?.synthesis_model ?? defaults.roadmap.synthesis_model,
      },
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# figtask configuration

figma:
  file: "your-figma-file-key"  # or the full Figma URL
  # root: "12:345"             # only process this node's subtree

export:
  output_dir: ./figma_screenshots
  concurrency: 4
  scale: 2
  # max_units: 100             # stop after this many frames (default: all)

tasks:
  output: figma_analysis_summary.txt
  # rules: ./my-rules.yml

roadmap:
  model: gpt-4o-mini
  synthesis_model: gpt-4-turbo
`;
  }
}

// ============================================================================
// Secrets
// ============================================================================

/**
 * Figma token from FIGMA_TOKEN, FIGMA_API_TOKEN, ~/.config/figma/token or
 * ./.figma-token, in that order
 */
export async function resolveFigmaToken(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const fromEnv = env.FIGMA_TOKEN || env.FIGMA_API_TOKEN;
  if (fromEnv) {
    return fromEnv;
  }

  const tokenPaths = [join(env.HOME || homedir(), '.config/figma/token'), '.figma-token'];

  for (const path of tokenPaths) {
    try {
      const token = (await readFile(path, 'utf-8')).trim();
      if (token) return token;
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  throw new ConfigError(
    'Figma token not found. Set FIGMA_TOKEN env var or create ~/.config/figma/token'
  );
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<ResolvedConfig> {
  return new ConfigParser().loadFile(path);
}
