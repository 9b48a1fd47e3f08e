/**
 * Argument and config helpers shared by the CLI commands
 */

import { access } from 'fs/promises';
import {
  CONFIG_FILENAMES,
  createConfigParser,
  loadConfig,
  type ResolvedConfig,
} from '../lib/config/index.js';
import { ConfigError, isMissingFile } from '../lib/errors.js';
import { defaultRules, loadRules, type TaskRule } from '../lib/tasks/index.js';

export function getOption(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;

  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value;
}

export function getIntOption(args: string[], flag: string): number | undefined {
  const value = getOption(args, flag);
  if (value === undefined) return undefined;

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * First argument that is neither a flag nor a flag's value
 */
export function getPositional(args: string[], valueFlags: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
      continue;
    }
    if (!args[i].startsWith('--')) return args[i];
  }
  return undefined;
}

async function findConfigFile(): Promise<string | undefined> {
  for (const filename of CONFIG_FILENAMES) {
    try {
      await access(filename);
      return filename;
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }
  return undefined;
}

/**
 * Config from --config, else from a figtask.yml in the working directory,
 * else defaults. A positional file key/URL overrides `figma.file`. Returns
 * undefined when there is neither a config file nor a file argument.
 */
export async function resolveOptionalConfig(
  args: string[],
  valueFlags: string[]
): Promise<ResolvedConfig | undefined> {
  const file = getPositional(args, valueFlags);
  const configPath = getOption(args, '--config') ?? (await findConfigFile());

  let config: ResolvedConfig;
  if (configPath) {
    console.log(`✓ Config loaded from ${configPath}`);
    config = await loadConfig(configPath);
    if (file) config = { ...config, figma: { ...config.figma, file } };
  } else if (file) {
    config = createConfigParser().mergeWithDefaults({ figma: { file } });
  } else {
    return undefined;
  }

  const root = getOption(args, '--root');
  return root ? { ...config, figma: { ...config.figma, root } } : config;
}

export async function resolveConfig(
  args: string[],
  valueFlags: string[]
): Promise<ResolvedConfig> {
  const config = await resolveOptionalConfig(args, valueFlags);
  if (!config) {
    throw new ConfigError('No Figma file given. Pass a file key or URL, or create figtask.yml');
  }
  return config;
}

export async function resolveRules(path: string | undefined): Promise<TaskRule[]> {
  if (!path) return defaultRules();

  const rules = await loadRules(path);
  console.log(`✓ ${rules.length} rules loaded from ${path}`);
  return rules;
}

export function fail(error: unknown): never {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}
