/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - Default configuration merging
 * - Figma token resolution from the environment
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  resolveFigmaToken,
  DEFAULT_CONFIG,
  CONFIG_FILENAMES,
  FigtaskConfigSchema,
  type FigmaConfig,
  type ExportConfig,
  type TasksConfig,
  type RoadmapConfig,
  type FigtaskConfig,
  type ResolvedConfig,
} from './parser.js';
