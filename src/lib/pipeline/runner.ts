/**
 * Design Pipeline
 *
 * Entry point tying the pieces together:
 *
 *   Figma file -> tree loader -> { traversal -> export driver,
 *                                  classification -> summary }
 *
 * Everything the run needs (token, file, output directory) comes in through
 * the config object.
 */

import { createExportDriver, type ExportManifest, type NodeRenderer } from '../export/index.js';
import {
  createFigmaClient,
  createFigmaRenderer,
  extractFileKey,
  type FigmaClient,
} from '../figma/index.js';
import { renderSummary } from '../summary/index.js';
import { createClassificationEngine, type TaskReport, type TaskRule } from '../tasks/index.js';
import { createTraversalEngine } from '../traversal/index.js';
import { loadFigmaFile, loadTree, type NodeTree } from '../tree/index.js';
import type { ResolvedConfig } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineConfig {
  token: string;
  /** Figma file key or URL */
  file: string;
  rootId?: string;
  outputDir: string;
  concurrency?: number;
  maxUnits?: number;
  scale?: number;
  /** Replaces the bundled rules */
  rules?: readonly TaskRule[];
  /** Pre-built client, e.g. with custom rate limits */
  client?: FigmaClient;
  /** Replaces the Figma-backed renderer */
  renderer?: NodeRenderer;
}

export interface LoadedDesign {
  projectName: string;
  tree: NodeTree;
}

export interface TaskAnalysis {
  report: TaskReport;
  summary: string;
}

export interface PipelineResult extends TaskAnalysis {
  projectName: string;
  manifest: ExportManifest;
}

// ============================================================================
// Offline analysis
// ============================================================================

/**
 * Classify an already-fetched raw document and render the summary
 */
export function analyzeDocument(
  raw: unknown,
  options: { rootId?: string; rules?: readonly TaskRule[]; projectName?: string } = {}
): TaskAnalysis {
  const tree = loadTree(raw, { rootId: options.rootId });
  const report = createClassificationEngine(options.rules).classify(tree);
  return {
    report,
    summary: renderSummary(report, { projectName: options.projectName }),
  };
}

// ============================================================================
// Design Pipeline
// ============================================================================

export class DesignPipeline {
  readonly fileKey: string;
  private config: PipelineConfig;
  private client: FigmaClient;

  constructor(config: PipelineConfig) {
    this.config = config;
    this.fileKey = extractFileKey(config.file);
    this.client = config.client ?? createFigmaClient({ token: config.token });
  }

  async load(): Promise<LoadedDesign> {
    const file = await this.client.getFile(this.fileKey);
    const { name, tree } = loadFigmaFile(file, { rootId: this.config.rootId });
    console.log(`[Figma] Loaded "${name}" (${tree.size} nodes)`);
    return { projectName: name, tree };
  }

  analyzeTasks(tree: NodeTree, projectName?: string): TaskAnalysis {
    const report = createClassificationEngine(this.config.rules).classify(tree);
    console.log(
      `[Tasks] ${report.tasks.FRONTEND.length} frontend, ` +
        `${report.tasks.BACKEND.length} backend, ${report.tasks.AI.length} AI`
    );
    return { report, summary: renderSummary(report, { projectName }) };
  }

  async exportFrames(tree: NodeTree, signal?: AbortSignal): Promise<ExportManifest> {
    const renderer =
      this.config.renderer ??
      createFigmaRenderer(this.client, this.fileKey, { scale: this.config.scale });
    const units = createTraversalEngine(tree, { maxUnits: this.config.maxUnits });
    const driver = createExportDriver(renderer, {
      outputDir: this.config.outputDir,
      concurrency: this.config.concurrency,
      signal,
    });

    console.log(`[Export] Exporting to ${this.config.outputDir}...`);
    return driver.export(units);
  }

  /**
   * Classify first: an empty tree fails before any export starts
   */
  async run(signal?: AbortSignal): Promise<PipelineResult> {
    const { projectName, tree } = await this.load();
    const analysis = this.analyzeTasks(tree, projectName);
    const manifest = await this.exportFrames(tree, signal);
    return { projectName, manifest, ...analysis };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createDesignPipeline(config: PipelineConfig): DesignPipeline {
  return new DesignPipeline(config);
}

export function pipelineConfigFrom(
  config: ResolvedConfig,
  token: string,
  rules?: readonly TaskRule[]
): PipelineConfig {
  return {
    token,
    file: config.figma.file,
    rootId: config.figma.root,
    outputDir: config.export.output_dir,
    concurrency: config.export.concurrency,
    maxUnits: config.export.max_units,
    scale: config.export.scale,
    rules,
  };
}
