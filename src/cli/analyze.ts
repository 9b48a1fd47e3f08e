/**
 * CLI: Task Analysis
 *
 * Usage:
 *   figtask analyze <file-key-or-url> [options]
 *   figtask analyze --input ./file.json [options]
 */

import { readFile, writeFile } from 'fs/promises';
import { DEFAULT_CONFIG, resolveFigmaToken } from '../lib/config/index.js';
import { createDesignPipeline, pipelineConfigFrom, type LoadedDesign } from '../lib/pipeline/index.js';
import { renderComponentReport, renderOutline, renderSummary } from '../lib/summary/index.js';
import { createClassificationEngine } from '../lib/tasks/index.js';
import { loadFigmaFile } from '../lib/tree/index.js';
import { getOption, resolveConfig, resolveOptionalConfig, resolveRules } from './shared.js';

const VALUE_FLAGS = ['--config', '--input', '--out', '--root', '--rules', '--components-out'];
const COMPONENT_REPORT_FILE = 'figma_component_report.txt';

export const ANALYZE_HELP = `
figtask - Task Analysis

Usage:
  figtask analyze <file-key-or-url> [options]
  figtask analyze --input ./file.json [options]

Options:
  --config   Config file (default: ./figtask.yml if present)
  --input    Read a saved GET /v1/files/:key response instead of calling Figma
  --root     Only analyze below this node id
  --rules    Custom rules file (JSON or YAML)
  --out      Summary file (default: figma_analysis_summary.txt)
  --no-save  Print the summary without writing it
  --debug    Print every element as TYPE: name before the summary
  --components      Also print the component report (type counts and node tree)
  --components-out  Component report file (default: figma_component_report.txt)
`;

export async function runAnalyze(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(ANALYZE_HELP);
    return;
  }

  const inputPath = getOption(args, '--input');
  // Offline runs need no Figma file, so no config is fine
  const config = inputPath
    ? await resolveOptionalConfig(args, VALUE_FLAGS)
    : await resolveConfig(args, VALUE_FLAGS);

  const rules = await resolveRules(getOption(args, '--rules') ?? config?.tasks.rules);

  let design: LoadedDesign;
  let fileKey: string | undefined;
  if (inputPath) {
    const raw: unknown = JSON.parse(await readFile(inputPath, 'utf-8'));
    const rootId = getOption(args, '--root') ?? config?.figma.root;
    const { name, tree } = loadFigmaFile(raw, { rootId });
    design = { projectName: name, tree };
  } else if (config) {
    const token = await resolveFigmaToken();
    const pipeline = createDesignPipeline(pipelineConfigFrom(config, token, rules));
    fileKey = pipeline.fileKey;
    design = await pipeline.load();
  } else {
    return;
  }

  if (args.includes('--debug')) {
    console.log('=== DEBUG: All Element Names in Project ===');
    console.log(renderOutline(design.tree));
    console.log('=== END DEBUG ===\n');
  }

  if (args.includes('--components') || args.includes('--components-out')) {
    const componentReport = renderComponentReport(design.tree, {
      projectName: design.projectName,
      fileKey,
    });
    console.log(`${componentReport}\n`);

    if (!args.includes('--no-save')) {
      const reportPath = getOption(args, '--components-out') ?? COMPONENT_REPORT_FILE;
      await writeFile(reportPath, `${componentReport}\n`, 'utf-8');
      console.log(`Component report saved to ${reportPath}\n`);
    }
  }

  const report = createClassificationEngine(rules).classify(design.tree);
  const summary = renderSummary(report, { projectName: design.projectName });
  console.log(summary);

  if (!args.includes('--no-save')) {
    const outPath = getOption(args, '--out') ?? config?.tasks.output ?? DEFAULT_CONFIG.tasks.output;
    await writeFile(outPath, `${summary}\n`, 'utf-8');
    console.log(`\nSummary saved to ${outPath}`);
  }
}
