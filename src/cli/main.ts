#!/usr/bin/env node
/**
 * figtask CLI
 *
 * Usage:
 *   figtask <command> [options]
 */

import 'dotenv/config';
import { mkdir, writeFile } from 'fs/promises';
import { ConfigParser, resolveFigmaToken } from '../lib/config/index.js';
import { createDesignPipeline, pipelineConfigFrom } from '../lib/pipeline/index.js';
import { VERSION } from '../index.js';
import { runAnalyze } from './analyze.js';
import { runExport } from './export.js';
import { runRoadmap } from './roadmap.js';
import { fail, resolveConfig, resolveRules } from './shared.js';

const HELP = `
figtask - Figma frame export and task analysis

Usage:
  figtask <command> [options]

Commands:
  export    Render every exportable frame to PNG
  analyze   Infer Frontend / Backend / AI tasks from the design tree
  run       export + analyze in one pass
  roadmap   Ask a vision model for a roadmap from exported images
  init      Print an example figtask.yml

Run "figtask <command> --help" for command options.
Set FIGMA_TOKEN (or FIGMA_API_TOKEN) and, for roadmap, OPENAI_API_KEY.
`;

async function runAll(args: string[]): Promise<void> {
  const config = await resolveConfig(args, ['--config', '--root']);
  const token = await resolveFigmaToken();
  const rules = await resolveRules(config.tasks.rules);
  const pipeline = createDesignPipeline(pipelineConfigFrom(config, token, rules));

  await mkdir(config.export.output_dir, { recursive: true });
  const result = await pipeline.run();

  console.log(`\n${result.summary}\n`);
  await writeFile(config.tasks.output, `${result.summary}\n`, 'utf-8');
  console.log(`Summary saved to ${config.tasks.output}`);
  console.log(
    `Exported ${result.manifest.succeeded} units to ${config.export.output_dir}` +
      (result.manifest.failed > 0 ? `, ${result.manifest.failed} failed` : '')
  );
  if (result.manifest.truncated) {
    console.log(`⚠️  max_units reached: ${result.manifest.skipped} more frames were not exported`);
  }

  if (result.manifest.failed > 0) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case 'export':
      return runExport(args);
    case 'analyze':
      return runAnalyze(args);
    case 'run':
      return runAll(args);
    case 'roadmap':
      return runRoadmap(args);
    case 'init':
      console.log(ConfigParser.generateExample());
      return;
    case '--version':
    case '-v':
      console.log(VERSION);
      return;
    case undefined:
    case '--help':
    case '-h':
      console.log(HELP);
      return;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      process.exitCode = 1;
  }
}

main().catch(fail);
