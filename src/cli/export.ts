/**
 * CLI: Frame Export
 *
 * Usage:
 *   figtask export <file-key-or-url> [options]
 *
 * Example:
 *   figtask export abc123xyz --output ./screens --concurrency 2
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { resolveFigmaToken } from '../lib/config/index.js';
import { createDesignPipeline, pipelineConfigFrom } from '../lib/pipeline/index.js';
import { getIntOption, getOption, resolveConfig } from './shared.js';

const VALUE_FLAGS = ['--config', '--output', '--root', '--max', '--concurrency'];

export const EXPORT_HELP = `
figtask - Frame Export

Usage:
  figtask export <file-key-or-url> [options]

Arguments:
  file-key-or-url  The Figma file key, or the file's URL

Options:
  --config       Config file (default: ./figtask.yml if present)
  --output       Output directory (default: ./figma_screenshots)
  --root         Only export below this node id
  --max          Maximum units to export (default: all)
  --concurrency  Parallel renders (default: 4)
  --json         Also write manifest.json to the output directory

Example:
  figtask export abc123xyz --output ./screens
`;

export async function runExport(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(EXPORT_HELP);
    return;
  }

  console.log('🎨 figtask - Frame Export\n');

  const config = await resolveConfig(args, VALUE_FLAGS);
  const outputDir = getOption(args, '--output') ?? config.export.output_dir;
  const maxUnits = getIntOption(args, '--max') ?? config.export.max_units;
  const concurrency = getIntOption(args, '--concurrency') ?? config.export.concurrency;
  const jsonOutput = args.includes('--json');

  const token = await resolveFigmaToken();
  console.log('✓ Figma token loaded');

  const pipeline = createDesignPipeline({
    ...pipelineConfigFrom(config, token),
    outputDir,
    maxUnits,
    concurrency,
  });

  console.log(`\nExporting frames from ${pipeline.fileKey}...`);
  console.log(`  Max units: ${maxUnits ?? 'all'}`);
  console.log(`  Concurrency: ${concurrency}`);
  console.log(`  Output: ${outputDir}\n`);

  // Ctrl-C stops after the units already in flight
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\nInterrupted, finishing in-flight units...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const startTime = Date.now();
  await mkdir(outputDir, { recursive: true });
  const { tree } = await pipeline.load();
  const manifest = await pipeline.exportFrames(tree, controller.signal);
  process.off('SIGINT', onInterrupt);
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

  console.log(`\n✅ Exported ${manifest.succeeded}/${manifest.units.length} units in ${elapsed}s\n`);

  for (const entry of manifest.units.slice(0, 20)) {
    const mark = entry.status === 'succeeded' ? '✓' : '✗';
    console.log(`  ${mark} ${entry.name}`);
  }
  if (manifest.units.length > 20) {
    console.log(`  ... and ${manifest.units.length - 20} more`);
  }

  if (manifest.truncated) {
    console.log(`\n⚠️  Stopped at --max ${maxUnits}: ${manifest.skipped} more frames were not exported`);
  }

  if (manifest.failures.length > 0) {
    console.log('\nFailures:');
    for (const failure of manifest.failures) {
      console.log(`  ✗ ${failure.name} (${failure.nodeId}) [${failure.kind}] ${failure.message}`);
    }
  }

  if (jsonOutput) {
    const jsonPath = join(outputDir, 'manifest.json');
    await writeFile(jsonPath, JSON.stringify(manifest, null, 2));
    console.log(`\n📄 Manifest saved to ${jsonPath}`);
  }

  if (manifest.failed > 0) {
    process.exitCode = 1;
  }
}
