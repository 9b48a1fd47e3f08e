/**
 * CLI: Roadmap Generation
 *
 * Usage:
 *   figtask roadmap [--dir ./figma_screenshots] [--out roadmap.txt]
 */

import { readdir, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { DEFAULT_CONFIG } from '../lib/config/index.js';
import { isMissingFile } from '../lib/errors.js';
import { createRoadmapGenerator } from '../lib/roadmap/index.js';
import { getOption, resolveOptionalConfig } from './shared.js';

const VALUE_FLAGS = ['--config', '--dir', '--out', '--model'];
const ROADMAP_FILE = 'roadmap.txt';
const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);

export const ROADMAP_HELP = `
figtask - Roadmap Generation

Usage:
  figtask roadmap [options]

Options:
  --config  Config file (default: ./figtask.yml if present)
  --dir     Directory of exported images (default: ./figma_screenshots)
  --model   Vision model for per-image analysis (default: gpt-4o-mini)
  --out     Roadmap file (default: roadmap.txt)

Requires OPENAI_API_KEY. Run "figtask export" first.
`;

async function listImages(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(`Directory '${dir}' not found. Run "figtask export" first.`);
    }
    throw error;
  }

  return entries
    .filter(entry => IMAGE_EXTENSIONS.has(extname(entry).toLowerCase()))
    .sort()
    .map(entry => join(dir, entry));
}

export async function runRoadmap(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(ROADMAP_HELP);
    return;
  }

  const config = await resolveOptionalConfig(args, VALUE_FLAGS);
  const roadmapConfig = config?.roadmap ?? DEFAULT_CONFIG.roadmap;
  const dir = getOption(args, '--dir') ?? config?.export.output_dir ?? DEFAULT_CONFIG.export.output_dir;

  const images = await listImages(dir);
  if (images.length === 0) {
    throw new Error(`No images found in '${dir}'`);
  }
  console.log(`🗺️  Generating roadmap from ${images.length} images in ${dir}\n`);

  const generator = createRoadmapGenerator({
    model: getOption(args, '--model') ?? roadmapConfig.model,
    synthesisModel: roadmapConfig.synthesis_model,
  });
  const roadmap = await generator.generate(images);

  console.log('\n--- Generated Project Roadmap ---\n');
  console.log(roadmap.text);

  const outPath = getOption(args, '--out') ?? ROADMAP_FILE;
  await writeFile(outPath, `${roadmap.text}\n`, 'utf-8');
  console.log(`\n📄 Roadmap saved to ${outPath}`);
}
