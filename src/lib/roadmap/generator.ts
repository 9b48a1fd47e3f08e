/**
 * Roadmap Generator
 *
 * Sends exported screen images to a vision model for a short description
 * each, then asks a text model to turn the descriptions into a Frontend /
 * Backend / AI task list. The model is a black box; only the request and
 * response plumbing lives here.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import { describeError } from '../errors.js';
import type { ExportManifest } from '../export/index.js';

// ============================================================================
// Types
// ============================================================================

export interface RoadmapOptions {
  /** API key (or uses OPENAI_API_KEY) */
  apiKey?: string;
  /** Vision model used per image */
  model?: string;
  /** Text model used for the final synthesis */
  synthesisModel?: string;
}

export interface ImageAnalysis {
  image: string;
  description: string;
  failed: boolean;
}

export interface Roadmap {
  analyses: ImageAnalysis[];
  text: string;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

const DESCRIBE_PROMPT =
  'Generate a summary describing the UI components, layout, and potential interactions.';

export const ANALYSIS_FAILED = 'Error during analysis.';

// ============================================================================
// Roadmap Generator
// ============================================================================

export class RoadmapGenerator {
  private apiKey: string;
  private model: string;
  private synthesisModel: string;

  constructor(options: RoadmapOptions = {}) {
    this.apiKey = this.getApiKey(options);
    this.model = options.model || 'gpt-4o-mini';
    this.synthesisModel = options.synthesisModel || 'gpt-4-turbo';
  }

  private getApiKey(options: RoadmapOptions): string {
    if (options.apiKey) return options.apiKey;

    const key = process.env.OPENAI_API_KEY;
    if (!key) throw new Error('OPENAI_API_KEY not set');
    return key;
  }

  private async complete(body: Record<string, unknown>): Promise<string> {
    const response = await fetch('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${error}`);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    return data.choices[0].message.content ?? '';
  }

  /**
   * Describe one image. A failure is recorded on the result, not thrown.
   */
  async describeImage(imagePath: string): Promise<ImageAnalysis> {
    const image = basename(imagePath);
    console.log(`[Roadmap] Analyzing image: ${image}...`);

    try {
      const bytes = await readFile(imagePath);
      const description = await this.complete({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: DESCRIBE_PROMPT },
              {
                type: 'image_url',
                image_url: { url: `data:image/png;base64,${bytes.toString('base64')}` },
              },
            ],
          },
        ],
        max_tokens: 1024,
      });
      return { image, description, failed: false };
    } catch (error) {
      console.warn(`[Roadmap] Error analyzing image ${image}: ${describeError(error)}`);
      return { image, description: ANALYSIS_FAILED, failed: true };
    }
  }

  async synthesize(analyses: ImageAnalysis[]): Promise<string> {
    console.log('[Roadmap] Synthesizing project roadmap...');
    return this.complete({
      model: this.synthesisModel,
      messages: [{ role: 'user', content: buildSynthesisPrompt(analyses) }],
      max_tokens: 2048,
    });
  }

  /**
   * Describe each image in order, then synthesize
   */
  async generate(imagePaths: string[]): Promise<Roadmap> {
    const analyses: ImageAnalysis[] = [];
    for (const path of imagePaths) {
      analyses.push(await this.describeImage(path));
    }
    return { analyses, text: await this.synthesize(analyses) };
  }

  /**
   * Generate from the succeeded units of an export run
   */
  async generateFromManifest(manifest: ExportManifest): Promise<Roadmap> {
    const paths: string[] = [];
    for (const entry of manifest.units) {
      if (entry.status === 'succeeded' && entry.path) paths.push(entry.path);
    }
    return this.generate(paths);
  }
}

export function buildSynthesisPrompt(analyses: ImageAnalysis[]): string {
  const context = analyses
    .map(analysis => `- Image: ${analysis.image}\n  Description: ${analysis.description}`)
    .join('\n');

  return `Based on the following analysis of UI screenshots from a Figma project, please generate a comprehensive development task list for frontend, backend, and AI (if any).

Here are the analyses of the individual screens:
${context}

Please provide a task list in the following structure:
1. Frontend Tasks: List of tasks for frontend development.
2. Backend Tasks: List of tasks for backend development.
3. AI Tasks: List of tasks for AI development.`;
}

// ============================================================================
// Factory
// ============================================================================

export function createRoadmapGenerator(options?: RoadmapOptions): RoadmapGenerator {
  return new RoadmapGenerator(options);
}
