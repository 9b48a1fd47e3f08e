/**
 * Roadmap Generator Tests
 */

import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  RoadmapGenerator,
  createRoadmapGenerator,
  buildSynthesisPrompt,
  ANALYSIS_FAILED,
  type ExportManifest,
} from '../src/index.js';

const TEST_ROADMAP_DIR = './test-roadmap';

const mockFetch = vi.fn();
global.fetch = mockFetch;

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

function requestBody(call: number): unknown {
  const init: unknown = mockFetch.mock.calls[call]?.[1];
  if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
    throw new Error(`fetch call ${call} had no body`);
  }
  return JSON.parse(init.body);
}

describe('RoadmapGenerator', () => {
  let generator: RoadmapGenerator;
  const loginImage = join(TEST_ROADMAP_DIR, 'Login_Page.png');
  const homeImage = join(TEST_ROADMAP_DIR, 'Home.png');

  beforeEach(async () => {
    mockFetch.mockReset();
    generator = createRoadmapGenerator({ apiKey: 'test-key' });
    await mkdir(TEST_ROADMAP_DIR, { recursive: true });
    await writeFile(loginImage, Buffer.from([1, 2, 3]));
    await writeFile(homeImage, Buffer.from([4, 5, 6]));
  });

  afterAll(async () => {
    await rm(TEST_ROADMAP_DIR, { recursive: true, force: true });
  });

  it('should require an API key', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    expect(() => createRoadmapGenerator()).toThrow('OPENAI_API_KEY not set');
    vi.unstubAllEnvs();
  });

  it('should send the image as a data URL', async () => {
    mockFetch.mockResolvedValueOnce(completion('A login form with two inputs'));

    const analysis = await generator.describeImage(loginImage);

    expect(analysis).toEqual({
      image: 'Login_Page.png',
      description: 'A login form with two inputs',
      failed: false,
    });
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(requestBody(0)).toMatchObject({
      model: 'gpt-4o-mini',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
          ],
        },
      ],
    });
  });

  it('should record a failed analysis and continue', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('rate limited', { status: 429 }))
      .mockResolvedValueOnce(completion('A home feed'))
      .mockResolvedValueOnce(completion('1. Frontend Tasks: build screens'));

    const roadmap = await generator.generate([loginImage, homeImage]);

    expect(roadmap.analyses).toEqual([
      { image: 'Login_Page.png', description: ANALYSIS_FAILED, failed: true },
      { image: 'Home.png', description: 'A home feed', failed: false },
    ]);
    expect(roadmap.text).toBe('1. Frontend Tasks: build screens');
    expect(requestBody(2)).toMatchObject({ model: 'gpt-4-turbo' });
  });

  it('should fail synthesis on an API error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('bad request', { status: 400 }));

    await expect(generator.synthesize([])).rejects.toThrow('OpenAI API error: bad request');
  });

  it('should use only succeeded units of a manifest', async () => {
    mockFetch
      .mockResolvedValueOnce(completion('A login form'))
      .mockResolvedValueOnce(completion('roadmap'));
    const manifest: ExportManifest = {
      outputDir: TEST_ROADMAP_DIR,
      units: [
        { name: 'Login_Page', nodeId: '1:1', nodeName: 'Login Page', status: 'succeeded', path: loginImage },
        {
          name: 'Home',
          nodeId: '2:1',
          nodeName: 'Home',
          status: 'failed',
          failure: { kind: 'render', message: 'timeout' },
        },
      ],
      succeeded: 1,
      failed: 1,
      failures: [{ name: 'Home', nodeId: '2:1', kind: 'render', message: 'timeout' }],
      interrupted: false,
      truncated: false,
      skipped: 0,
    };

    const roadmap = await generator.generateFromManifest(manifest);

    expect(roadmap.analyses.map(analysis => analysis.image)).toEqual(['Login_Page.png']);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});

describe('buildSynthesisPrompt', () => {
  it('should list each analysis', () => {
    const prompt = buildSynthesisPrompt([
      { image: 'Home.png', description: 'A home feed', failed: false },
    ]);

    expect(prompt).toContain('- Image: Home.png\n  Description: A home feed');
  });
});
