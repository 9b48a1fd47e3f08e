/**
 * CLI Command Tests
 */

import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { runAnalyze } from '../src/cli/analyze.js';
import { runRoadmap } from '../src/cli/roadmap.js';
import { loginDashboardDocument } from './fixtures.js';

const TEST_CLI_DIR = './test-cli';
const ROADMAP_FILE = 'roadmap.txt';

const mockFetch = vi.fn();
global.fetch = mockFetch;

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('CLI commands', () => {
  beforeEach(async () => {
    mockFetch.mockReset();
    await rm(TEST_CLI_DIR, { recursive: true, force: true });
    await mkdir(TEST_CLI_DIR, { recursive: true });
  });

  afterAll(async () => {
    vi.unstubAllEnvs();
    await rm(TEST_CLI_DIR, { recursive: true, force: true });
    await rm(ROADMAP_FILE, { force: true });
  });

  describe('analyze', () => {
    it('should save the component report and summary for a saved file', async () => {
      const input = join(TEST_CLI_DIR, 'file.json');
      const componentsOut = join(TEST_CLI_DIR, 'components.txt');
      const summaryOut = join(TEST_CLI_DIR, 'summary.txt');
      await writeFile(input, JSON.stringify({ name: 'Shop App', document: loginDashboardDocument() }));

      await runAnalyze([
        '--input', input,
        '--components',
        '--components-out', componentsOut,
        '--out', summaryOut,
      ]);

      const components = (await readFile(componentsOut, 'utf-8')).split('\n');
      expect(components.slice(0, 3)).toEqual([
        '# Figma Component Analysis Report',
        '## Project: Shop App',
        '## Total Components: 10',
      ]);
      expect(components).toContain('    GROUP: Team List (ID: 2:2)');

      const summary = await readFile(summaryOut, 'utf-8');
      expect(summary.split('\n')[0]).toBe('# Project Task Analysis Summary - Shop App');
    });
  });

  describe('roadmap', () => {
    it('should save the roadmap to roadmap.txt by default', async () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-key');
      await writeFile(join(TEST_CLI_DIR, 'Home.png'), Buffer.from([1, 2, 3]));
      mockFetch
        .mockResolvedValueOnce(completion('A home feed'))
        .mockResolvedValueOnce(completion('1. Frontend Tasks: build the feed'));

      await runRoadmap(['--dir', TEST_CLI_DIR]);

      expect(await readFile(ROADMAP_FILE, 'utf-8')).toBe('1. Frontend Tasks: build the feed\n');
    });
  });
});
