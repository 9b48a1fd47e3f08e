/**
 * Figma API Client
 *
 * Fetches file documents and rendered node images, with one rate limiter
 * per Figma API tier.
 *
 * Rate Limits (per minute):
 * - Tier 1 (Image export): 20/min per Full seat
 * - Tier 2 (File metadata): 100/min
 */

import { z } from 'zod';
import type { NodeRenderer } from '../export/index.js';
import type { DesignNode } from '../tree/index.js';

// ============================================================================
// Types & Schemas
// ============================================================================

// The node tree itself is validated by the tree loader
const FigmaFileSchema = z
  .object({
    name: z.string(),
    lastModified: z.string().optional(),
    version: z.string().optional(),
    document: z.record(z.unknown()),
  })
  .passthrough();

export type FigmaFile = z.infer<typeof FigmaFileSchema>;

const FigmaImageResponseSchema = z.object({
  err: z.string().nullable(),
  images: z.record(z.string().nullable()),
});

export type ImageFormat = 'png' | 'svg' | 'pdf' | 'jpg';

export interface FigmaClientConfig {
  token: string;
  /** Requests per minute, per tier */
  rateLimits?: {
    images?: number;
    metadata?: number;
  };
}

export interface ImageExportOptions {
  format?: ImageFormat;
  scale?: number;
}

// ============================================================================
// Rate Limiter
// ============================================================================

class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private lastRequestTime = 0;
  private minDelay: number;

  constructor(requestsPerMinute: number) {
    this.minDelay = Math.ceil(60000 / requestsPerMinute);
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          const result = await fn();
          resolve(result);
        } catch (error) {
          reject(error);
        }
      });
      // Queue tasks settle their own promises, so this never rejects
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing || this.queue.length === 0) return;
    this.processing = true;

    while (this.queue.length > 0) {
      const now = Date.now();
      const elapsed = now - this.lastRequestTime;

      if (elapsed < this.minDelay) {
        await this.sleep(this.minDelay - elapsed);
      }

      const task = this.queue.shift();
      if (task) {
        this.lastRequestTime = Date.now();
        await task();
      }
    }

    this.processing = false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

// ============================================================================
// URL helpers
// ============================================================================

/**
 * Accepts `https://www.figma.com/file/<key>/...`, `.../design/<key>/...`
 * or a bare file key
 */
export function extractFileKey(input: string): string {
  const trimmed = input.trim();
  if (/^[A-Za-z0-9]+$/.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new Error(`Invalid Figma URL format: ${input}`);
  }

  const parts = url.pathname.split('/').filter(Boolean);
  for (let i = 0; i < parts.length - 1; i++) {
    if (parts[i] === 'file' || parts[i] === 'design') {
      return parts[i + 1];
    }
  }

  throw new Error(`Invalid Figma URL format: ${input}`);
}

// ============================================================================
// Figma Client
// ============================================================================

export class FigmaClient {
  private token: string;
  private baseUrl = 'https://api.figma.com/v1';

  private tier1Limiter: RateLimiter; // Image exports
  private tier2Limiter: RateLimiter; // File metadata

  constructor(config: FigmaClientConfig) {
    this.token = config.token;
    this.tier1Limiter = new RateLimiter(config.rateLimits?.images ?? 20);
    this.tier2Limiter = new RateLimiter(config.rateLimits?.metadata ?? 100);
  }

  // --------------------------------------------------------------------------
  // Core API Methods
  // --------------------------------------------------------------------------

  private async request(endpoint: string, limiter: RateLimiter): Promise<unknown> {
    return limiter.schedule(async () => {
      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        headers: {
          'X-Figma-Token': this.token,
        },
      });

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`Figma API error (${response.status}): ${text}`);
      }

      const body: unknown = await response.json();
      return body;
    });
  }

  /**
   * Get file metadata and the full document tree
   */
  async getFile(fileKey: string): Promise<FigmaFile> {
    console.log(`[Figma] Fetching file structure for ${fileKey}...`);
    const data = await this.request(`/files/${fileKey}`, this.tier2Limiter);
    return FigmaFileSchema.parse(data);
  }

  /**
   * Ask Figma to render nodes. Returns temporary image URLs keyed by node
   * id; a node Figma could not render maps to null.
   */
  async exportImages(
    fileKey: string,
    nodeIds: string[],
    options: ImageExportOptions = {}
  ): Promise<Record<string, string | null>> {
    const { format = 'png', scale = 2 } = options;
    const ids = nodeIds.join(',');

    const data = await this.request(
      `/images/${fileKey}?ids=${encodeURIComponent(ids)}&format=${format}&scale=${scale}`,
      this.tier1Limiter
    );

    const parsed = FigmaImageResponseSchema.parse(data);
    if (parsed.err) {
      throw new Error(`Figma image export error: ${parsed.err}`);
    }

    return parsed.images;
  }

  /**
   * Download a rendered image. Image URLs are pre-signed, so no token and
   * no rate limiting.
   */
  async downloadImage(url: string): Promise<Buffer> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`Failed to download image: ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  // --------------------------------------------------------------------------
  // High-Level Methods
  // --------------------------------------------------------------------------

  /**
   * Render one node and return its image bytes
   */
  async renderNode(
    fileKey: string,
    nodeId: string,
    options: ImageExportOptions = {}
  ): Promise<Buffer> {
    const images = await this.exportImages(fileKey, [nodeId], options);
    const url = images[nodeId];
    if (!url) {
      throw new Error(`Figma returned no image for node ${nodeId}`);
    }
    return this.downloadImage(url);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createFigmaClient(config: FigmaClientConfig): FigmaClient {
  return new FigmaClient(config);
}

/**
 * NodeRenderer backed by the Figma image export API
 */
export function createFigmaRenderer(
  client: FigmaClient,
  fileKey: string,
  options: Pick<ImageExportOptions, 'scale'> = {}
): NodeRenderer {
  return {
    render: (node: DesignNode) => client.renderNode(fileKey, node.id, { ...options, format: 'png' }),
  };
}
