/**
 * Figma Module
 *
 * Provides:
 * - FigmaClient: REST API client with per-tier rate limiting
 * - createFigmaRenderer: render collaborator for the export driver
 * - extractFileKey: file key from a Figma URL
 */

export {
  FigmaClient,
  createFigmaClient,
  createFigmaRenderer,
  extractFileKey,
  type FigmaClientConfig,
  type FigmaFile,
  type ImageExportOptions,
  type ImageFormat,
} from './client.js';
