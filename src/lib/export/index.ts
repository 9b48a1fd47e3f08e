/**
 * Export Module
 *
 * Provides:
 * - ExportDriver: bounded-concurrency render + write of exportable units
 * - NodeRenderer: the render collaborator contract
 * - Export manifest with per-unit status and collected failures
 */

export {
  ExportDriver,
  createExportDriver,
  type NodeRenderer,
  type UnitSource,
  type ExportDriverOptions,
  type ExportManifest,
  type ManifestEntry,
  type ManifestFailure,
} from './driver.js';
