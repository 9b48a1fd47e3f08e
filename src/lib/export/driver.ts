/**
 * Export Driver
 *
 * Renders each exportable unit through a NodeRenderer and writes the bytes
 * to `<outputDir>/<name>.png`. A failed render or write marks that unit as
 * failed and the run moves on; every failure is listed in the manifest.
 *
 * Units are processed by a small pool of async workers pulling from one
 * shared iterator. All bookkeeping (claimed paths, processed list) is
 * updated synchronously inside `take()`, so no two workers ever interleave
 * on it.
 */

import { writeFile, rename, rm } from 'fs/promises';
import { join } from 'path';
import {
  ExportInvariantError,
  describeError,
  type ExportFailure,
} from '../errors.js';
import type { DesignNode } from '../tree/index.js';
import type { ExportableUnit, ExportStatus } from '../traversal/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Produces image bytes for a node. Implementations may be sync or async.
 */
export interface NodeRenderer {
  render(node: DesignNode): Promise<Uint8Array> | Uint8Array;
}

/**
 * Unit sequence, optionally reporting units a cap left out. `skipped` is
 * read once the sequence is drained.
 */
export interface UnitSource extends Iterable<ExportableUnit> {
  readonly skipped?: number;
}

export interface ExportDriverOptions {
  /** Must already exist */
  outputDir: string;
  /** Parallel render/write workers (default: 4) */
  concurrency?: number;
  /** Stop taking new units once aborted; in-flight units still finish */
  signal?: AbortSignal;
}

export interface ManifestEntry {
  name: string;
  nodeId: string;
  nodeName: string;
  status: ExportStatus;
  path?: string;
  failure?: ExportFailure;
}

export type ManifestFailure = ExportFailure & {
  name: string;
  nodeId: string;
};

export interface ExportManifest {
  outputDir: string;
  /** Units in the order they were taken from the sequence */
  units: ManifestEntry[];
  succeeded: number;
  failed: number;
  failures: ManifestFailure[];
  /** True when the signal stopped the run before the sequence was drained */
  interrupted: boolean;
  /** True when a unit cap left exportable nodes out */
  truncated: boolean;
  /** Exportable nodes left out by the cap */
  skipped: number;
}

interface ClaimedUnit {
  unit: ExportableUnit;
  path: string;
}

const PARTIAL_SUFFIX = '.partial';

// ============================================================================
// Export Driver
// ============================================================================

export class ExportDriver {
  private renderer: NodeRenderer;
  private outputDir: string;
  private concurrency: number;
  private signal?: AbortSignal;

  constructor(renderer: NodeRenderer, options: ExportDriverOptions) {
    this.renderer = renderer;
    this.outputDir = options.outputDir;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
    this.signal = options.signal;
  }

  /**
   * Export every unit. Resolves once all workers are idle; rejects only on
   * an invariant violation.
   */
  async export(units: UnitSource): Promise<ExportManifest> {
    const iterator = units[Symbol.iterator]();
    const claimedPaths = new Map<string, string>();
    const processed: ExportableUnit[] = [];
    const state: { exhausted: boolean; checkedRest: boolean; fatal?: Error } = {
      exhausted: false,
      checkedRest: false,
    };

    const take = (): ClaimedUnit | undefined => {
      if (state.fatal || state.exhausted) return undefined;
      if (this.signal?.aborted) {
        // An abort that lands after the last unit was taken is not an interruption
        if (!state.checkedRest) {
          state.checkedRest = true;
          state.exhausted = iterator.next().done === true;
        }
        return undefined;
      }

      const next = iterator.next();
      if (next.done) {
        state.exhausted = true;
        return undefined;
      }

      const unit = next.value;
      const path = join(this.outputDir, `${unit.name}.png`);
      const key = path.toLowerCase();
      const owner = claimedPaths.get(key);
      if (owner !== undefined) {
        state.fatal = new ExportInvariantError(
          `Units "${owner}" and "${unit.name}" both resolve to ${path}`
        );
        return undefined;
      }

      claimedPaths.set(key, unit.name);
      processed.push(unit);
      return { unit, path };
    };

    const worker = async (): Promise<void> => {
      for (let item = take(); item; item = take()) {
        await this.exportUnit(item.unit, item.path);
      }
    };

    const results = await Promise.allSettled(
      Array.from({ length: this.concurrency }, () => worker())
    );

    if (state.fatal) throw state.fatal;
    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
    }

    const skipped = state.exhausted ? (units.skipped ?? 0) : 0;
    const manifest = this.buildManifest(processed, !state.exhausted, skipped);
    console.log(
      `[Export] ${manifest.succeeded} succeeded, ${manifest.failed} failed` +
        (manifest.interrupted ? ' (interrupted)' : '')
    );
    if (manifest.truncated) {
      console.warn(`[Export] Unit limit reached, ${skipped} more exportable nodes were not exported`);
    }
    return manifest;
  }

  private async exportUnit(unit: ExportableUnit, path: string): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = await this.renderer.render(unit.node);
    } catch (error) {
      console.warn(`[Export] Render failed for ${unit.name}: ${describeError(error)}`);
      unit.markFailed({ kind: 'render', message: describeError(error) });
      return;
    }

    // Write beside the target and rename, so a crash never leaves a
    // truncated file under the final name
    const partialPath = `${path}${PARTIAL_SUFFIX}`;
    try {
      await writeFile(partialPath, bytes);
      await rename(partialPath, path);
    } catch (error) {
      await this.removePartial(partialPath);
      console.warn(`[Export] Write failed for ${unit.name}: ${describeError(error)}`);
      unit.markFailed({ kind: 'write', message: describeError(error) });
      return;
    }

    unit.markSucceeded(path);
    console.log(`[Export] ✓ ${unit.name}`);
  }

  private async removePartial(partialPath: string): Promise<void> {
    try {
      await rm(partialPath, { force: true });
    } catch (error) {
      console.warn(`[Export] Could not remove ${partialPath}: ${describeError(error)}`);
    }
  }

  private buildManifest(
    processed: ExportableUnit[],
    interrupted: boolean,
    skipped: number
  ): ExportManifest {
    const units: ManifestEntry[] = processed.map(unit => ({
      name: unit.name,
      nodeId: unit.node.id,
      nodeName: unit.node.name,
      status: unit.status,
      ...(unit.path !== undefined ? { path: unit.path } : {}),
      ...(unit.failure !== undefined ? { failure: unit.failure } : {}),
    }));

    const failures: ManifestFailure[] = [];
    for (const unit of processed) {
      if (unit.failure) {
        failures.push({ name: unit.name, nodeId: unit.node.id, ...unit.failure });
      }
    }

    return {
      outputDir: this.outputDir,
      units,
      succeeded: units.filter(entry => entry.status === 'succeeded').length,
      failed: failures.length,
      failures,
      interrupted,
      truncated: skipped > 0,
      skipped,
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createExportDriver(
  renderer: NodeRenderer,
  options: ExportDriverOptions
): ExportDriver {
  return new ExportDriver(renderer, options);
}
