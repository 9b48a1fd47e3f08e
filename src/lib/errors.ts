/**
 * Error Types
 *
 * Structural errors abort a run immediately. Per-unit export problems are
 * not thrown: they are recorded as RenderFailure / WriteFailure values on
 * the export manifest.
 */

export class MalformedTreeError extends Error {
  /** Id path from the root to the offending node, when known */
  readonly path: string[];

  constructor(message: string, path: string[] = []) {
    super(path.length > 0 ? `${message} (at ${path.join(' > ')})` : message);
    this.name = 'MalformedTreeError';
    this.path = path;
  }
}

export class EmptyTreeError extends Error {
  constructor(message = 'Design tree has no nodes') {
    super(message);
    this.name = 'EmptyTreeError';
  }
}

/**
 * Two units resolved to the same output path. Traversal naming rules out
 * this case, so reaching it is a bug, not a recoverable condition.
 */
export class ExportInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportInvariantError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface RenderFailure {
  kind: 'render';
  message: string;
}

export interface WriteFailure {
  kind: 'write';
  message: string;
}

export type ExportFailure = RenderFailure | WriteFailure;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
