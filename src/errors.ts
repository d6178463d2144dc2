/**
 * Error taxonomy for manifest construction, rendering, sync and extraction.
 *
 * Manifest errors are fatal and thrown before any I/O starts. Per-leaf
 * errors (fetch, extraction) are collected into the mirror report instead
 * of being thrown.
 */

export type DsMirrorErrorCode =
  | 'MALFORMED_MANIFEST'
  | 'DUPLICATE_LEAF'
  | 'MALFORMED_PATH'
  | 'INVALID_DEPTH'
  | 'INVALID_SELECTION'
  | 'TRANSIENT_FETCH'
  | 'OBJECT_NOT_FOUND'
  | 'FETCH_EXHAUSTED'
  | 'EXTRACTION_FAILED'
  | 'CONFIG';

export class DsMirrorError extends Error {
  public readonly code: DsMirrorErrorCode;

  constructor(code: DsMirrorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DsMirrorError';
    this.code = code;
  }
}

/** Bad JSON or path structure in a manifest or listing. */
export class MalformedManifestError extends DsMirrorError {
  constructor(message: string, code: DsMirrorErrorCode = 'MALFORMED_MANIFEST') {
    super(code, message);
    this.name = 'MalformedManifestError';
  }
}

/** Two records resolve to the same remote path with a different kind or size. */
export class DuplicateLeafError extends MalformedManifestError {
  public readonly remotePath: string;

  constructor(remotePath: string, detail: string) {
    super(`Conflicting records for "${remotePath}": ${detail}`, 'DUPLICATE_LEAF');
    this.name = 'DuplicateLeafError';
    this.remotePath = remotePath;
  }
}

export class MalformedPathError extends MalformedManifestError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Malformed path "${path}": ${reason}`, 'MALFORMED_PATH');
    this.name = 'MalformedPathError';
    this.path = path;
  }
}

export class InvalidDepthError extends DsMirrorError {
  constructor(depth: number) {
    super('INVALID_DEPTH', `Collapse depth must be a non-negative integer, got ${depth}`);
    this.name = 'InvalidDepthError';
  }
}

/** Raised as a warning: an empty selection may be intentional. */
export class InvalidSelectionError extends DsMirrorError {
  constructor(description: string) {
    super('INVALID_SELECTION', `Selection ${description} matches no objects`);
    this.name = 'InvalidSelectionError';
  }
}

export class TransientFetchError extends DsMirrorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_FETCH', message, options);
    this.name = 'TransientFetchError';
  }
}

export class ObjectNotFoundError extends DsMirrorError {
  constructor(remotePath: string) {
    super('OBJECT_NOT_FOUND', `Object not found: ${remotePath}`);
    this.name = 'ObjectNotFoundError';
  }
}

export class FetchExhaustedError extends DsMirrorError {
  public readonly remotePath: string;
  public readonly attempts: number;

  constructor(remotePath: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'FETCH_EXHAUSTED',
      `Failed to fetch ${remotePath} after ${attempts} attempt(s): ${reason}`,
      { cause }
    );
    this.name = 'FetchExhaustedError';
    this.remotePath = remotePath;
    this.attempts = attempts;
  }
}

export class ExtractionFailure extends DsMirrorError {
  public readonly archivePath: string;

  constructor(archivePath: string, reason: string) {
    super('EXTRACTION_FAILED', `Extraction failed for ${archivePath}: ${reason}`);
    this.name = 'ExtractionFailure';
    this.archivePath = archivePath;
  }
}

export class ConfigError extends DsMirrorError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
