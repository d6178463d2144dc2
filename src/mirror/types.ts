import type { ExtractionResult } from '../extract/types.js';
import type { LeafSyncResult, SyncFailure } from '../sync/types.js';

export interface MirrorOptions {
  /** Cancels the run: no new fetch or extraction starts after abort */
  signal?: AbortSignal;
}

/** Final report of a mirror run */
export interface MirrorReport {
  /** Manifest label or root path */
  source: string;
  localRoot: string;
  selected: number;
  fetched: number;
  skipped: number;
  failed: number;
  cancelled: number;
  extracted: number;
  extractionFailed: number;

  /** Every failed path with its failure kind */
  failures: SyncFailure[];
  warnings: string[];
  leaves: LeafSyncResult[];
  extractions: ExtractionResult[];

  /** True only with zero failures of either kind and no cancellation */
  success: boolean;
  durationMs: number;
}
