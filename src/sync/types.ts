/**
 * Types for the selective sync engine.
 */

import type { LeafNode } from '../manifest/types.js';

/** Options for the sync engine (a subset of the mirror config) */
export interface SyncEngineConfig {
  /** Local directory the manifest root is mirrored into */
  localRoot: string;

  /** Parallel fetch workers */
  concurrency: number;

  /** Retries per object after the first attempt */
  maxRetries: number;

  /** Base delay for exponential backoff */
  retryBaseDelayMs: number;

  /** Upper bound for a single backoff delay */
  retryMaxDelayMs: number;

  /** Timeout for one fetch attempt */
  fetchTimeoutMs: number;
}

export type LeafSyncStatus = 'fetched' | 'skipped' | 'failed' | 'cancelled';

export type SkipReason = 'present' | 'extracted';

/** Outcome for a single selected leaf */
export interface LeafSyncResult {
  leaf: LeafNode;

  /** Path relative to the manifest root */
  relativePath: string;

  /** Final local path */
  localPath: string;

  status: LeafSyncStatus;

  /** Set when status is 'skipped' */
  skipReason?: SkipReason;

  /** Fetch attempts made (0 when skipped or cancelled before starting) */
  attempts: number;

  /** Bytes written (0 unless fetched) */
  bytesFetched: number;

  durationMs: number;

  /** Error message when status is 'failed' */
  error?: string;
}

export type SyncFailureKind = 'fetch-exhausted' | 'extraction-failed';

export interface SyncFailure {
  remotePath: string;
  kind: SyncFailureKind;
  message: string;
}

/** Result of one sync run */
export interface SyncRunResult {
  /** Leaves selected for this run */
  selected: number;
  fetched: number;
  skipped: number;
  failed: number;

  /** Leaves not started, or abandoned before a retry, because the run was cancelled */
  cancelled: number;

  /** Every failed leaf with its failure kind */
  failures: SyncFailure[];

  /** Per-leaf outcomes in selection order */
  leaves: LeafSyncResult[];

  /** Warning messages (e.g. empty selection) */
  warnings: string[];

  /** True when nothing failed and the run was not cancelled */
  success: boolean;

  durationMs: number;
}

/** Events emitted by the SyncEngine */
export interface SyncEngineEvents {
  /** A worker picked up a leaf */
  leafStart: (leaf: LeafNode) => void;

  /** A leaf was downloaded and renamed into place */
  leafFetched: (result: LeafSyncResult) => void;

  /** A leaf was already present */
  leafSkipped: (result: LeafSyncResult) => void;

  /** A leaf exhausted its retries */
  leafFailed: (result: LeafSyncResult) => void;

  /** A transient failure will be retried after `delayMs` */
  retry: (leaf: LeafNode, attempt: number, delayMs: number, error: Error) => void;

  /** Non-fatal problem, such as an empty selection */
  warning: (error: Error) => void;
}

/** Persisted record of an extracted archive */
export interface ExtractedEntry {
  /** Remote path of the archive */
  remotePath: string;

  /** Archive size when extracted */
  sizeBytes: number;

  /** Timestamp of the extraction */
  extractedAt: number;
}

/** Full sync state persisted to disk */
export interface SyncState {
  /** Version of the state file format */
  version: 1;

  /** Manifest root this state belongs to */
  rootPath: string;

  /** Map of remotePath -> ExtractedEntry */
  extracted: Record<string, ExtractedEntry>;
}
