/**
 * Types for the extraction pipeline.
 */

import type { LeafNode } from '../manifest/types.js';

export interface ExtractOptions {
  /** Aborts a running extractor process */
  signal?: AbortSignal;
}

/** Outcome reported by an extractor */
export interface ExtractResult {
  success: boolean;
  error?: string;
}

/**
 * Archive codec collaborator. Decompresses `archivePath` into `destDir`
 * and reports failure instead of throwing.
 */
export interface ArchiveExtractor {
  /** Short name used in logs, e.g. "7z" */
  readonly name: string;

  extract(archivePath: string, destDir: string, options?: ExtractOptions): Promise<ExtractResult>;
}

/**
 * Per-archive state: downloaded → extracting → extracted | extraction-failed.
 * An archive whose extraction never started (cancelled run) stays downloaded.
 */
export type ExtractionState = 'downloaded' | 'extracting' | 'extracted' | 'extraction-failed';

export interface ExtractionResult {
  leaf: LeafNode;

  /** Local path of the archive */
  archivePath: string;

  state: ExtractionState;

  /** Top-level entries moved out of the staging directory */
  entries: number;

  /** Whether the archive file was deleted */
  archiveDeleted: boolean;

  durationMs: number;

  /** Error message when state is 'extraction-failed' */
  error?: string;
}

export interface ExtractionPipelineConfig {
  /** Parallel extraction workers */
  concurrency: number;

  /** Keep archives after a successful extraction */
  keepArchives: boolean;
}

/** Events emitted by the ExtractionPipeline */
export interface ExtractionPipelineEvents {
  /** An archive moved to a new state */
  stateChange: (leaf: LeafNode, state: ExtractionState) => void;

  /** An archive was extracted (and deleted unless archives are kept) */
  extracted: (result: ExtractionResult) => void;

  /** An extraction failed; the archive is left on disk */
  extractionFailed: (result: ExtractionResult) => void;
}
