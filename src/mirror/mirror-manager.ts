/**
 * Mirror manager.
 *
 * Wires the sync engine to the extraction pipeline for one run: every
 * archive whose verified file is in place is handed to the pipeline as
 * soon as it is ready, so extraction of early archives overlaps with
 * fetching of later ones. The sync state is loaded before the run and
 * saved after the pipeline drains.
 */

import type { Logger } from 'pino';
import type { MirrorConfig } from '../config.js';
import { ExtractionPipeline } from '../extract/extraction-pipeline.js';
import type { ExtractorRegistry } from '../extract/extractor-registry.js';
import type { ExtractionResult } from '../extract/types.js';
import type { Manifest } from '../manifest/manifest.js';
import type { Selection } from '../manifest/selection.js';
import type { ObjectStore } from '../store/types.js';
import { SyncEngine } from '../sync/sync-engine.js';
import { SyncStateManager } from '../sync/sync-state.js';
import type { SyncEngineConfig, SyncFailure } from '../sync/types.js';
import type { MirrorOptions, MirrorReport } from './types.js';

export type MirrorManagerConfig = Pick<
  MirrorConfig,
  | 'localRoot'
  | 'concurrency'
  | 'extractConcurrency'
  | 'maxRetries'
  | 'retryBaseDelayMs'
  | 'retryMaxDelayMs'
  | 'fetchTimeoutMs'
  | 'extract'
  | 'keepArchives'
  | 'stateFilePath'
>;

export class MirrorManager {
  private readonly store: ObjectStore;
  private readonly registry: ExtractorRegistry;
  private readonly config: MirrorManagerConfig;
  private readonly logger: Logger;

  constructor(
    store: ObjectStore,
    registry: ExtractorRegistry,
    config: MirrorManagerConfig,
    logger: Logger
  ) {
    this.store = store;
    this.registry = registry;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Build a sync engine for a state manager. Override in tests to tune
   * retries or sleeping.
   */
  protected createEngine(state: SyncStateManager): SyncEngine {
    const engineConfig: SyncEngineConfig = {
      localRoot: this.config.localRoot,
      concurrency: this.config.concurrency,
      maxRetries: this.config.maxRetries,
      retryBaseDelayMs: this.config.retryBaseDelayMs,
      retryMaxDelayMs: this.config.retryMaxDelayMs,
      fetchTimeoutMs: this.config.fetchTimeoutMs,
    };
    return new SyncEngine(this.store, engineConfig, this.logger, state);
  }

  async mirror(
    manifest: Manifest,
    selection: Selection = {},
    options: MirrorOptions = {}
  ): Promise<MirrorReport> {
    const startTime = Date.now();
    const state = new SyncStateManager(this.config.stateFilePath, manifest.rootPath);
    state.load();

    const engine = this.createEngine(state);
    const pipeline = this.config.extract
      ? new ExtractionPipeline(
          this.registry,
          { concurrency: this.config.extractConcurrency, keepArchives: this.config.keepArchives },
          this.logger,
          state
        )
      : null;
    const pending: Promise<ExtractionResult>[] = [];

    let extractions: ExtractionResult[] = [];
    try {
      const syncResult = await engine.run(manifest, selection, {
        signal: options.signal,
        onLeafReady: (result) => {
          if (pipeline !== null && result.leaf.kind === 'archive') {
            pending.push(
              pipeline.extract(result.leaf, result.localPath, { signal: options.signal })
            );
          }
        },
      });

      extractions = await Promise.all(pending);

      const extractionFailures: SyncFailure[] = extractions
        .filter((extraction) => extraction.state === 'extraction-failed')
        .map((extraction) => ({
          remotePath: extraction.leaf.remotePath,
          kind: 'extraction-failed',
          message: extraction.error ?? 'unknown error',
        }));

      const extracted = extractions.filter((e) => e.state === 'extracted').length;
      const report: MirrorReport = {
        source: manifest.label ?? manifest.rootPath,
        localRoot: this.config.localRoot,
        selected: syncResult.selected,
        fetched: syncResult.fetched,
        skipped: syncResult.skipped,
        failed: syncResult.failed,
        cancelled: syncResult.cancelled,
        extracted,
        extractionFailed: extractionFailures.length,
        failures: [...syncResult.failures, ...extractionFailures],
        warnings: syncResult.warnings,
        leaves: syncResult.leaves,
        extractions,
        success: syncResult.success && extractionFailures.length === 0,
        durationMs: Date.now() - startTime,
      };

      this.logger.info(
        {
          source: report.source,
          extracted: report.extracted,
          extractionFailed: report.extractionFailed,
          success: report.success,
        },
        'Mirror run complete'
      );
      return report;
    } finally {
      state.save();
    }
  }
}
