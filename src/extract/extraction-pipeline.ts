/**
 * Extraction pipeline.
 *
 * Decompresses fetched archives into their containing directory through a
 * bounded worker pool. Each archive is extracted into a hidden staging
 * directory beside it; only after the extractor reports success are the
 * staged entries moved into place, the extraction recorded and saved in the
 * sync state, and the archive deleted. A failed extraction leaves the
 * archive on disk and records nothing, so the next run extracts it again
 * and overwrites any entries a failed move already put in place.
 */

import { EventEmitter } from 'node:events';
import type { Stats } from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import PQueue from 'p-queue';
import type { Logger } from 'pino';
import { ExtractionFailure, errorMessage } from '../errors.js';
import type { LeafNode } from '../manifest/types.js';
import type { SyncStateManager } from '../sync/sync-state.js';
import type { ExtractorRegistry } from './extractor-registry.js';
import type {
  ExtractionPipelineConfig,
  ExtractionPipelineEvents,
  ExtractionResult,
  ExtractionState,
  ExtractOptions,
} from './types.js';

/**
 * Typed event emitter interface for the extraction pipeline.
 */
export interface TypedExtractionPipelineEmitter {
  on<K extends keyof ExtractionPipelineEvents>(
    event: K,
    listener: ExtractionPipelineEvents[K]
  ): this;
  off<K extends keyof ExtractionPipelineEvents>(
    event: K,
    listener: ExtractionPipelineEvents[K]
  ): this;
  emit<K extends keyof ExtractionPipelineEvents>(
    event: K,
    ...args: Parameters<ExtractionPipelineEvents[K]>
  ): boolean;
}

/** Staging directory for an archive, e.g. `a/.x.zip.extracting` */
export function stagingPathFor(archivePath: string): string {
  return path.join(path.dirname(archivePath), `.${path.basename(archivePath)}.extracting`);
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fsp.stat(target);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Move `source` onto `target`. Directories that already exist are merged
 * entry by entry, so archives that share a top-level directory can be
 * extracted side by side. Anything else at the target is replaced.
 */
async function moveInto(source: string, target: string): Promise<void> {
  const targetStat = await statOrNull(target);
  if (targetStat !== null) {
    const sourceStat = await fsp.stat(source);
    if (targetStat.isDirectory() && sourceStat.isDirectory()) {
      for (const entry of await fsp.readdir(source)) {
        await moveInto(path.join(source, entry), path.join(target, entry));
      }
      await fsp.rmdir(source);
      return;
    }
    await fsp.rm(target, { recursive: true, force: true });
  }
  await fsp.rename(source, target);
}

export class ExtractionPipeline extends EventEmitter implements TypedExtractionPipelineEmitter {
  private readonly registry: ExtractorRegistry;
  private readonly config: ExtractionPipelineConfig;
  private readonly logger: Logger;
  private readonly state: SyncStateManager | null;
  private readonly queue: PQueue;
  private readonly states = new Map<string, ExtractionState>();

  constructor(
    registry: ExtractorRegistry,
    config: ExtractionPipelineConfig,
    logger: Logger,
    state?: SyncStateManager
  ) {
    super();
    this.registry = registry;
    this.config = config;
    this.logger = logger.child({ component: 'extraction-pipeline' });
    this.state = state ?? null;
    this.queue = new PQueue({ concurrency: config.concurrency });
  }

  /** Current state of an archive, by remote path */
  stateOf(remotePath: string): ExtractionState | undefined {
    return this.states.get(remotePath);
  }

  /** Archives queued or extracting */
  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  /**
   * Queue a downloaded archive for extraction. Resolves with the outcome;
   * never rejects. When the signal is aborted before the extraction starts
   * the archive stays in the downloaded state.
   */
  extract(
    leaf: LeafNode,
    archivePath: string,
    options: ExtractOptions = {}
  ): Promise<ExtractionResult> {
    this.setState(leaf, 'downloaded');
    return this.queue.add(() => this.runExtraction(leaf, archivePath, options), {
      throwOnTimeout: true,
    });
  }

  /** Wait until every queued extraction has finished */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }

  private async runExtraction(
    leaf: LeafNode,
    archivePath: string,
    options: ExtractOptions
  ): Promise<ExtractionResult> {
    const startTime = Date.now();

    if (options.signal?.aborted) {
      this.logger.debug({ archivePath }, 'Extraction not started, run cancelled');
      return {
        leaf,
        archivePath,
        state: 'downloaded',
        entries: 0,
        archiveDeleted: false,
        durationMs: 0,
      };
    }

    const extractor = this.registry.resolve(leaf.name);
    if (extractor === null) {
      return this.fail(leaf, archivePath, startTime, 'no extractor registered for this archive type');
    }

    const stagingDir = stagingPathFor(archivePath);
    const destDir = path.dirname(archivePath);
    this.setState(leaf, 'extracting');
    this.logger.debug({ archivePath, extractor: extractor.name }, 'Extracting archive');

    try {
      await fsp.rm(stagingDir, { recursive: true, force: true });
      await fsp.mkdir(stagingDir, { recursive: true });

      const outcome = await extractor.extract(archivePath, stagingDir, options);
      if (!outcome.success) {
        await fsp.rm(stagingDir, { recursive: true, force: true });
        return this.fail(
          leaf,
          archivePath,
          startTime,
          outcome.error ?? `${extractor.name} reported failure`
        );
      }

      const entries = await fsp.readdir(stagingDir);
      for (const entry of entries) {
        await moveInto(path.join(stagingDir, entry), path.join(destDir, entry));
      }
      await fsp.rm(stagingDir, { recursive: true, force: true });

      // The record reaches disk before the archive is removed
      if (this.state !== null) {
        this.state.markExtracted(leaf.remotePath, leaf.sizeBytes);
        this.state.save();
      }
      if (!this.config.keepArchives) {
        await fsp.rm(archivePath, { force: true });
      }
      this.setState(leaf, 'extracted');

      const result: ExtractionResult = {
        leaf,
        archivePath,
        state: 'extracted',
        entries: entries.length,
        archiveDeleted: !this.config.keepArchives,
        durationMs: Date.now() - startTime,
      };
      this.logger.info(
        { archivePath, entries: entries.length, durationMs: result.durationMs },
        'Archive extracted'
      );
      this.emit('extracted', result);
      return result;
    } catch (err) {
      await fsp
        .rm(stagingDir, { recursive: true, force: true })
        .catch((cleanupErr: unknown) => {
          this.logger.warn(
            { stagingDir, error: errorMessage(cleanupErr) },
            'Failed to remove staging directory'
          );
        });
      return this.fail(leaf, archivePath, startTime, errorMessage(err));
    }
  }

  private fail(
    leaf: LeafNode,
    archivePath: string,
    startTime: number,
    reason: string
  ): ExtractionResult {
    const failure = new ExtractionFailure(archivePath, reason);
    this.setState(leaf, 'extraction-failed');

    const result: ExtractionResult = {
      leaf,
      archivePath,
      state: 'extraction-failed',
      entries: 0,
      archiveDeleted: false,
      durationMs: Date.now() - startTime,
      error: failure.message,
    };
    this.logger.error({ archivePath, error: reason }, 'Extraction failed, archive kept');
    this.emit('extractionFailed', result);
    return result;
  }

  private setState(leaf: LeafNode, state: ExtractionState): void {
    this.states.set(leaf.remotePath, state);
    this.emit('stateChange', leaf, state);
  }
}
