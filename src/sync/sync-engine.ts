/**
 * Selective sync engine.
 *
 * Fetches the leaves of a manifest matched by a selection into a mirrored
 * local tree. Every object is streamed into a hidden partial file beside
 * its target and renamed onto the target only after its size is verified, so the final path
 * never holds a partial object and re-runs converge without re-fetching
 * completed objects.
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import PQueue from 'p-queue';
import type { Logger } from 'pino';
import {
  FetchExhaustedError,
  InvalidSelectionError,
  ObjectNotFoundError,
  TransientFetchError,
  errorMessage,
} from '../errors.js';
import type { Manifest } from '../manifest/manifest.js';
import { describeSelection, selectLeaves } from '../manifest/selection.js';
import type { Selection } from '../manifest/selection.js';
import type { LeafNode } from '../manifest/types.js';
import type { ObjectStore } from '../store/types.js';
import type { SyncStateManager } from './sync-state.js';
import type {
  LeafSyncResult,
  SyncEngineConfig,
  SyncEngineEvents,
  SyncFailure,
  SyncRunResult,
} from './types.js';

export const PARTIAL_SUFFIX = '.dsmirror-part';

/**
 * Typed event emitter interface for the sync engine.
 */
export interface TypedSyncEngineEmitter {
  on<K extends keyof SyncEngineEvents>(event: K, listener: SyncEngineEvents[K]): this;
  off<K extends keyof SyncEngineEvents>(event: K, listener: SyncEngineEvents[K]): this;
  emit<K extends keyof SyncEngineEvents>(
    event: K,
    ...args: Parameters<SyncEngineEvents[K]>
  ): boolean;
}

export interface SyncRunOptions {
  /** Stops new leaves from starting; in-flight leaves finish */
  signal?: AbortSignal;

  /**
   * Called for every leaf whose complete file sits at its final path after
   * this run (fetched, or skipped because it was already present).
   */
  onLeafReady?: (result: LeafSyncResult) => void;
}

/** Local path of a leaf under the mirror root */
export function localPathFor(localRoot: string, relativePath: string): string {
  return path.join(localRoot, ...relativePath.split('/'));
}

/**
 * Temp file an object streams into, e.g. `a/.x.zip.dsmirror-part`.
 * Hidden and suffixed so that it never coincides with another leaf's target.
 */
export function partialPathFor(localPath: string): string {
  return path.join(path.dirname(localPath), `.${path.basename(localPath)}${PARTIAL_SUFFIX}`);
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** Local filesystem errors that another attempt cannot fix */
const LOCAL_FS_CODES = [
  'ENAMETOOLONG',
  'EACCES',
  'EPERM',
  'EROFS',
  'ENOSPC',
  'EISDIR',
  'ENOTDIR',
];

export class SyncEngine extends EventEmitter implements TypedSyncEngineEmitter {
  private readonly store: ObjectStore;
  private readonly config: SyncEngineConfig;
  private readonly logger: Logger;
  private readonly state: SyncStateManager | null;

  constructor(
    store: ObjectStore,
    config: SyncEngineConfig,
    logger: Logger,
    state?: SyncStateManager
  ) {
    super();
    this.store = store;
    this.config = config;
    this.logger = logger.child({ component: 'sync-engine' });
    this.state = state ?? null;
  }

  /**
   * Fetch every selected leaf through a bounded worker pool.
   *
   * Per-leaf failures are collected, never thrown. An empty selection is
   * reported as a warning.
   */
  async run(
    manifest: Manifest,
    selection: Selection = {},
    options: SyncRunOptions = {}
  ): Promise<SyncRunResult> {
    const startTime = Date.now();
    const leaves = selectLeaves(manifest, selection);
    const warnings: string[] = [];

    if (leaves.length === 0) {
      const warning = new InvalidSelectionError(describeSelection(selection));
      warnings.push(warning.message);
      this.logger.warn({ selection }, warning.message);
      this.emit('warning', warning);
    }

    this.logger.info(
      {
        selected: leaves.length,
        bytes: leaves.reduce((sum, leaf) => sum + leaf.sizeBytes, 0),
        concurrency: this.config.concurrency,
      },
      'Starting sync'
    );

    const queue = new PQueue({ concurrency: this.config.concurrency });
    const results = await Promise.all(
      leaves.map((leaf) =>
        queue.add(async (): Promise<LeafSyncResult> => {
          const relativePath = manifest.relativePath(leaf);
          if (options.signal?.aborted) {
            return this.cancelledResult(leaf, relativePath, 0);
          }

          const result = await this.syncLeaf(leaf, relativePath, options.signal);
          if (result.status === 'fetched' || result.skipReason === 'present') {
            this.notifyReady(result, options.onLeafReady);
          }
          return result;
        })
      )
    );

    const leafResults = results.filter(
      (result): result is LeafSyncResult => result !== undefined
    );
    const failures: SyncFailure[] = leafResults
      .filter((result) => result.status === 'failed')
      .map((result) => ({
        remotePath: result.leaf.remotePath,
        kind: 'fetch-exhausted',
        message: result.error ?? 'unknown error',
      }));

    const count = (status: LeafSyncResult['status']): number =>
      leafResults.filter((result) => result.status === status).length;

    const summary: SyncRunResult = {
      selected: leaves.length,
      fetched: count('fetched'),
      skipped: count('skipped'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      failures,
      leaves: leafResults,
      warnings,
      success: false,
      durationMs: Date.now() - startTime,
    };
    summary.success = summary.failed === 0 && summary.cancelled === 0;

    this.logger.info(
      {
        fetched: summary.fetched,
        skipped: summary.skipped,
        failed: summary.failed,
        cancelled: summary.cancelled,
        durationMs: summary.durationMs,
      },
      'Sync complete'
    );

    return summary;
  }

  /**
   * Skip, or fetch with retries, a single leaf. Never rejects: every error
   * becomes a failed result so siblings are unaffected. No retry starts
   * once the signal is aborted.
   */
  private async syncLeaf(
    leaf: LeafNode,
    relativePath: string,
    signal?: AbortSignal
  ): Promise<LeafSyncResult> {
    const startTime = Date.now();
    const localPath = localPathFor(this.config.localRoot, relativePath);
    this.emit('leafStart', leaf);

    const base = { leaf, relativePath, localPath };

    if (leaf.kind === 'archive' && this.state?.isExtracted(leaf.remotePath, leaf.sizeBytes)) {
      const result: LeafSyncResult = {
        ...base,
        status: 'skipped',
        skipReason: 'extracted',
        attempts: 0,
        bytesFetched: 0,
        durationMs: Date.now() - startTime,
      };
      this.logger.debug({ relativePath }, 'Archive already extracted');
      this.emit('leafSkipped', result);
      return result;
    }

    let present: boolean;
    try {
      present = await this.isPresent(localPath, leaf.sizeBytes);
    } catch (err) {
      return this.failedResult(leaf, relativePath, startTime, 0, err);
    }

    if (present) {
      const result: LeafSyncResult = {
        ...base,
        status: 'skipped',
        skipReason: 'present',
        attempts: 0,
        bytesFetched: 0,
        durationMs: Date.now() - startTime,
      };
      this.logger.debug({ relativePath }, 'Object already present');
      this.emit('leafSkipped', result);
      return result;
    }

    const maxAttempts = this.config.maxRetries + 1;
    let attempts = 0;
    let lastError: unknown;

    while (attempts < maxAttempts) {
      if (attempts > 0 && signal?.aborted) {
        this.logger.info({ relativePath, attempts }, 'Retry abandoned, run cancelled');
        return this.cancelledResult(leaf, relativePath, attempts);
      }

      attempts++;
      try {
        const bytesFetched = await this.fetchOnce(leaf, localPath);
        const result: LeafSyncResult = {
          ...base,
          status: 'fetched',
          attempts,
          bytesFetched,
          durationMs: Date.now() - startTime,
        };
        this.logger.debug({ relativePath, size: bytesFetched, attempts }, 'Object fetched');
        this.emit('leafFetched', result);
        return result;
      } catch (err) {
        lastError = err;
        if (!this.isTransient(err) || attempts >= maxAttempts) {
          break;
        }

        const delayMs = this.getBackoffDelay(attempts - 1);
        const error = err instanceof Error ? err : new Error(String(err));
        this.logger.warn(
          { relativePath, attempt: attempts, delayMs, error: error.message },
          'Fetch failed, retrying'
        );
        this.emit('retry', leaf, attempts, delayMs, error);
        await this.sleep(delayMs, signal);
      }
    }

    return this.failedResult(leaf, relativePath, startTime, attempts, lastError);
  }

  private failedResult(
    leaf: LeafNode,
    relativePath: string,
    startTime: number,
    attempts: number,
    cause: unknown
  ): LeafSyncResult {
    const failure = new FetchExhaustedError(leaf.remotePath, attempts, cause);
    const result: LeafSyncResult = {
      leaf,
      relativePath,
      localPath: localPathFor(this.config.localRoot, relativePath),
      status: 'failed',
      attempts,
      bytesFetched: 0,
      durationMs: Date.now() - startTime,
      error: failure.message,
    };
    this.logger.error({ relativePath, attempts, error: errorMessage(cause) }, 'Fetch failed');
    this.emit('leafFailed', result);
    return result;
  }

  /**
   * One fetch attempt: stream into the temp path, verify the size, rename.
   * The temp file is removed on any failure.
   */
  private async fetchOnce(leaf: LeafNode, localPath: string): Promise<number> {
    const tmpPath = partialPathFor(localPath);
    await fsp.mkdir(path.dirname(localPath), { recursive: true });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.fetchTimeoutMs);

    try {
      const body = await this.store.getObject(leaf.remotePath, { signal: controller.signal });
      await pipeline(body, fs.createWriteStream(tmpPath), { signal: controller.signal });

      const { size } = await fsp.stat(tmpPath);
      if (size !== leaf.sizeBytes) {
        throw new TransientFetchError(
          `Size mismatch for ${leaf.remotePath}: expected ${leaf.sizeBytes} bytes, got ${size}`
        );
      }

      await fsp.rename(tmpPath, localPath);
      return size;
    } catch (err) {
      await this.removePartial(tmpPath);
      if (controller.signal.aborted) {
        throw new TransientFetchError(
          `Fetch of ${leaf.remotePath} timed out after ${this.config.fetchTimeoutMs}ms`,
          { cause: err }
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private async removePartial(tmpPath: string): Promise<void> {
    try {
      await fsp.rm(tmpPath, { force: true });
    } catch (err) {
      this.logger.warn({ tmpPath, error: errorMessage(err) }, 'Failed to remove partial file');
    }
  }

  private async isPresent(localPath: string, sizeBytes: number): Promise<boolean> {
    try {
      const stat = await fsp.stat(localPath);
      return stat.isFile() && stat.size === sizeBytes;
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT') || isErrnoCode(err, 'ENOTDIR')) {
        return false;
      }
      throw err;
    }
  }

  private isTransient(err: unknown): boolean {
    if (err instanceof ObjectNotFoundError) {
      return false;
    }
    return !LOCAL_FS_CODES.some((code) => isErrnoCode(err, code));
  }

  private notifyReady(
    result: LeafSyncResult,
    onLeafReady: SyncRunOptions['onLeafReady']
  ): void {
    if (!onLeafReady) {
      return;
    }
    try {
      onLeafReady(result);
    } catch (err) {
      this.logger.error(
        { relativePath: result.relativePath, error: errorMessage(err) },
        'Leaf ready handler failed'
      );
    }
  }

  private cancelledResult(
    leaf: LeafNode,
    relativePath: string,
    attempts: number
  ): LeafSyncResult {
    return {
      leaf,
      relativePath,
      localPath: localPathFor(this.config.localRoot, relativePath),
      status: 'cancelled',
      attempts,
      bytesFetched: 0,
      durationMs: 0,
    };
  }

  /**
   * Calculate delay with exponential backoff and jitter.
   */
  protected getBackoffDelay(attempt: number): number {
    const exponentialDelay = this.config.retryBaseDelayMs * Math.pow(2, attempt);
    const jitter = Math.random() * this.config.retryBaseDelayMs;
    return Math.min(this.config.retryMaxDelayMs, exponentialDelay + jitter);
  }

  /**
   * Sleep for a given number of milliseconds, or until the signal aborts.
   * Extracted as a method so tests can override it.
   */
  protected sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
