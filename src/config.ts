/**
 * Mirror configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as os from 'node:os';
import * as path from 'node:path';

/** Configuration for listing, fetching and extracting a dataset */
export interface MirrorConfig {
  /** Bucket holding the datasets */
  bucket: string;

  /** Custom S3-compatible endpoint (path-style addressing); empty for AWS */
  endpoint: string;

  /** Region passed to the S3 client */
  region: string;

  /** Send unsigned requests (public buckets) */
  anonymous: boolean;

  /** Local directory the selection is mirrored into */
  localRoot: string;

  /** Parallel fetch workers */
  concurrency: number;

  /** Parallel extraction workers */
  extractConcurrency: number;

  /** Retries per object after the first attempt */
  maxRetries: number;

  /** Base delay for exponential backoff */
  retryBaseDelayMs: number;

  /** Upper bound for a single backoff delay */
  retryMaxDelayMs: number;

  /** Timeout for one fetch attempt */
  fetchTimeoutMs: number;

  /** Extract archives after download */
  extract: boolean;

  /** Keep archives on disk after a successful extraction */
  keepArchives: boolean;

  /** Path to the sync state file (records extracted archives) */
  stateFilePath: string;

  /** Maximum number of list pages per listing (safety limit) */
  maxListPages: number;
}

export const DEFAULT_MIRROR_CONFIG: Omit<
  MirrorConfig,
  'bucket' | 'endpoint' | 'localRoot' | 'stateFilePath' | 'concurrency'
> = {
  region: 'us-east-1',
  anonymous: true,
  extractConcurrency: 2,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 30_000,
  fetchTimeoutMs: 600_000,
  extract: true,
  keepArchives: false,
  maxListPages: 10_000,
};

export const STATE_FILE_NAME = '.dsmirror-state.json';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(8, os.availableParallelism()));
}

/**
 * Build mirror config from environment variables and optional overrides.
 *
 * Environment variables:
 * - DSMIRROR_BUCKET: bucket name
 * - DSMIRROR_ENDPOINT: S3-compatible endpoint (falls back to AWS_ENDPOINT_URL)
 * - DSMIRROR_REGION: region (default: us-east-1)
 * - DSMIRROR_ANONYMOUS: send unsigned requests (default: true)
 * - DSMIRROR_DEST: local mirror directory (default: current directory)
 * - DSMIRROR_CONCURRENCY: parallel fetches (default: min(8, CPUs))
 * - DSMIRROR_EXTRACT_CONCURRENCY: parallel extractions (default: 2)
 * - DSMIRROR_MAX_RETRIES: retries per object (default: 3)
 * - DSMIRROR_RETRY_BASE_DELAY_MS / DSMIRROR_RETRY_MAX_DELAY_MS: backoff bounds
 * - DSMIRROR_FETCH_TIMEOUT_MS: timeout per fetch attempt (default: 600000)
 * - DSMIRROR_STATE_FILE: sync state file (default: <dest>/.dsmirror-state.json)
 * - DSMIRROR_MAX_LIST_PAGES: listing page limit (default: 10000)
 */
export function buildMirrorConfig(overrides?: Partial<MirrorConfig>): MirrorConfig {
  const localRoot = path.resolve(overrides?.localRoot ?? getEnv('DSMIRROR_DEST', '.'));

  return {
    bucket: overrides?.bucket ?? getEnv('DSMIRROR_BUCKET', ''),
    endpoint:
      overrides?.endpoint ??
      getEnv('DSMIRROR_ENDPOINT', getEnv('AWS_ENDPOINT_URL', '')),
    region: overrides?.region ?? getEnv('DSMIRROR_REGION', DEFAULT_MIRROR_CONFIG.region),
    anonymous:
      overrides?.anonymous ??
      getEnvBoolean('DSMIRROR_ANONYMOUS', DEFAULT_MIRROR_CONFIG.anonymous),
    localRoot,
    concurrency:
      overrides?.concurrency ?? getEnvNumber('DSMIRROR_CONCURRENCY', defaultConcurrency()),
    extractConcurrency:
      overrides?.extractConcurrency ??
      getEnvNumber('DSMIRROR_EXTRACT_CONCURRENCY', DEFAULT_MIRROR_CONFIG.extractConcurrency),
    maxRetries:
      overrides?.maxRetries ??
      getEnvNumber('DSMIRROR_MAX_RETRIES', DEFAULT_MIRROR_CONFIG.maxRetries),
    retryBaseDelayMs:
      overrides?.retryBaseDelayMs ??
      getEnvNumber('DSMIRROR_RETRY_BASE_DELAY_MS', DEFAULT_MIRROR_CONFIG.retryBaseDelayMs),
    retryMaxDelayMs:
      overrides?.retryMaxDelayMs ??
      getEnvNumber('DSMIRROR_RETRY_MAX_DELAY_MS', DEFAULT_MIRROR_CONFIG.retryMaxDelayMs),
    fetchTimeoutMs:
      overrides?.fetchTimeoutMs ??
      getEnvNumber('DSMIRROR_FETCH_TIMEOUT_MS', DEFAULT_MIRROR_CONFIG.fetchTimeoutMs),
    extract: overrides?.extract ?? DEFAULT_MIRROR_CONFIG.extract,
    keepArchives: overrides?.keepArchives ?? DEFAULT_MIRROR_CONFIG.keepArchives,
    stateFilePath:
      overrides?.stateFilePath ??
      getEnv('DSMIRROR_STATE_FILE', path.join(localRoot, STATE_FILE_NAME)),
    maxListPages:
      overrides?.maxListPages ??
      getEnvNumber('DSMIRROR_MAX_LIST_PAGES', DEFAULT_MIRROR_CONFIG.maxListPages),
  };
}

/**
 * Validate a mirror configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateMirrorConfig(config: MirrorConfig): string[] {
  const errors: string[] = [];

  if (!config.bucket) {
    errors.push('bucket is required');
  }

  if (!config.region) {
    errors.push('region is required');
  }

  if (config.endpoint && !/^https?:\/\//.test(config.endpoint)) {
    errors.push('endpoint must be an http(s) URL');
  }

  if (!config.localRoot) {
    errors.push('localRoot is required');
  }

  if (config.concurrency < 1) {
    errors.push('concurrency must be at least 1');
  }

  if (config.concurrency > 64) {
    errors.push('concurrency must not exceed 64');
  }

  if (config.extractConcurrency < 1) {
    errors.push('extractConcurrency must be at least 1');
  }

  if (config.extractConcurrency > 32) {
    errors.push('extractConcurrency must not exceed 32');
  }

  if (config.maxRetries < 0) {
    errors.push('maxRetries must not be negative');
  }

  if (config.maxRetries > 20) {
    errors.push('maxRetries must not exceed 20');
  }

  if (config.retryBaseDelayMs < 0) {
    errors.push('retryBaseDelayMs must not be negative');
  }

  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    errors.push('retryMaxDelayMs must be at least retryBaseDelayMs');
  }

  if (config.fetchTimeoutMs < 1000) {
    errors.push('fetchTimeoutMs must be at least 1000 (1 second)');
  }

  if (!config.stateFilePath) {
    errors.push('stateFilePath is required');
  }

  if (config.maxListPages < 1) {
    errors.push('maxListPages must be at least 1');
  }

  return errors;
}
