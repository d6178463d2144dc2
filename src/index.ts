/**
 * dsmirror - manifest trees, rendering and resumable mirroring of
 * object-storage datasets.
 */

export * from './manifest/index.js';
export * from './render/index.js';
export * from './store/index.js';
export * from './sync/index.js';
export * from './extract/index.js';
export * from './mirror/index.js';
export * from './errors.js';
export { buildMirrorConfig, validateMirrorConfig, defaultConcurrency, DEFAULT_MIRROR_CONFIG, STATE_FILE_NAME } from './config.js';
export type { MirrorConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
