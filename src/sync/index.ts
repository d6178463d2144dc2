export { SyncEngine, localPathFor, partialPathFor, PARTIAL_SUFFIX } from './sync-engine.js';
export { SyncStateManager } from './sync-state.js';

export type { TypedSyncEngineEmitter, SyncRunOptions } from './sync-engine.js';
export type {
  SyncEngineConfig,
  LeafSyncStatus,
  SkipReason,
  LeafSyncResult,
  SyncFailureKind,
  SyncFailure,
  SyncRunResult,
  SyncEngineEvents,
  ExtractedEntry,
  SyncState,
} from './types.js';
