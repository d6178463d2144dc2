export { formatBytes, parseBytes } from './format-size.js';
export {
  shardBySize,
  shardByBoundary,
  shardByCount,
  singleShard,
  DEFAULT_SHARD_SIZE_BYTES,
} from './shard-policy.js';
export {
  renderFull,
  renderSummary,
  renderManifest,
  formatNode,
  NODE_ICONS,
} from './tree-renderer.js';

export type { ShardItem, ShardPolicy } from './shard-policy.js';
export type { SummaryOptions, RenderOptions } from './tree-renderer.js';
