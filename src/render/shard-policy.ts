/**
 * Shard policies for the summarized tree view.
 *
 * Large datasets are physically split into numbered archive parts
 * ("ZIP #k/n"). A policy decides how the entries of a directory are
 * grouped into such parts; it never reorders them.
 */

export interface ShardItem {
  name: string;
  sizeBytes: number;
}

export type ShardPolicy = (items: readonly ShardItem[]) => ShardItem[][];

function requirePositive(value: number, label: string): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new RangeError(`${label} must be a positive number, got ${value}`);
  }
}

/**
 * Fill a shard until adding the next entry would push it past the
 * threshold, then start a new one. An entry larger than the threshold
 * gets a shard of its own.
 */
export function shardBySize(thresholdBytes: number): ShardPolicy {
  requirePositive(thresholdBytes, 'Shard size');

  return (items) => {
    const shards: ShardItem[][] = [];
    let current: ShardItem[] = [];
    let currentSize = 0;

    for (const item of items) {
      if (current.length > 0 && currentSize + item.sizeBytes > thresholdBytes) {
        shards.push(current);
        current = [];
        currentSize = 0;
      }
      current.push(item);
      currentSize += item.sizeBytes;
    }

    if (current.length > 0) {
      shards.push(current);
    }
    return shards;
  };
}

/**
 * Start a new shard whenever the running total crosses a multiple of
 * the threshold. This is the rule the dataset upload tooling used when
 * it cut archives.
 */
export function shardByBoundary(thresholdBytes: number): ShardPolicy {
  requirePositive(thresholdBytes, 'Shard size');

  return (items) => {
    const shards: ShardItem[][] = [];
    let current: ShardItem[] = [];
    let total = 0;

    for (const item of items) {
      const before = Math.floor(total / thresholdBytes);
      total += item.sizeBytes;
      if (current.length > 0 && Math.floor(total / thresholdBytes) !== before) {
        shards.push(current);
        current = [];
      }
      current.push(item);
    }

    if (current.length > 0) {
      shards.push(current);
    }
    return shards;
  };
}

/** At most `count` entries per shard. */
export function shardByCount(count: number): ShardPolicy {
  requirePositive(count, 'Shard count');
  const size = Math.floor(count);

  return (items) => {
    const shards: ShardItem[][] = [];
    for (let i = 0; i < items.length; i += size) {
      shards.push(items.slice(i, i + size));
    }
    return shards;
  };
}

/** Everything in a single shard. */
export function singleShard(): ShardPolicy {
  return (items) => (items.length === 0 ? [] : [items.slice()]);
}

export const DEFAULT_SHARD_SIZE_BYTES = 10 * 1024 ** 3;
