import { describe, it, expect } from 'vitest';
import {
  shardByBoundary,
  shardByCount,
  shardBySize,
  singleShard,
} from '../render/shard-policy.js';
import type { ShardItem } from '../render/shard-policy.js';

function items(...sizes: number[]): ShardItem[] {
  return sizes.map((sizeBytes, i) => ({ name: `part_${i}`, sizeBytes }));
}

function names(shards: ShardItem[][]): string[][] {
  return shards.map((shard) => shard.map((item) => item.name));
}

describe('shardBySize', () => {
  it('should fill a shard until the next entry would exceed the threshold', () => {
    expect(names(shardBySize(10)(items(4, 4, 4, 10)))).toEqual([
      ['part_0', 'part_1'],
      ['part_2'],
      ['part_3'],
    ]);
  });

  it('should give an oversized entry a shard of its own', () => {
    expect(names(shardBySize(10)(items(15, 1, 2)))).toEqual([['part_0'], ['part_1', 'part_2']]);
  });

  it('should start a new shard for every entry when each one fills it', () => {
    expect(names(shardBySize(10)(items(6, 6, 6)))).toEqual([['part_0'], ['part_1'], ['part_2']]);
  });

  it('should never reorder entries', () => {
    const input = items(3, 9, 1, 7, 2, 8);
    expect(shardBySize(10)(input).flat()).toEqual(input);
  });

  it('should return no shards for no entries', () => {
    expect(shardBySize(10)([])).toEqual([]);
  });

  it('should reject a non-positive threshold', () => {
    expect(() => shardBySize(0)).toThrow(RangeError);
    expect(() => shardBySize(-1)).toThrow('Shard size must be a positive number, got -1');
    expect(() => shardBySize(Number.NaN)).toThrow(RangeError);
  });
});

describe('shardByBoundary', () => {
  it('should cut whenever the running total crosses a multiple of the threshold', () => {
    expect(names(shardByBoundary(10)(items(6, 6, 6)))).toEqual([['part_0'], ['part_1', 'part_2']]);
  });

  it('should keep entries together while the total stays below the threshold', () => {
    expect(names(shardByBoundary(10)(items(2, 3, 4)))).toEqual([['part_0', 'part_1', 'part_2']]);
  });
});

describe('shardByCount', () => {
  it('should put at most n entries in each shard', () => {
    expect(shardByCount(2)(items(1, 1, 1, 1, 1)).map((shard) => shard.length)).toEqual([2, 2, 1]);
  });

  it('should reject a zero count', () => {
    expect(() => shardByCount(0)).toThrow('Shard count must be a positive number, got 0');
  });
});

describe('singleShard', () => {
  it('should group everything together', () => {
    expect(names(singleShard()(items(1, 2, 3)))).toEqual([['part_0', 'part_1', 'part_2']]);
    expect(singleShard()([])).toEqual([]);
  });
});
