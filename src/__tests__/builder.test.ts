import { describe, it, expect } from 'vitest';
import {
  buildManifest,
  manifestToRecords,
  manifestsEqual,
  mergeManifests,
  splitPath,
} from '../manifest/builder.js';
import { walk } from '../manifest/manifest.js';
import type { ListingRecord } from '../manifest/types.js';
import { DuplicateLeafError, MalformedManifestError, MalformedPathError } from '../errors.js';

const SCENARIO: ListingRecord[] = [
  { path: 'a/x.zip', sizeBytes: 100, isArchive: true },
  { path: 'b.zip', sizeBytes: 50, isArchive: true },
];

describe('buildManifest', () => {
  it('should aggregate sizes from leaves to the root', () => {
    const manifest = buildManifest(SCENARIO);

    expect(manifest.sizeBytes).toBe(150);
    expect(manifest.find('a')?.sizeBytes).toBe(100);
    expect(manifest.find('a/x.zip')?.kind).toBe('archive');
    expect(manifest.find('b.zip')?.sizeBytes).toBe(50);
    expect(manifest.leafCount).toBe(2);
  });

  it('should keep children in insertion order', () => {
    const manifest = buildManifest([
      { path: 'z.txt', sizeBytes: 1, isArchive: false },
      { path: 'm/1.zip', sizeBytes: 2, isArchive: true },
      { path: 'a.txt', sizeBytes: 3, isArchive: false },
      { path: 'm/0.zip', sizeBytes: 4, isArchive: true },
    ]);

    expect(manifest.root.children.map((child) => child.name)).toEqual(['z.txt', 'm', 'a.txt']);
    expect(manifest.leaves().map((leaf) => leaf.remotePath)).toEqual([
      'z.txt',
      'm/1.zip',
      'm/0.zip',
      'a.txt',
    ]);
  });

  it('should prefix remote paths with the root path', () => {
    const manifest = buildManifest(SCENARIO, { rootPath: 'datasets/kitti/', label: 'kitti' });

    expect(manifest.rootPath).toBe('datasets/kitti');
    expect(manifest.root.name).toBe('kitti');
    expect(manifest.label).toBe('kitti');

    const leaf = manifest.find('datasets/kitti/a/x.zip');
    expect(leaf?.kind).toBe('archive');
    expect(leaf && manifest.relativePath(leaf)).toBe('a/x.zip');
  });

  it('should use an empty root name for the bucket root', () => {
    const manifest = buildManifest(SCENARIO);
    expect(manifest.root.name).toBe('');
    expect(manifest.rootPath).toBe('');
  });

  it('should accept an identical duplicate record', () => {
    const manifest = buildManifest([...SCENARIO, { path: 'a/x.zip', sizeBytes: 100, isArchive: true }]);

    expect(manifest.leafCount).toBe(2);
    expect(manifest.sizeBytes).toBe(150);
  });

  it('should reject a duplicate with a different size', () => {
    const build = () =>
      buildManifest([...SCENARIO, { path: 'a/x.zip', sizeBytes: 200, isArchive: true }]);

    expect(build).toThrow(DuplicateLeafError);
    expect(build).toThrow('Conflicting records for "a/x.zip": size 100 vs 200');
  });

  it('should reject a duplicate with a different kind', () => {
    const build = () =>
      buildManifest([...SCENARIO, { path: 'b.zip', sizeBytes: 50, isArchive: false }]);

    expect(build).toThrow('Conflicting records for "b.zip": kind archive vs file');
  });

  it('should report duplicates as malformed manifests', () => {
    try {
      buildManifest([...SCENARIO, { path: 'b.zip', sizeBytes: 1, isArchive: true }]);
      expect.fail('expected an error');
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedManifestError);
      expect(err).toHaveProperty('code', 'DUPLICATE_LEAF');
    }
  });

  it.each(['', 'a//b.zip', '/a.zip', 'a/', 'a/../b.zip', './a.zip'])(
    'should reject the malformed path "%s"',
    (path) => {
      expect(() => buildManifest([{ path, sizeBytes: 1, isArchive: false }])).toThrow(
        MalformedPathError
      );
    }
  );

  it('should reject a path that runs through an existing leaf', () => {
    const build = () =>
      buildManifest([
        { path: 'a', sizeBytes: 1, isArchive: false },
        { path: 'a/b', sizeBytes: 1, isArchive: false },
      ]);

    expect(build).toThrow('Malformed path "a/b": "a" is an object, not a directory');
  });

  it('should reject a leaf at an existing directory path', () => {
    const build = () =>
      buildManifest([
        { path: 'a/b', sizeBytes: 1, isArchive: false },
        { path: 'a', sizeBytes: 1, isArchive: false },
      ]);

    expect(build).toThrow('Malformed path "a": "a" is already a directory');
  });

  it('should reject negative and fractional sizes', () => {
    expect(() => buildManifest([{ path: 'x', sizeBytes: -1, isArchive: false }])).toThrow(
      'Invalid size for "x": -1'
    );
    expect(() => buildManifest([{ path: 'x', sizeBytes: 1.5, isArchive: false }])).toThrow(
      'Invalid size for "x": 1.5'
    );
  });

  it('should keep every directory size equal to the sum of its children', () => {
    const records: ListingRecord[] = [];
    for (let i = 0; i < 60; i++) {
      const depth = i % 4;
      const dirs = Array.from({ length: depth }, (_, d) => `d${(i + d) % 3}`);
      records.push({
        path: [...dirs, `leaf_${i}.zip`].join('/'),
        sizeBytes: (i * 7919) % 1000,
        isArchive: true,
      });
    }

    const manifest = buildManifest(records);

    for (const node of walk(manifest.root)) {
      if (node.kind === 'directory') {
        const sum = node.children.reduce((total, child) => total + child.sizeBytes, 0);
        expect(node.sizeBytes).toBe(sum);
      }
    }
    expect(manifest.leafCount).toBe(60);
  });

  it('should be deterministic for identical input', () => {
    expect(manifestsEqual(buildManifest(SCENARIO), buildManifest(SCENARIO))).toBe(true);
  });

  it('should tell structurally different manifests apart', () => {
    const reordered = [...SCENARIO].reverse();
    expect(manifestsEqual(buildManifest(SCENARIO), buildManifest(reordered))).toBe(false);
  });
});

describe('splitPath', () => {
  it('should split on slashes', () => {
    expect(splitPath('a/b/c.zip')).toEqual(['a', 'b', 'c.zip']);
  });

  it('should name the relative segment', () => {
    expect(() => splitPath('a/..')).toThrow('Malformed path "a/..": relative segment ".."');
  });
});

describe('manifestToRecords', () => {
  it('should flatten a manifest back into its records', () => {
    const manifest = buildManifest(SCENARIO, { rootPath: 'ds' });
    expect(manifestToRecords(manifest)).toEqual(SCENARIO);
  });
});

describe('mergeManifests', () => {
  it('should combine manifests with the same root', () => {
    const first = buildManifest([{ path: 'a/x.zip', sizeBytes: 100, isArchive: true }], {
      rootPath: 'ds',
    });
    const second = buildManifest(
      [
        { path: 'a/y.zip', sizeBytes: 10, isArchive: true },
        { path: 'a/x.zip', sizeBytes: 100, isArchive: true },
      ],
      { rootPath: 'ds' }
    );

    const merged = mergeManifests(first, second);

    expect(merged.sizeBytes).toBe(110);
    expect(merged.leaves().map((leaf) => leaf.remotePath)).toEqual(['ds/a/x.zip', 'ds/a/y.zip']);
  });

  it('should reject conflicting leaves', () => {
    const first = buildManifest([{ path: 'x.zip', sizeBytes: 1, isArchive: true }]);
    const second = buildManifest([{ path: 'x.zip', sizeBytes: 2, isArchive: true }]);

    expect(() => mergeManifests(first, second)).toThrow(DuplicateLeafError);
  });

  it('should reject manifests with different roots', () => {
    const first = buildManifest(SCENARIO, { rootPath: 'one' });
    const second = buildManifest(SCENARIO, { rootPath: 'two' });

    expect(() => mergeManifests(first, second)).toThrow(
      'Cannot merge manifests rooted at "one" and "two"'
    );
  });
});
