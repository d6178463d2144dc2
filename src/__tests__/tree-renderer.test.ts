import { describe, it, expect } from 'vitest';
import { buildManifest } from '../manifest/builder.js';
import { parseManifestJson } from '../manifest/json.js';
import { renderFull, renderManifest, renderSummary } from '../render/tree-renderer.js';
import { shardByCount } from '../render/shard-policy.js';
import { InvalidDepthError } from '../errors.js';

const SCENARIO = JSON.stringify({
  a: { 'x.zip': { size: 100, kind: 'archive' } },
  'b.zip': { size: 50, kind: 'archive' },
});

describe('renderFull', () => {
  it('should print every node with its size', () => {
    const manifest = parseManifestJson(SCENARIO, { label: 'demo' });

    expect(renderFull(manifest)).toEqual([
      '📁 demo (150.0B)',
      '├── 📁 a (100.0B)',
      '│   └── 💾 x.zip (100.0B)',
      '└── 💾 b.zip (50.0B)',
    ]);
  });

  it('should fall back to the root name, then to "."', () => {
    expect(renderFull(parseManifestJson(SCENARIO))[0]).toBe('📁 . (150.0B)');
    expect(renderFull(parseManifestJson(SCENARIO, { rootPath: 'data/kitti' }))[0]).toBe(
      '📁 kitti (150.0B)'
    );
  });

  it('should print one line per leaf record', () => {
    const records = [
      { path: 'README.md', sizeBytes: 10, isArchive: false },
      { path: 'raw/seq_0/part_0.zip', sizeBytes: 2048, isArchive: true },
      { path: 'raw/seq_0/part_1.zip', sizeBytes: 2048, isArchive: true },
      { path: 'raw/seq_1/part_0.zip', sizeBytes: 4096, isArchive: true },
      { path: 'calib/cam_0.txt', sizeBytes: 1, isArchive: false },
      { path: 'calib/cam_1.txt', sizeBytes: 1, isArchive: false },
      { path: 'labels.tar.gz', sizeBytes: 500, isArchive: true },
    ];

    const lines = renderFull(buildManifest(records));
    const leafLines = lines.filter((line) => line.includes('💾') || line.includes('📄'));

    expect(leafLines).toHaveLength(records.length);
    expect(lines).toContain('│   ├── 📁 seq_0 (4.0K)');
  });
});

describe('renderSummary', () => {
  it('should shard the entries of directories at the collapse depth', () => {
    const manifest = parseManifestJson(SCENARIO, { label: 'demo' });

    expect(renderSummary(manifest)).toEqual([
      '📁 demo (150.0B)',
      '├── 📁 a (100.0B)',
      '│   └── 💾 ZIP #1/1 (100.0B): x.zip',
      '└── 💾 b.zip (50.0B)',
    ]);
  });

  it('should shard the root at depth 0', () => {
    const manifest = parseManifestJson(SCENARIO, { label: 'demo' });

    expect(renderSummary(manifest, { depth: 0 })).toEqual([
      '📁 demo (150.0B)',
      '└── 💾 ZIP #1/1 (150.0B): a, b.zip',
    ]);
  });

  it('should use the shard policy it is given', () => {
    const manifest = parseManifestJson(SCENARIO, { label: 'demo' });

    expect(renderSummary(manifest, { depth: 0, shardPolicy: shardByCount(1) })).toEqual([
      '📁 demo (150.0B)',
      '├── 💾 ZIP #1/2 (100.0B): a',
      '└── 💾 ZIP #2/2 (50.0B): b.zip',
    ]);
  });

  it('should expand directories above the collapse depth', () => {
    const manifest = parseManifestJson(SCENARIO, { label: 'demo' });
    expect(renderSummary(manifest, { depth: 2 })).toEqual(renderFull(manifest));
  });

  it('should reject a negative or fractional depth', () => {
    const manifest = parseManifestJson(SCENARIO);

    expect(() => renderSummary(manifest, { depth: -1 })).toThrow(InvalidDepthError);
    expect(() => renderSummary(manifest, { depth: 1.5 })).toThrow(
      'Collapse depth must be a non-negative integer, got 1.5'
    );
  });
});

describe('renderManifest', () => {
  it('should choose the view from the full flag', () => {
    const manifest = parseManifestJson(SCENARIO);

    expect(renderManifest(manifest, { full: true })).toEqual(renderFull(manifest));
    expect(renderManifest(manifest)).toEqual(renderSummary(manifest));
  });
});
