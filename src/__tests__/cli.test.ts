import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Command, InvalidArgumentError } from 'commander';
import { collect, parseInteger } from '../cli/options.js';
import {
  buildShardPolicy,
  registerShowTreeCommand,
  renderManifestText,
} from '../cli/commands/show-tree.js';
import { registerSyncCommand, runSync } from '../cli/commands/sync.js';
import { registerCatalogCommand, runCatalog } from '../cli/commands/catalog.js';
import { ConfigError } from '../errors.js';
import { serializeManifest } from '../manifest/json.js';
import { MemoryObjectStore } from './memory-object-store.js';
import type { Logger } from 'pino';

function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

const SCENARIO = JSON.stringify({
  a: { 'x.zip': { size: 100, kind: 'archive' } },
  'b.zip': { size: 50, kind: 'archive' },
});

describe('option parsers', () => {
  it('should parse integers and reject anything else', () => {
    expect(parseInteger('8')).toBe(8);
    expect(parseInteger('0')).toBe(0);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('')).toThrow('Not an integer.');
    expect(() => parseInteger('many')).toThrow('Not an integer.');
  });

  it('should collect repeated values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('show-tree', () => {
  it('should render the full tree', () => {
    expect(renderManifestText(SCENARIO, { label: 'demo', full: true })).toEqual([
      '📁 demo (150.0B)',
      '├── 📁 a (100.0B)',
      '│   └── 💾 x.zip (100.0B)',
      '└── 💾 b.zip (50.0B)',
    ]);
  });

  it('should render the summarized tree by default', () => {
    expect(renderManifestText(SCENARIO, { label: 'demo' })).toEqual([
      '📁 demo (150.0B)',
      '├── 📁 a (100.0B)',
      '│   └── 💾 ZIP #1/1 (100.0B): x.zip',
      '└── 💾 b.zip (50.0B)',
    ]);
  });

  it('should shard by entry count', () => {
    expect(renderManifestText(SCENARIO, { label: 'demo', depth: 0, shardCount: 1 })).toEqual([
      '📁 demo (150.0B)',
      '├── 💾 ZIP #1/2 (100.0B): a',
      '└── 💾 ZIP #2/2 (50.0B): b.zip',
    ]);
  });

  it('should shard by a size string', () => {
    expect(renderManifestText(SCENARIO, { label: 'demo', depth: 0, shardSize: '120' })).toEqual([
      '📁 demo (150.0B)',
      '├── 💾 ZIP #1/2 (100.0B): a',
      '└── 💾 ZIP #2/2 (50.0B): b.zip',
    ]);
  });

  it('should render each partition as its own tree', () => {
    expect(renderManifestText(SCENARIO, { partition: ['scans=a/*'] })).toEqual([
      '📁 scans (100.0B)',
      '└── 📁 a (100.0B)',
      '    └── 💾 ZIP #1/1 (100.0B): x.zip',
      '',
      '📁 metadata (50.0B)',
      '└── 💾 b.zip (50.0B)',
    ]);
  });

  it('should refuse both shard options at once', () => {
    expect(() => buildShardPolicy({ shardSize: '10G', shardCount: 4 })).toThrow(
      'Use either --shard-size or --shard-count, not both'
    );
  });
});

describe('sync', () => {
  let tmpDir: string;
  let dest: string;
  let stateFile: string;
  let store: MemoryObjectStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dsmirror-cli-test-'));
    dest = path.join(tmpDir, 'mirror');
    stateFile = path.join(tmpDir, 'state.json');
    store = new MemoryObjectStore()
      .put('ds/a/x.zip', Buffer.alloc(100, 'x'))
      .put('ds/b.zip', Buffer.alloc(50, 'b'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should list the prefix and sync the selection', async () => {
    const report = await runSync(
      'ds',
      dest,
      { bucket: 'test-bucket', stateFile, select: 'a', extract: false, concurrency: 2 },
      { store, logger: createMockLogger() }
    );

    expect(report.selected).toBe(1);
    expect(report.fetched).toBe(1);
    expect(report.success).toBe(true);
    expect(store.requests).toEqual(['ds/a/x.zip']);
    expect(fs.statSync(path.join(dest, 'a', 'x.zip')).size).toBe(100);
  });

  it('should read the manifest from a file when given', async () => {
    const manifestPath = path.join(tmpDir, 'manifest.json');
    fs.writeFileSync(manifestPath, SCENARIO);

    const report = await runSync(
      'ds',
      dest,
      {
        bucket: 'test-bucket',
        stateFile,
        manifest: manifestPath,
        glob: '*.zip',
        extract: false,
        concurrency: 1,
      },
      { store, logger: createMockLogger() }
    );

    expect(report.fetched).toBe(2);
    expect(store.requests).toEqual(['ds/a/x.zip', 'ds/b.zip']);
  });

  it('should reject an invalid configuration before listing', async () => {
    await expect(
      runSync(
        'ds',
        dest,
        { bucket: 'test-bucket', stateFile, concurrency: 0 },
        { store, logger: createMockLogger() }
      )
    ).rejects.toThrow(ConfigError);
    await expect(
      runSync(
        'ds',
        dest,
        { bucket: 'test-bucket', stateFile, concurrency: 0 },
        { store, logger: createMockLogger() }
      )
    ).rejects.toThrow('Invalid configuration: concurrency must be at least 1');
    expect(store.requests).toEqual([]);
  });
});

describe('catalog', () => {
  it('should build the manifest of a prefix', async () => {
    const store = new MemoryObjectStore()
      .put('ds/a/x.zip', Buffer.alloc(100))
      .put('ds/b.zip', Buffer.alloc(50))
      .put('other/c.zip', Buffer.alloc(10));

    const manifest = await runCatalog('ds', {}, { store, logger: createMockLogger() });

    expect(manifest.rootPath).toBe('ds');
    expect(manifest.leafCount).toBe(2);
    expect(serializeManifest(manifest)).toBe(`${JSON.stringify(JSON.parse(SCENARIO), null, 2)}\n`);
  });
});

describe('command registration', () => {
  it('should register every command', () => {
    const program = new Command();
    registerShowTreeCommand(program);
    registerSyncCommand(program);
    registerCatalogCommand(program);

    expect(program.commands.map((command) => command.name())).toEqual([
      'show-tree',
      'sync',
      'catalog',
    ]);
  });
});
