import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SyncStateManager } from '../sync/sync-state.js';

describe('SyncStateManager', () => {
  let tmpDir: string;
  let stateFilePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dsmirror-state-test-'));
    stateFilePath = path.join(tmpDir, '.dsmirror-state.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should start empty when no file exists', () => {
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.load();

    expect(manager.size).toBe(0);
    expect(manager.isExtracted('ds/a/x.zip', 100)).toBe(false);
  });

  it('should persist extracted archives across instances', () => {
    const first = new SyncStateManager(stateFilePath, 'ds');
    first.markExtracted('ds/a/x.zip', 100);
    first.save();

    const second = new SyncStateManager(stateFilePath, 'ds');
    second.load();

    expect(second.size).toBe(1);
    expect(second.isExtracted('ds/a/x.zip', 100)).toBe(true);
    expect(second.getEntry('ds/a/x.zip')?.sizeBytes).toBe(100);
  });

  it('should treat a size change as not extracted', () => {
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.markExtracted('ds/a/x.zip', 100);

    expect(manager.isExtracted('ds/a/x.zip', 101)).toBe(false);
  });

  it('should not write the file when nothing changed', () => {
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.save();

    expect(fs.existsSync(stateFilePath)).toBe(false);
  });

  it('should not leave the temp file behind', () => {
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.markExtracted('ds/b.zip', 50);
    manager.save();

    expect(fs.readdirSync(tmpDir)).toEqual(['.dsmirror-state.json']);
  });

  it('should create missing parent directories', () => {
    const nested = path.join(tmpDir, 'deep', 'state.json');
    const manager = new SyncStateManager(nested, 'ds');
    manager.markExtracted('ds/b.zip', 50);
    manager.save();

    expect(fs.existsSync(nested)).toBe(true);
  });

  it('should start fresh from a corrupt file', () => {
    fs.writeFileSync(stateFilePath, '{not json');
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.load();

    expect(manager.size).toBe(0);
  });

  it('should ignore state written for another root', () => {
    const other = new SyncStateManager(stateFilePath, 'other');
    other.markExtracted('other/x.zip', 1);
    other.save();

    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.load();

    expect(manager.size).toBe(0);
  });

  it('should drop malformed entries', () => {
    fs.writeFileSync(
      stateFilePath,
      JSON.stringify({
        version: 1,
        rootPath: 'ds',
        extracted: {
          'ds/good.zip': { remotePath: 'ds/good.zip', sizeBytes: 10, extractedAt: 1700000000000 },
          'ds/bad.zip': { remotePath: 'ds/bad.zip', sizeBytes: 'ten' },
        },
      })
    );

    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.load();

    expect(manager.getAllEntries().map((entry) => entry.remotePath)).toEqual(['ds/good.zip']);
  });

  it('should remove and clear entries', () => {
    const manager = new SyncStateManager(stateFilePath, 'ds');
    manager.markExtracted('ds/a.zip', 1);
    manager.markExtracted('ds/b.zip', 2);

    manager.removeEntry('ds/a.zip');
    expect(manager.size).toBe(1);

    manager.clear();
    expect(manager.size).toBe(0);
  });
});
