/**
 * Persistent sync state for archives that were extracted and removed.
 *
 * Once an archive is extracted its file is gone from the mirror, so a
 * size check at the target path can no longer tell that it was synced.
 * The state file remembers it. Persisted to disk as JSON, written through
 * a temp file and a rename.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ExtractedEntry, SyncState } from './types.js';

export class SyncStateManager {
  private state: SyncState;
  private readonly filePath: string;
  private dirty = false;

  constructor(filePath: string, rootPath: string) {
    this.filePath = filePath;
    this.state = {
      version: 1,
      rootPath,
      extracted: {},
    };
  }

  /** Number of tracked archives */
  get size(): number {
    return Object.keys(this.state.extracted).length;
  }

  /**
   * Load state from disk. A missing file, a corrupt file or a file written
   * for another root starts from empty state.
   */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch {
      // Corrupt state file; start fresh
      return;
    }

    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'version' in parsed &&
      parsed.version === 1 &&
      'rootPath' in parsed &&
      parsed.rootPath === this.state.rootPath &&
      'extracted' in parsed &&
      parsed.extracted !== null &&
      typeof parsed.extracted === 'object'
    ) {
      const extracted: Record<string, ExtractedEntry> = {};
      for (const [remotePath, entry] of Object.entries(parsed.extracted)) {
        if (isExtractedEntry(entry)) {
          extracted[remotePath] = entry;
        }
      }
      this.state = { ...this.state, extracted };
    }
  }

  /**
   * Save state to disk if anything changed.
   */
  save(): void {
    if (!this.dirty) {
      return;
    }

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(this.state, null, 2), 'utf-8');
    fs.renameSync(tmpPath, this.filePath);
    this.dirty = false;
  }

  getEntry(remotePath: string): ExtractedEntry | undefined {
    return this.state.extracted[remotePath];
  }

  /**
   * Whether an archive of this size was already extracted.
   * A size change means the remote object was replaced.
   */
  isExtracted(remotePath: string, sizeBytes: number): boolean {
    return this.state.extracted[remotePath]?.sizeBytes === sizeBytes;
  }

  /**
   * Record a successful extraction.
   */
  markExtracted(remotePath: string, sizeBytes: number): void {
    this.state.extracted[remotePath] = {
      remotePath,
      sizeBytes,
      extractedAt: Date.now(),
    };
    this.dirty = true;
  }

  removeEntry(remotePath: string): void {
    if (remotePath in this.state.extracted) {
      // eslint-disable-next-line @typescript-eslint/no-dynamic-delete
      delete this.state.extracted[remotePath];
      this.dirty = true;
    }
  }

  getAllEntries(): ExtractedEntry[] {
    return Object.values(this.state.extracted);
  }

  /**
   * Clear all state (for full re-sync).
   */
  clear(): void {
    this.state.extracted = {};
    this.dirty = true;
  }
}

function isExtractedEntry(value: unknown): value is ExtractedEntry {
  return (
    value !== null &&
    typeof value === 'object' &&
    'remotePath' in value &&
    typeof value.remotePath === 'string' &&
    'sizeBytes' in value &&
    typeof value.sizeBytes === 'number' &&
    'extractedAt' in value &&
    typeof value.extractedAt === 'number'
  );
}
