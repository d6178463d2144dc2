/**
 * Manifest builder.
 *
 * Turns a flat object listing into a manifest tree: each record's path is
 * split on `/`, intermediate directories are created once and reused, and
 * the terminal segment becomes a leaf. Directory sizes are computed in a
 * single bottom-up pass after every leaf is inserted.
 */

import { DuplicateLeafError, MalformedManifestError, MalformedPathError } from '../errors.js';
import { Manifest, joinRemotePath, relativeTo, walk } from './manifest.js';
import type {
  DirectoryNode,
  LeafKind,
  ListingRecord,
  ManifestNode,
  ManifestOptions,
} from './types.js';

interface DraftDirectory {
  kind: 'directory';
  name: string;
  remotePath: string;
  children: Map<string, DraftNode>;
}

interface DraftLeaf {
  kind: LeafKind;
  name: string;
  remotePath: string;
  sizeBytes: number;
}

type DraftNode = DraftDirectory | DraftLeaf;

/**
 * Split a `/`-separated path into segments, rejecting empty, `.` and `..`
 * segments.
 */
export function splitPath(path: string): string[] {
  if (path === '') {
    throw new MalformedPathError(path, 'path is empty');
  }

  const segments = path.split('/');
  for (const segment of segments) {
    if (segment === '') {
      throw new MalformedPathError(path, 'empty path segment');
    }
    if (segment === '.' || segment === '..') {
      throw new MalformedPathError(path, `relative segment "${segment}"`);
    }
  }
  return segments;
}

function normalizeRootPath(rootPath: string | undefined): string {
  const trimmed = (rootPath ?? '').replace(/^\/+/, '').replace(/\/+$/, '');
  if (trimmed === '') {
    return '';
  }
  return splitPath(trimmed).join('/');
}

/**
 * Build a manifest from listing records.
 *
 * @throws MalformedPathError on empty or relative path segments, or when a
 *   path needs an existing leaf to be a directory (or the reverse)
 * @throws DuplicateLeafError when two records for one path disagree on kind or size
 * @throws MalformedManifestError on a negative or fractional size
 */
export function buildManifest(
  records: Iterable<ListingRecord>,
  options: ManifestOptions = {}
): Manifest {
  const rootPath = normalizeRootPath(options.rootPath);
  const root: DraftDirectory = {
    kind: 'directory',
    name: rootPath === '' ? '' : rootPath.slice(rootPath.lastIndexOf('/') + 1),
    remotePath: rootPath,
    children: new Map(),
  };

  for (const record of records) {
    insertRecord(root, record);
  }

  return new Manifest(freezeDirectory(root), options.label);
}

function insertRecord(root: DraftDirectory, record: ListingRecord): void {
  const segments = splitPath(record.path);

  if (!Number.isSafeInteger(record.sizeBytes) || record.sizeBytes < 0) {
    throw new MalformedManifestError(
      `Invalid size for "${record.path}": ${String(record.sizeBytes)}`
    );
  }

  let parent = root;
  for (const segment of segments.slice(0, -1)) {
    const existing = parent.children.get(segment);
    if (existing === undefined) {
      const created: DraftDirectory = {
        kind: 'directory',
        name: segment,
        remotePath: joinRemotePath(parent.remotePath, segment),
        children: new Map(),
      };
      parent.children.set(segment, created);
      parent = created;
    } else if (existing.kind === 'directory') {
      parent = existing;
    } else {
      throw new MalformedPathError(record.path, `"${existing.remotePath}" is an object, not a directory`);
    }
  }

  const name = segments[segments.length - 1] ?? '';
  const kind: LeafKind = record.isArchive ? 'archive' : 'file';
  const remotePath = joinRemotePath(parent.remotePath, name);
  const existing = parent.children.get(name);

  if (existing === undefined) {
    parent.children.set(name, { kind, name, remotePath, sizeBytes: record.sizeBytes });
    return;
  }

  if (existing.kind === 'directory') {
    throw new MalformedPathError(record.path, `"${remotePath}" is already a directory`);
  }

  if (existing.kind !== kind) {
    throw new DuplicateLeafError(remotePath, `kind ${existing.kind} vs ${kind}`);
  }

  if (existing.sizeBytes !== record.sizeBytes) {
    throw new DuplicateLeafError(
      remotePath,
      `size ${existing.sizeBytes} vs ${record.sizeBytes}`
    );
  }
}

/** Bottom-up pass: compute directory sizes and produce read-only nodes. */
function freezeDirectory(draft: DraftDirectory): DirectoryNode {
  const children = Array.from(draft.children.values(), freezeNode);
  return {
    kind: 'directory',
    name: draft.name,
    remotePath: draft.remotePath,
    sizeBytes: children.reduce((sum, child) => sum + child.sizeBytes, 0),
    children,
  };
}

function freezeNode(draft: DraftNode): ManifestNode {
  if (draft.kind === 'directory') {
    return freezeDirectory(draft);
  }
  return {
    kind: draft.kind,
    name: draft.name,
    remotePath: draft.remotePath,
    sizeBytes: draft.sizeBytes,
  };
}

/**
 * Flatten a manifest back into listing records, in insertion order.
 */
export function manifestToRecords(manifest: Manifest): ListingRecord[] {
  return manifest.leaves().map((leaf) => ({
    path: relativeTo(manifest.rootPath, leaf.remotePath),
    sizeBytes: leaf.sizeBytes,
    isArchive: leaf.kind === 'archive',
  }));
}

/**
 * Merge two manifests rooted at the same path.
 *
 * Leaves present in both must agree on kind and size.
 */
export function mergeManifests(
  first: Manifest,
  second: Manifest,
  options: ManifestOptions = {}
): Manifest {
  if (first.rootPath !== second.rootPath) {
    throw new MalformedManifestError(
      `Cannot merge manifests rooted at "${first.rootPath}" and "${second.rootPath}"`
    );
  }

  return buildManifest([...manifestToRecords(first), ...manifestToRecords(second)], {
    label: options.label ?? first.label,
    rootPath: first.rootPath,
  });
}

/**
 * Structural equality of two manifests, including child order.
 */
export function manifestsEqual(a: Manifest, b: Manifest): boolean {
  if (a.label !== b.label) {
    return false;
  }

  const left = Array.from(walk(a.root));
  const right = Array.from(walk(b.root));
  if (left.length !== right.length) {
    return false;
  }

  return left.every((node, i) => {
    const other = right[i];
    return (
      other !== undefined &&
      node.kind === other.kind &&
      node.name === other.name &&
      node.remotePath === other.remotePath &&
      node.sizeBytes === other.sizeBytes
    );
  });
}
