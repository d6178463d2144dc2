/**
 * Types for the manifest node model.
 *
 * A manifest is a tree mirroring a remote object-store namespace:
 * directories aggregate the sizes of their descendants, leaves are
 * single downloadable objects (archives or plain files).
 */

export type LeafKind = 'archive' | 'file';

export type NodeKind = 'directory' | LeafKind;

interface BaseNode {
  /** Entry name, unique among siblings */
  readonly name: string;

  /** Full key in the object store; unique across the tree */
  readonly remotePath: string;

  /** Object size for leaves, sum of children for directories */
  readonly sizeBytes: number;
}

export interface DirectoryNode extends BaseNode {
  readonly kind: 'directory';

  /** Children in insertion order */
  readonly children: readonly ManifestNode[];
}

export interface ArchiveNode extends BaseNode {
  readonly kind: 'archive';
}

export interface FileNode extends BaseNode {
  readonly kind: 'file';
}

export type LeafNode = ArchiveNode | FileNode;

export type ManifestNode = DirectoryNode | LeafNode;

/** One object in a flat listing, as returned by the object store */
export interface ListingRecord {
  /** `/`-separated path relative to the namespace root */
  path: string;

  /** Object size in bytes */
  sizeBytes: number;

  /** Whether the object is an archive to be extracted after download */
  isArchive: boolean;
}

export interface ManifestOptions {
  /** Human-readable dataset name, e.g. "visionsim50/frames" */
  label?: string;

  /** Remote path of the root node (the listed prefix, without trailing `/`) */
  rootPath?: string;
}

/** Persisted leaf record in the manifest JSON document */
export interface ManifestLeafRecord {
  size: number;
  kind: LeafKind;
}

/** Persisted directory in the manifest JSON document */
export interface ManifestDirectoryRecord {
  [name: string]: ManifestDirectoryRecord | ManifestLeafRecord;
}

export function isDirectory(node: ManifestNode): node is DirectoryNode {
  return node.kind === 'directory';
}

export function isLeaf(node: ManifestNode): node is LeafNode {
  return node.kind !== 'directory';
}
