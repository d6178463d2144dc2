import type { DirectoryNode, LeafNode, ManifestNode } from './types.js';

/**
 * An immutable manifest tree with an index by remote path.
 *
 * Built once by the manifest builder and then only read by the
 * renderer and the sync engine.
 */
export class Manifest {
  readonly root: DirectoryNode;
  readonly label: string | undefined;
  private readonly index: Map<string, ManifestNode>;

  constructor(root: DirectoryNode, label?: string) {
    this.root = root;
    this.label = label;
    this.index = new Map();
    for (const node of walk(root)) {
      this.index.set(node.remotePath, node);
    }
  }

  /** Total size of every leaf in the manifest */
  get sizeBytes(): number {
    return this.root.sizeBytes;
  }

  /** Number of leaves in the manifest */
  get leafCount(): number {
    return this.leaves().length;
  }

  /** Remote path of the root node ('' for the bucket root) */
  get rootPath(): string {
    return this.root.remotePath;
  }

  find(remotePath: string): ManifestNode | undefined {
    return this.index.get(remotePath);
  }

  /** Leaves in depth-first insertion order */
  leaves(): LeafNode[] {
    const result: LeafNode[] = [];
    for (const node of walk(this.root)) {
      if (node.kind !== 'directory') {
        result.push(node);
      }
    }
    return result;
  }

  /**
   * Path of a node relative to the root, e.g. "a/x.zip".
   * The root itself maps to ''.
   */
  relativePath(node: ManifestNode): string {
    return relativeTo(this.root.remotePath, node.remotePath);
  }
}

/**
 * Depth-first pre-order traversal, children in stored order.
 */
export function* walk(node: ManifestNode): Generator<ManifestNode> {
  yield node;
  if (node.kind === 'directory') {
    for (const child of node.children) {
      yield* walk(child);
    }
  }
}

export function joinRemotePath(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

export function relativeTo(rootPath: string, remotePath: string): string {
  if (rootPath === '') {
    return remotePath;
  }
  if (remotePath === rootPath) {
    return '';
  }
  return remotePath.slice(rootPath.length + 1);
}
