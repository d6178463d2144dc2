/**
 * Text views of a manifest.
 *
 * Both views print children in stored insertion order, never re-sorted.
 */

import { InvalidDepthError } from '../errors.js';
import type { Manifest } from '../manifest/manifest.js';
import type { DirectoryNode, ManifestNode, NodeKind } from '../manifest/types.js';
import { formatBytes } from './format-size.js';
import { DEFAULT_SHARD_SIZE_BYTES, shardBySize } from './shard-policy.js';
import type { ShardPolicy } from './shard-policy.js';

export const NODE_ICONS: Record<NodeKind, string> = {
  directory: '📁',
  archive: '💾',
  file: '📄',
};

const SHARD_ICON = '💾';

const BRANCH = '├── ';
const LAST_BRANCH = '└── ';
const PIPE = '│   ';
const SPACE = '    ';

export interface SummaryOptions {
  /** Directory levels below the root expanded node by node (default: 1) */
  depth?: number;

  /** Grouping of a collapsed directory's entries into shards */
  shardPolicy?: ShardPolicy;
}

export interface RenderOptions extends SummaryOptions {
  /** Print every node instead of the summarized view */
  full?: boolean;
}

export function formatNode(node: ManifestNode): string {
  return `${NODE_ICONS[node.kind]} ${node.name} (${formatBytes(node.sizeBytes)})`;
}

function rootLine(manifest: Manifest): string {
  const name = manifest.label ?? (manifest.root.name || '.');
  return `${NODE_ICONS.directory} ${name} (${formatBytes(manifest.sizeBytes)})`;
}

/**
 * Every node on its own line: directories with their cumulative size,
 * leaves with their own size.
 */
export function renderFull(manifest: Manifest): string[] {
  const lines = [rootLine(manifest)];

  const visit = (directory: DirectoryNode, prefix: string): void => {
    directory.children.forEach((child, i) => {
      const last = i === directory.children.length - 1;
      lines.push(prefix + (last ? LAST_BRANCH : BRANCH) + formatNode(child));
      if (child.kind === 'directory') {
        visit(child, prefix + (last ? SPACE : PIPE));
      }
    });
  };

  visit(manifest.root, '');
  return lines;
}

/**
 * Summarized view: directories down to `depth` are expanded; the entries
 * of a directory at exactly `depth` are grouped by the shard policy into
 * `ZIP #k/n` lines listing their names and combined size.
 *
 * @throws InvalidDepthError if depth is negative or not an integer
 */
export function renderSummary(manifest: Manifest, options: SummaryOptions = {}): string[] {
  const depth = options.depth ?? 1;
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidDepthError(depth);
  }
  const policy = options.shardPolicy ?? shardBySize(DEFAULT_SHARD_SIZE_BYTES);
  const lines = [rootLine(manifest)];

  const shard = (directory: DirectoryNode, prefix: string): void => {
    const shards = policy(
      directory.children.map((child) => ({ name: child.name, sizeBytes: child.sizeBytes }))
    );
    shards.forEach((items, i) => {
      const last = i === shards.length - 1;
      const size = items.reduce((sum, item) => sum + item.sizeBytes, 0);
      const names = items.map((item) => item.name).join(', ');
      lines.push(
        `${prefix}${last ? LAST_BRANCH : BRANCH}${SHARD_ICON} ZIP #${i + 1}/${shards.length} (${formatBytes(size)}): ${names}`
      );
    });
  };

  const visit = (directory: DirectoryNode, level: number, prefix: string): void => {
    if (level === depth) {
      shard(directory, prefix);
      return;
    }

    directory.children.forEach((child, i) => {
      const last = i === directory.children.length - 1;
      lines.push(prefix + (last ? LAST_BRANCH : BRANCH) + formatNode(child));
      if (child.kind === 'directory') {
        visit(child, level + 1, prefix + (last ? SPACE : PIPE));
      }
    });
  };

  visit(manifest.root, 0, '');
  return lines;
}

export function renderManifest(manifest: Manifest, options: RenderOptions = {}): string[] {
  return options.full ? renderFull(manifest) : renderSummary(manifest, options);
}
