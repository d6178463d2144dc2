/**
 * Split a manifest into disjoint named sub-manifests by glob.
 *
 * A leaf goes to the first pattern (in declaration order) that matches
 * its relative path; leaves matching none go to the default group.
 * Each group is rebuilt through the builder so sizes are recomputed.
 */

import { MalformedManifestError } from '../errors.js';
import { buildManifest } from './builder.js';
import type { Manifest } from './manifest.js';
import { compileGlob } from './selection.js';
import type { ListingRecord } from './types.js';

export interface PartitionPattern {
  name: string;
  glob: string;
}

export interface PartitionOptions {
  /** Name of the group holding unmatched leaves (default: metadata) */
  defaultGroup?: string;
}

/**
 * Parse `name=glob` CLI arguments into partition patterns.
 */
export function parsePartitionArgs(args: readonly string[]): PartitionPattern[] {
  return args.map((arg) => {
    const eq = arg.indexOf('=');
    if (eq <= 0 || eq === arg.length - 1) {
      throw new MalformedManifestError(`Partition must be written as name=glob, got "${arg}"`);
    }
    return { name: arg.slice(0, eq).trim(), glob: arg.slice(eq + 1).trim() };
  });
}

/**
 * Partition a manifest. Returns non-empty groups in pattern order,
 * the default group last.
 */
export function partitionManifest(
  manifest: Manifest,
  patterns: readonly PartitionPattern[],
  options: PartitionOptions = {}
): Map<string, Manifest> {
  const defaultGroup = options.defaultGroup ?? 'metadata';

  const seenGlobs = new Set<string>();
  const seenNames = new Set<string>([defaultGroup]);
  for (const pattern of patterns) {
    if (seenGlobs.has(pattern.glob)) {
      throw new MalformedManifestError(`Multiple partitions share the pattern "${pattern.glob}"`);
    }
    if (seenNames.has(pattern.name)) {
      throw new MalformedManifestError(`Duplicate partition name "${pattern.name}"`);
    }
    seenGlobs.add(pattern.glob);
    seenNames.add(pattern.name);
  }

  const compiled = patterns.map((pattern) => ({
    name: pattern.name,
    regex: compileGlob(pattern.glob),
  }));

  const groups = new Map<string, ListingRecord[]>();
  for (const pattern of compiled) {
    groups.set(pattern.name, []);
  }
  groups.set(defaultGroup, []);

  for (const leaf of manifest.leaves()) {
    const path = manifest.relativePath(leaf);
    const match = compiled.find((pattern) => pattern.regex.test(path));
    const records = groups.get(match?.name ?? defaultGroup);
    records?.push({ path, sizeBytes: leaf.sizeBytes, isArchive: leaf.kind === 'archive' });
  }

  const result = new Map<string, Manifest>();
  for (const [name, records] of groups) {
    if (records.length > 0) {
      result.set(name, buildManifest(records, { label: name, rootPath: manifest.rootPath }));
    }
  }
  return result;
}
