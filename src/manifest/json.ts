/**
 * Manifest JSON interchange format.
 *
 * A document is a nested object of directory names, each mapping to
 * either a nested object (subdirectory) or a leaf record
 * `{ "size": <bytes>, "kind": "archive" | "file" }`.
 */

import { MalformedManifestError, MalformedPathError } from '../errors.js';
import { buildManifest } from './builder.js';
import type { Manifest } from './manifest.js';
import type {
  DirectoryNode,
  ListingRecord,
  ManifestDirectoryRecord,
  ManifestLeafRecord,
  ManifestOptions,
} from './types.js';

const LEAF_KINDS = new Set(['archive', 'file']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** An object is a leaf record when it carries a string `kind` and a numeric `size`. */
function isLeafRecord(value: Record<string, unknown>): boolean {
  return typeof value['kind'] === 'string' && typeof value['size'] === 'number';
}

/**
 * Flatten a parsed manifest document into listing records.
 */
export function recordsFromDocument(document: unknown): ListingRecord[] {
  if (!isPlainObject(document)) {
    throw new MalformedManifestError('Manifest document must be a JSON object');
  }

  const records: ListingRecord[] = [];
  collect(document, [], records);
  return records;
}

function collect(
  directory: Record<string, unknown>,
  parents: string[],
  records: ListingRecord[]
): void {
  for (const [name, value] of Object.entries(directory)) {
    const segments = [...parents, name];
    const path = segments.join('/');

    if (name.includes('/')) {
      throw new MalformedPathError(path, 'a manifest key names one segment and cannot contain "/"');
    }

    if (!isPlainObject(value)) {
      throw new MalformedManifestError(
        `Entry "${path}" must be a directory object or a leaf record`
      );
    }

    if (!isLeafRecord(value)) {
      collect(value, segments, records);
      continue;
    }

    const kind = value['kind'];
    if (typeof kind !== 'string' || !LEAF_KINDS.has(kind)) {
      throw new MalformedManifestError(`Entry "${path}" has unknown kind "${String(kind)}"`);
    }

    const size = value['size'];
    records.push({
      path,
      sizeBytes: typeof size === 'number' ? size : Number.NaN,
      isArchive: kind === 'archive',
    });
  }
}

/**
 * Parse manifest JSON text into a manifest.
 *
 * @throws MalformedManifestError on invalid JSON or an invalid document shape
 */
export function parseManifestJson(text: string, options: ManifestOptions = {}): Manifest {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedManifestError(`Manifest is not valid JSON: ${message}`);
  }

  return buildManifest(recordsFromDocument(document), options);
}

/**
 * Convert a manifest into its persisted document form.
 */
export function toDocument(manifest: Manifest): ManifestDirectoryRecord {
  return directoryToDocument(manifest.root);
}

function directoryToDocument(directory: DirectoryNode): ManifestDirectoryRecord {
  const document: ManifestDirectoryRecord = {};
  for (const child of directory.children) {
    if (child.kind === 'directory') {
      document[child.name] = directoryToDocument(child);
    } else {
      const leaf: ManifestLeafRecord = { size: child.sizeBytes, kind: child.kind };
      document[child.name] = leaf;
    }
  }
  return document;
}

export function serializeManifest(manifest: Manifest): string {
  return `${JSON.stringify(toDocument(manifest), null, 2)}\n`;
}
