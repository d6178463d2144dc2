export { Manifest, walk, joinRemotePath, relativeTo } from './manifest.js';
export {
  buildManifest,
  splitPath,
  manifestToRecords,
  mergeManifests,
  manifestsEqual,
} from './builder.js';
export {
  parseManifestJson,
  recordsFromDocument,
  serializeManifest,
  toDocument,
} from './json.js';
export {
  compileGlob,
  matchesPrefix,
  selectionPredicate,
  selectLeaves,
  describeSelection,
} from './selection.js';
export { partitionManifest, parsePartitionArgs } from './partition.js';
export {
  ARCHIVE_EXTENSIONS,
  archiveExtension,
  archiveStem,
  isArchiveName,
} from './archive-names.js';
export { isDirectory, isLeaf } from './types.js';

export type { Selection } from './selection.js';
export type { ArchiveExtension } from './archive-names.js';
export type { PartitionPattern, PartitionOptions } from './partition.js';
export type {
  LeafKind,
  NodeKind,
  DirectoryNode,
  ArchiveNode,
  FileNode,
  LeafNode,
  ManifestNode,
  ListingRecord,
  ManifestOptions,
  ManifestLeafRecord,
  ManifestDirectoryRecord,
} from './types.js';
