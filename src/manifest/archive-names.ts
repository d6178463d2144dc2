/** Archive file extensions, longest first so `.tar.gz` wins over `.gz`. */
export const ARCHIVE_EXTENSIONS = [
  '.tar.bz2',
  '.tar.gz',
  '.tar.xz',
  '.tgz',
  '.tar',
  '.zip',
  '.7z',
] as const;

export type ArchiveExtension = (typeof ARCHIVE_EXTENSIONS)[number];

export function archiveExtension(name: string): ArchiveExtension | null {
  const lower = name.toLowerCase();
  return ARCHIVE_EXTENSIONS.find((ext) => lower.endsWith(ext)) ?? null;
}

export function isArchiveName(name: string): boolean {
  return archiveExtension(name) !== null;
}

/** Archive name without its extension, e.g. `scene_0.tar.gz` → `scene_0` */
export function archiveStem(name: string): string {
  const ext = archiveExtension(name);
  return ext === null ? name : name.slice(0, name.length - ext.length);
}
