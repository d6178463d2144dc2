/**
 * Leaf selection by prefix and glob.
 *
 * Paths are matched relative to the manifest root, `/`-separated.
 *
 * Glob syntax:
 * - `*` matches anything except `/`
 * - `**` matches anything including `/`
 * - `?` matches a single character except `/`
 * - `[abc]` character classes
 * - a pattern without `/` matches the name at any depth
 * - a pattern matching a directory selects everything below it
 */

import type { Manifest } from './manifest.js';
import type { LeafNode } from './types.js';

export interface Selection {
  /** Directory or object path; segment-aware (`a` selects `a/...`, not `ab`) */
  prefix?: string;

  /** Glob over the relative path */
  glob?: string;
}

/**
 * Compile a glob pattern to a RegExp over relative paths.
 */
export function compileGlob(pattern: string): RegExp {
  let anchored = false;
  let work = pattern.trim();

  if (work.startsWith('/')) {
    anchored = true;
    work = work.slice(1);
  } else if (work.includes('/')) {
    anchored = true;
  }

  let regexStr = '';
  let i = 0;

  while (i < work.length) {
    const char = work[i]!;

    if (char === '*') {
      if (work[i + 1] === '*') {
        if (work[i + 2] === '/') {
          // **/ matches zero or more directories
          regexStr += '(?:.+/)?';
          i += 3;
        } else {
          regexStr += '.*';
          i += 2;
        }
      } else {
        regexStr += '[^/]*';
        i += 1;
      }
    } else if (char === '?') {
      regexStr += '[^/]';
      i += 1;
    } else if (char === '[') {
      const closeBracket = work.indexOf(']', i + 1);
      if (closeBracket === -1) {
        regexStr += '\\[';
        i += 1;
      } else {
        regexStr += work.slice(i, closeBracket + 1);
        i = closeBracket + 1;
      }
    } else if ('.+^${}()|\\'.includes(char)) {
      regexStr += '\\' + char;
      i += 1;
    } else {
      regexStr += char;
      i += 1;
    }
  }

  const head = anchored ? '^' : '(?:^|/)';
  return new RegExp(head + regexStr + '(?:/.*)?$');
}

function normalizePrefix(prefix: string): string {
  return prefix.trim().replace(/^\/+/, '').replace(/\/+$/, '');
}

export function matchesPrefix(relativePath: string, prefix: string): boolean {
  const normalized = normalizePrefix(prefix);
  if (normalized === '') {
    return true;
  }
  return relativePath === normalized || relativePath.startsWith(`${normalized}/`);
}

/**
 * Build a predicate over relative paths from a selection.
 */
export function selectionPredicate(selection: Selection): (relativePath: string) => boolean {
  const glob = selection.glob !== undefined && selection.glob.trim() !== ''
    ? compileGlob(selection.glob)
    : null;
  const prefix = selection.prefix ?? '';

  return (relativePath) =>
    matchesPrefix(relativePath, prefix) && (glob === null || glob.test(relativePath));
}

/**
 * Leaves of the manifest matched by the selection, in insertion order.
 */
export function selectLeaves(manifest: Manifest, selection: Selection = {}): LeafNode[] {
  const matches = selectionPredicate(selection);
  return manifest.leaves().filter((leaf) => matches(manifest.relativePath(leaf)));
}

export function describeSelection(selection: Selection): string {
  const parts: string[] = [];
  if (selection.prefix !== undefined && normalizePrefix(selection.prefix) !== '') {
    parts.push(`prefix "${normalizePrefix(selection.prefix)}"`);
  }
  if (selection.glob !== undefined && selection.glob.trim() !== '') {
    parts.push(`glob "${selection.glob.trim()}"`);
  }
  return parts.length === 0 ? '(everything)' : parts.join(' and ');
}
