/**
 * Name and extension matching for the traversal and classification rules.
 *
 * All comparisons are exact and case-sensitive: `PY` is not `py`.
 */

import type { PathEntry } from './types.js';

/**
 * Extension of a file name, without the dot.
 *
 * Matches node:path extname semantics: '' for 'Makefile' and for bare
 * dotfiles like '.env'; 'gz' for 'archive.tar.gz'.
 */
export function getExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return '';
  }
  return name.slice(dot + 1);
}

/**
 * Whether a name is in the set. An undefined set matches nothing.
 */
export function matchesName(name: string, names: ReadonlySet<string> | undefined): boolean {
  return names?.has(name) ?? false;
}

/**
 * Whether an extension is in the set. Entries without an extension never
 * match.
 */
export function matchesExtension(
  extension: string,
  extensions: ReadonlySet<string> | undefined
): boolean {
  return extension !== '' && (extensions?.has(extension) ?? false);
}

/**
 * Whether an entry is named by the combined whitelist, by base name or by
 * path relative to the root.
 */
export function matchesWhitelist(
  entry: Pick<PathEntry, 'name' | 'relativePath'>,
  whitelist: ReadonlySet<string> | undefined
): boolean {
  if (!whitelist) return false;
  return whitelist.has(entry.name) || whitelist.has(entry.relativePath);
}
