/**
 * Shared fixtures for packer tests
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { PathEntry, RuleSet } from '../types.js';

/**
 * A RuleSet with every list empty and every limit off, plus overrides.
 */
export function makeRules(overrides: Partial<RuleSet> = {}): RuleSet {
  return {
    omitExtensions: new Set(),
    omitFiles: new Set(),
    omitDirs: new Set(),
    maxSize: 100 * 1024,
    ignore: { globalPatterns: [], perDirectory: false, useDefaults: false },
    transform: { stripComments: false },
    ...overrides,
  };
}

/**
 * A file entry at `relativePath` under /project.
 */
export function makeEntry(relativePath: string, overrides: Partial<PathEntry> = {}): PathEntry {
  const name = relativePath.split('/').pop() ?? relativePath;
  const dot = name.lastIndexOf('.');
  return {
    absolutePath: `/project/${relativePath}`,
    relativePath,
    name,
    extension: dot > 0 && dot < name.length - 1 ? name.slice(dot + 1) : '',
    isDirectory: false,
    size: 10,
    depth: relativePath.split('/').length - 1,
    ...overrides,
  };
}

/**
 * Write a file below `root`, creating parent directories.
 */
export function createFile(root: string, relativePath: string, content: string | Uint8Array = ''): string {
  const fullPath = join(root, relativePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
  return fullPath;
}
