/**
 * Gitignore Pattern Handling
 *
 * Utilities for loading and applying gitignore-style patterns.
 * Uses the 'ignore' package which implements full gitignore semantics
 * (`**`, anchoring, directory-only patterns, `!` negation, last match wins).
 *
 * Several pattern sources can apply to one path: the built-in defaults, a
 * global file, and the .gitignore of every directory above the path. They are
 * kept as layers in an IgnoreStack and asked innermost first, so a
 * directory's own .gitignore overrides anything configured further out.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { ConfigError, toError } from '../errors/index.js';
import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/** Name of the per-directory pattern file */
export const GITIGNORE_FILE = '.gitignore';

/**
 * One parsed pattern source, anchored at a directory.
 */
export interface IgnoreLayer {
  /** Directory the patterns are relative to (absolute) */
  readonly baseDir: string;

  /** Compiled matcher */
  readonly matcher: Ignore;

  /** Where the patterns came from, for debug output */
  readonly source: string;
}

/**
 * Outcome of testing a path against one layer.
 * - ignored: a pattern excludes the path
 * - unignored: a negation pattern re-includes it
 * - undecided: no pattern in the layer matches
 */
export type LayerVerdict = 'ignored' | 'unignored' | 'undecided';

/**
 * Parse gitignore file content into an array of patterns.
 * Drops empty lines and comments; keeps negations.
 *
 * @example
 * parseIgnoreContent('# build output\ndist/\n!dist/keep.txt\n')
 * // => ['dist/', '!dist/keep.txt']
 */
export function parseIgnoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => {
      if (line === '') return false;
      // Comments, but not escaped \# patterns
      if (line.startsWith('#')) return false;
      return true;
    });
}

/**
 * Load gitignore patterns from a file.
 *
 * An ignore source that cannot be loaded is a configuration error: a run
 * never proceeds with part of its rules missing.
 *
 * @throws ConfigError if the file is missing or unreadable
 */
export function loadIgnoreFile(ignorePath: string): string[] {
  if (!existsSync(ignorePath)) {
    throw new ConfigError(
      `Ignore file not found: ${ignorePath}`,
      'Check the --gitignore path'
    );
  }

  let content: string;
  try {
    content = readFileSync(ignorePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read ignore file: ${ignorePath} (${toError(error).message})`,
      'Check the file permissions'
    );
  }

  return parseIgnoreContent(content);
}

/**
 * Compile patterns into a layer anchored at `baseDir`.
 */
export function createIgnoreLayer(
  baseDir: string,
  patterns: readonly string[],
  source: string
): IgnoreLayer {
  const matcher: Ignore = ignore();
  if (patterns.length > 0) {
    matcher.add([...patterns]);
  }
  return { baseDir, matcher, source };
}

/**
 * Layer for the built-in default patterns, anchored at the scan root.
 */
export function createDefaultLayer(rootPath: string): IgnoreLayer {
  return createIgnoreLayer(rootPath, DEFAULT_IGNORE_PATTERNS, 'defaults');
}

/**
 * Layer for a global ignore file.
 *
 * Patterns are anchored at the file's own directory when the scan root lies
 * inside it (the usual case of a repository-level file), otherwise at the
 * scan root, so a file kept elsewhere still applies.
 */
export function createGlobalLayer(
  rootPath: string,
  globalFile: string,
  patterns: readonly string[]
): IgnoreLayer {
  const fileDir = dirname(globalFile);
  const baseDir = isInside(rootPath, fileDir) ? fileDir : rootPath;
  return createIgnoreLayer(baseDir, patterns, globalFile);
}

/**
 * Load the .gitignore of a directory as a layer, if the directory has one.
 *
 * @throws ConfigError if the file exists but cannot be read
 */
export function loadDirectoryLayer(directory: string): IgnoreLayer | undefined {
  const gitignorePath = join(directory, GITIGNORE_FILE);
  if (!existsSync(gitignorePath)) {
    return undefined;
  }
  return createIgnoreLayer(directory, loadIgnoreFile(gitignorePath), gitignorePath);
}

/**
 * Test a path against a single layer.
 *
 * Paths outside the layer's base directory are undecided.
 */
export function testLayer(
  layer: IgnoreLayer,
  absolutePath: string,
  isDirectory: boolean
): LayerVerdict {
  let relativePath = relative(layer.baseDir, absolutePath);

  if (relativePath === '' || escapesDirectory(relativePath)) {
    return 'undecided';
  }

  // The ignore library expects forward slashes
  if (sep === '\\') {
    relativePath = relativePath.split(sep).join('/');
  }

  // A trailing slash lets directory-only patterns (`build/`) match
  const result = layer.matcher.test(isDirectory ? `${relativePath}/` : relativePath);
  if (result.ignored) return 'ignored';
  if (result.unignored) return 'unignored';
  return 'undecided';
}

/**
 * Ordered set of ignore layers, outermost first.
 *
 * Immutable: `extend` returns a new stack, so each directory level of the
 * walk holds exactly the layers that apply to it.
 */
export class IgnoreStack {
  constructor(public readonly layers: readonly IgnoreLayer[] = []) {}

  /** A stack with `layer` added as the innermost layer */
  extend(layer: IgnoreLayer | undefined): IgnoreStack {
    return layer ? new IgnoreStack([...this.layers, layer]) : this;
  }

  /** Whether any layer applies at all */
  get isEmpty(): boolean {
    return this.layers.length === 0;
  }

  /**
   * Whether a path is ignored.
   *
   * Layers are asked innermost first; the first one that ignores or
   * re-includes the path decides. No decision means not ignored.
   */
  isIgnored(absolutePath: string, isDirectory: boolean): boolean {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      if (!layer) continue;
      const verdict = testLayer(layer, absolutePath, isDirectory);
      if (verdict !== 'undecided') {
        return verdict === 'ignored';
      }
    }
    return false;
  }
}

function isInside(path: string, directory: string): boolean {
  const rel = relative(directory, path);
  return rel === '' || !escapesDirectory(rel);
}

/** `..old.bak` is a name inside the directory; `..` and `../x` are not */
function escapesDirectory(relativePath: string): boolean {
  return (
    relativePath === '..' || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath)
  );
}
