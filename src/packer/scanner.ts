/**
 * Tree Walker
 *
 * Synchronous, depth-first traversal of the scan root. Decides which
 * subdirectories are entered (depth limit, omit list, whitelists, ignore
 * patterns) and yields every file that is not ignored, for the classifier to
 * decide on.
 *
 * Entries are sorted by name at every level, so output order is the same on
 * every filesystem. Within a directory, its files are yielded before any of
 * its subdirectories are entered.
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';

import { TraversalError, toError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import {
  IgnoreStack,
  createDefaultLayer,
  createGlobalLayer,
  loadDirectoryLayer,
} from './ignore.js';
import { getExtension, matchesName, matchesWhitelist } from './match.js';
import type { PathEntry, RuleSet } from './types.js';

/**
 * Options for a walk.
 */
export interface WalkOptions {
  /** Receives debug notes on skipped directories */
  logger?: Logger;

  /**
   * Called for every non-fatal traversal problem. `error` is set when a
   * subdirectory could not be listed and its subtree was skipped.
   */
  onWarning?: (message: string, error?: TraversalError) => void;
}

/**
 * Why a subdirectory is not entered.
 */
export type DirectorySkipReason =
  | 'depth-limit'
  | 'omitted'
  | 'not-whitelisted'
  | 'ignored';

/**
 * Walk the tree under `rootPath`, yielding files in traversal order.
 *
 * @throws TraversalError if the root itself cannot be listed
 * @throws ConfigError if a discovered .gitignore cannot be read
 *
 * @example
 * ```ts
 * for (const entry of walkTree('/path/to/project', rules)) {
 *   console.log(entry.relativePath);
 * }
 * ```
 */
export function* walkTree(
  rootPath: string,
  rules: RuleSet,
  options: WalkOptions = {}
): Generator<PathEntry> {
  const absoluteRoot = resolve(rootPath);

  let ignoreStack = new IgnoreStack();
  if (rules.ignore.useDefaults) {
    ignoreStack = ignoreStack.extend(createDefaultLayer(absoluteRoot));
  }
  if (rules.ignore.globalFile) {
    ignoreStack = ignoreStack.extend(
      createGlobalLayer(absoluteRoot, rules.ignore.globalFile, rules.ignore.globalPatterns)
    );
  }

  yield* walkDirectory(absoluteRoot, '', 0, ignoreStack, rules, options);
}

/**
 * Collect the whole walk into an array.
 */
export function scanTree(
  rootPath: string,
  rules: RuleSet,
  options: WalkOptions = {}
): PathEntry[] {
  return Array.from(walkTree(rootPath, rules, options));
}

/**
 * Decide whether the walk enters a subdirectory.
 *
 * @param entry - The subdirectory (depth = level of its parent)
 * @returns undefined to enter, or the reason it is skipped
 */
export function getDirectorySkipReason(
  entry: PathEntry,
  rules: RuleSet,
  ignoreStack: IgnoreStack
): DirectorySkipReason | undefined {
  if (rules.maxDepth !== undefined && entry.depth >= rules.maxDepth) {
    return 'depth-limit';
  }

  if (matchesName(entry.name, rules.omitDirs)) {
    return 'omitted';
  }

  if (rules.whitelistDirs) {
    if (!matchesName(entry.name, rules.whitelistDirs)) {
      return 'not-whitelisted';
    }
  } else if (rules.whitelist && !matchesWhitelist(entry, rules.whitelist)) {
    return 'not-whitelisted';
  }

  if (ignoreStack.isIgnored(entry.absolutePath, true)) {
    return 'ignored';
  }

  return undefined;
}

function* walkDirectory(
  directory: string,
  relativeDir: string,
  depth: number,
  parentStack: IgnoreStack,
  rules: RuleSet,
  options: WalkOptions
): Generator<PathEntry> {
  const logger = options.logger ?? consoleLogger;
  const ignoreStack = rules.ignore.perDirectory
    ? parentStack.extend(loadDirectoryLayer(directory))
    : parentStack;

  const { files, directories } = listDirectory(directory, relativeDir, depth, options);

  for (const file of files) {
    if (ignoreStack.isIgnored(file.absolutePath, false)) {
      logger.debug?.(`Ignored by pattern: ${file.relativePath}`);
      continue;
    }
    yield file;
  }

  for (const subdirectory of directories) {
    const skipReason = getDirectorySkipReason(subdirectory, rules, ignoreStack);
    if (skipReason) {
      logger.debug?.(`Skipping directory (${skipReason}): ${subdirectory.relativePath}`);
      continue;
    }

    try {
      yield* walkDirectory(
        subdirectory.absolutePath,
        subdirectory.relativePath,
        depth + 1,
        ignoreStack,
        rules,
        options
      );
    } catch (error) {
      // An unlistable subdirectory costs its subtree, not the run
      if (error instanceof TraversalError && error.path === subdirectory.absolutePath) {
        options.onWarning?.(error.message, error);
        continue;
      }
      throw error;
    }
  }
}

/**
 * List one directory, sorted by name and split into files and directories.
 *
 * @throws TraversalError if the directory cannot be read
 */
function listDirectory(
  directory: string,
  relativeDir: string,
  depth: number,
  options: WalkOptions
): { files: PathEntry[]; directories: PathEntry[] } {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    throw new TraversalError(directory, toError(error));
  }

  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: PathEntry[] = [];
  const directories: PathEntry[] = [];

  for (const dirent of dirents) {
    const absolutePath = join(directory, dirent.name);
    const relativePath = relativeDir === '' ? dirent.name : `${relativeDir}/${dirent.name}`;

    let isFile = dirent.isFile();
    let isDirectory = dirent.isDirectory();

    if (dirent.isSymbolicLink()) {
      // Links to files are packed; links to directories are not followed
      try {
        isFile = statSync(absolutePath).isFile();
        isDirectory = false;
      } catch (error) {
        options.onWarning?.(
          `Skipping dangling symlink: ${relativePath} (${toError(error).message})`
        );
        continue;
      }
    }

    if (isDirectory) {
      directories.push({
        absolutePath,
        relativePath,
        name: dirent.name,
        extension: '',
        isDirectory: true,
        size: 0,
        depth,
      });
    } else if (isFile) {
      files.push({
        absolutePath,
        relativePath,
        name: dirent.name,
        extension: getExtension(dirent.name),
        isDirectory: false,
        size: fileSize(absolutePath),
        depth,
      });
    }
  }

  return { files, directories };
}

/**
 * Size of a file, or 0 if it vanished since the listing. A vanished file
 * then fails its content read and is reported as unreadable.
 */
function fileSize(absolutePath: string): number {
  try {
    return statSync(absolutePath).size;
  } catch {
    return 0;
  }
}
