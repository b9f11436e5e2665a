/**
 * Path Validation Utilities
 *
 * Validation for the scan root and output destinations with structured
 * results, so the CLI can turn failures into the right CLIError.
 */

import { resolve, sep } from 'node:path';
import { existsSync, statSync, realpathSync, accessSync, constants } from 'node:fs';
import { toError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of path validation.
 *
 * Discriminated union: callers must handle both success and failure.
 * Warnings are returned even on success for non-fatal issues.
 */
export type PathValidationResult =
  | { valid: true; normalizedPath: string; warnings: string[] }
  | { valid: false; reason: 'missing' | 'unreadable' | 'not-directory' | 'inside-root'; error: string; hint: string };

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate the directory to pack.
 *
 * Checks, in order:
 * 1. Path existence
 * 2. Symlink resolution (detects loops)
 * 3. Is a directory (not a file)
 * 4. Read permissions
 *
 * @example
 * const result = validateScanRoot('./my-project');
 * if (!result.valid) {
 *   throw new CLIError(result.error, result.hint);
 * }
 */
export function validateScanRoot(inputPath: string): PathValidationResult {
  const warnings: string[] = [];
  const absolutePath = resolve(inputPath);

  if (!existsSync(absolutePath)) {
    return {
      valid: false,
      reason: 'missing',
      error: `Path does not exist: ${absolutePath}`,
      hint: 'Check the path and try again',
    };
  }

  let realPath: string;
  try {
    realPath = realpathSync(absolutePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ELOOP') {
      return {
        valid: false,
        reason: 'unreadable',
        error: `Symlink loop detected at: ${absolutePath}`,
        hint: 'The path contains circular symlinks. Remove or fix the symlink loop.',
      };
    }
    return {
      valid: false,
      reason: 'unreadable',
      error: `Cannot resolve path: ${absolutePath}`,
      hint: `System error: ${toError(error).message}`,
    };
  }

  if (!statSync(realPath).isDirectory()) {
    return {
      valid: false,
      reason: 'not-directory',
      error: `Path is not a directory: ${realPath}`,
      hint: 'tree2md packs a directory tree. Pass the parent directory instead.',
    };
  }

  try {
    accessSync(realPath, constants.R_OK);
  } catch {
    return {
      valid: false,
      reason: 'unreadable',
      error: `Permission denied: cannot read ${realPath}`,
      hint: 'Check file permissions. You may need to run: chmod +r <path>',
    };
  }

  if (absolutePath !== realPath) {
    warnings.push(`Symlink resolved: ${absolutePath} -> ${realPath}`);
  }

  return { valid: true, normalizedPath: realPath, warnings };
}

/**
 * Validate an output destination against the scan root.
 *
 * An output file or directory inside the tree being packed would be picked up
 * by the next run, so it is allowed but reported as a warning. The parent of
 * a single-document output must exist or be creatable; that is checked at
 * write time.
 */
export function validateOutputPath(
  outputPath: string,
  scanRoot: string
): PathValidationResult {
  const absolutePath = resolve(outputPath);
  const root = resolve(scanRoot);
  const warnings: string[] = [];

  if (absolutePath === root) {
    return {
      valid: false,
      reason: 'inside-root',
      error: `Output path is the scan root: ${absolutePath}`,
      hint: 'Write the output somewhere outside the directory being packed',
    };
  }

  if (absolutePath.startsWith(root + sep)) {
    warnings.push(
      `Output ${absolutePath} is inside the scanned directory and will be packed by later runs`
    );
  }

  return { valid: true, normalizedPath: absolutePath, warnings };
}
