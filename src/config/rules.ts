/**
 * Rule Resolution
 *
 * Turns a validated PackConfig into the immutable RuleSet the pipeline
 * runs under. Name lists become sets, paths become absolute, and the
 * global ignore file is read here, before any traversal starts.
 */

import { resolve } from 'node:path';

import { loadIgnoreFile } from '../packer/ignore.js';
import type { RuleSet } from '../packer/types.js';
import type { PackConfig } from './schema.js';

/**
 * Build the RuleSet for a run.
 *
 * A relative `gitignore` is resolved against the working directory.
 * Empty whitelists are treated as unset.
 *
 * @throws ConfigError if the global ignore file is missing or unreadable
 */
export function resolveRuleSet(config: PackConfig): RuleSet {
  const globalFile = config.gitignore ? resolve(config.gitignore) : undefined;
  const globalPatterns = globalFile ? loadIgnoreFile(globalFile) : [];

  return Object.freeze({
    extensions: toSet(config.extensions),
    omitExtensions: new Set(config.omit_extensions),
    omitFiles: new Set(config.omit_files),
    omitDirs: new Set(config.omit_dirs),
    whitelistFiles: toRestriction(config.whitelist_files),
    whitelistDirs: toRestriction(config.whitelist_dirs),
    whitelist: toRestriction(config.whitelist),
    maxDepth: config.max_depth,
    maxSize: config.max_size,
    ignore: Object.freeze({
      globalFile,
      globalPatterns: Object.freeze([...globalPatterns]),
      perDirectory: config.obey_gitignores,
      useDefaults: config.default_ignores,
    }),
    transform: Object.freeze({
      stripComments: config.strip_comments,
      maxLineLength: config.max_line_length,
      maxStringLength: config.max_string_length,
      maxBlankLines: config.max_blank_lines,
    }),
  });
}

function toSet(items: readonly string[] | undefined): ReadonlySet<string> | undefined {
  return items ? new Set(items) : undefined;
}

/** An empty whitelist restricts nothing */
function toRestriction(items: readonly string[] | undefined): ReadonlySet<string> | undefined {
  return items && items.length > 0 ? new Set(items) : undefined;
}
