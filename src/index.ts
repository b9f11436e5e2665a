/**
 * tree2md - Library Entry Point
 *
 * The CLI (`tree2md`) covers most uses:
 * ```bash
 * tree2md ./my-project                       # Markdown to stdout
 * tree2md ./my-project -o project.md         # One document
 * tree2md ./my-project -d packed/            # One document per file
 * ```
 *
 * The same pipeline is available programmatically.
 *
 * @example
 * ```typescript
 * import { packDirectory } from 'tree2md';
 *
 * const { result, written } = packDirectory(
 *   './my-project',
 *   { omit_dirs: ['.git', 'node_modules'], strip_comments: true },
 *   { mode: 'single', file: 'project.md' }
 * );
 * console.log(`${result.stats.rendered} files rendered`);
 * ```
 *
 * @packageDocumentation
 */

import { DEFAULT_CONFIG, mergeConfig, resolveRuleSet, type PartialPackConfig } from './config/index.js';
import { runPackPipeline, writeOutput, type OutputTarget, type PackPipelineOptions, type WriteSummary } from './packer/index.js';
import type { PackResult } from './packer/types.js';

/**
 * Result of packDirectory.
 */
export interface PackDirectoryResult {
  /** Blocks, statistics and warnings of the run */
  result: PackResult;

  /** What was written */
  written: WriteSummary;
}

/**
 * Pack a directory tree: resolve rules, run the pipeline, write the output.
 *
 * @param config - Settings over the defaults (config file keys)
 * @throws ConfigError if the settings or the global ignore file are invalid
 * @throws TraversalError if the root cannot be listed
 * @throws WriteError if the output cannot be written
 */
export function packDirectory(
  rootPath: string,
  config: PartialPackConfig,
  target: OutputTarget,
  options: PackPipelineOptions = {}
): PackDirectoryResult {
  const rules = resolveRuleSet(mergeConfig(DEFAULT_CONFIG, config));
  const result = runPackPipeline(rootPath, rules, options);
  const written = writeOutput(result.blocks, target);
  return { result, written };
}

// Packing pipeline
export * from './packer/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Library logging
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
