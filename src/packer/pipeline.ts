/**
 * Packing Pipeline
 *
 * Runs the stages strictly in sequence, one entry at a time:
 *
 * walkTree -> classifyEntry -> (read, decode, transformContent) -> renderBlock
 *
 * Block order equals traversal order. Per-entry read and decode failures
 * degrade that entry to a referenced block; unlistable subdirectories are
 * skipped with a warning. Everything else propagates.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { DecodeError, ReadError, toError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { readSample, type SampleReader } from './binary.js';
import { classifyEntry } from './classifier.js';
import { renderBlock } from './renderer.js';
import { walkTree } from './scanner.js';
import { decodeContent, transformContent } from './transform/index.js';
import type {
  Classification,
  PackResult,
  PackStats,
  PathEntry,
  RenderedBlock,
  RuleSet,
} from './types.js';

/**
 * Reads the full content of a file. Throws ReadError on failure.
 */
export type ContentReader = (absolutePath: string) => Uint8Array;

/**
 * Options for a pipeline run.
 */
export interface PackPipelineOptions {
  /** Receives warnings and debug notes */
  logger?: Logger;

  /** Called after each file is classified (progress reporting) */
  onEntry?: (entry: PathEntry, classification: Classification) => void;

  /** Override the sample reader used for binary detection */
  sampleReader?: SampleReader;

  /** Override the content reader used for rendered files */
  contentReader?: ContentReader;
}

/**
 * Read a whole file.
 *
 * @throws ReadError
 */
export const readContent: ContentReader = (absolutePath: string): Uint8Array => {
  try {
    return readFileSync(absolutePath);
  } catch (error) {
    throw new ReadError(absolutePath, toError(error));
  }
};

/**
 * Run the pipeline over one root.
 *
 * @example
 * ```ts
 * const rules = resolveRuleSet(DEFAULT_CONFIG);
 * const result = runPackPipeline('/path/to/project', rules);
 * console.log(`${result.stats.rendered} files rendered`);
 * ```
 */
export function runPackPipeline(
  rootPath: string,
  rules: RuleSet,
  options: PackPipelineOptions = {}
): PackResult {
  const startTime = performance.now();
  const logger = options.logger ?? consoleLogger;
  const sampleReader = options.sampleReader ?? readSample;
  const contentReader = options.contentReader ?? readContent;

  const stats: PackStats = {
    filesSeen: 0,
    rendered: 0,
    referenced: 0,
    excluded: 0,
    directoriesSkipped: 0,
    bytesRendered: 0,
    durationMs: 0,
  };
  const warnings: string[] = [];
  const blocks: RenderedBlock[] = [];

  const entries = walkTree(rootPath, rules, {
    logger,
    onWarning: (message, error) => {
      if (error) {
        stats.directoriesSkipped++;
      }
      warnings.push(message);
      logger.warn(message);
    },
  });

  for (const entry of entries) {
    stats.filesSeen++;

    let classification: Classification;
    let content: string | undefined;

    try {
      classification = classifyEntry(entry, rules, sampleReader);
      if (classification.disposition === 'rendered') {
        const bytes = contentReader(entry.absolutePath);
        content = transformContent(
          decodeContent(bytes, entry.absolutePath),
          entry.extension,
          rules.transform
        );
        stats.bytesRendered += bytes.length;
      }
    } catch (error) {
      classification = degrade(error);
      content = undefined;
      logger.debug?.(`Degraded to reference (${classification.reason}): ${entry.relativePath}`);
    }

    options.onEntry?.(entry, classification);

    const block = renderBlock(entry, classification, content, rules.maxSize);
    if (!block) {
      stats.excluded++;
      continue;
    }

    if (block.disposition === 'rendered') {
      stats.rendered++;
    } else {
      stats.referenced++;
    }
    blocks.push(block);
  }

  stats.durationMs = Math.round(performance.now() - startTime);

  return { rootPath: resolve(rootPath), blocks, stats, warnings };
}

/**
 * Turn a per-entry read or decode failure into a referenced classification.
 * Anything else is rethrown.
 */
function degrade(error: unknown): Extract<Classification, { disposition: 'referenced' }> {
  if (error instanceof DecodeError) {
    return { disposition: 'referenced', reason: 'undecodable' };
  }
  if (error instanceof ReadError) {
    return { disposition: 'referenced', reason: 'unreadable', detail: error.message };
  }
  throw error;
}
