/**
 * Packer Module
 *
 * Walks a directory tree and packs it into Markdown: one block per file,
 * with a header and either the (transformed) content or a short notice.
 *
 * @example
 * ```ts
 * import { runPackPipeline, writeOutput } from './packer';
 *
 * const result = runPackPipeline('/path/to/project', rules);
 * writeOutput(result.blocks, { mode: 'single', file: 'project.md' });
 * ```
 */

// Pipeline
export { runPackPipeline, readContent, type PackPipelineOptions, type ContentReader } from './pipeline.js';

// Traversal
export { walkTree, scanTree, getDirectorySkipReason, type WalkOptions, type DirectorySkipReason } from './scanner.js';

// Ignore patterns
export {
  IgnoreStack,
  GITIGNORE_FILE,
  parseIgnoreContent,
  loadIgnoreFile,
  createIgnoreLayer,
  createDefaultLayer,
  createGlobalLayer,
  loadDirectoryLayer,
  testLayer,
  type IgnoreLayer,
  type LayerVerdict,
} from './ignore.js';

// Classification
export { classifyEntry } from './classifier.js';
export { BINARY_SAMPLE_SIZE, isBinarySample, readSample, type SampleReader } from './binary.js';
export { getExtension, matchesName, matchesExtension, matchesWhitelist } from './match.js';

// Content transforms
export {
  decodeContent,
  transformContent,
  stripComments,
  truncateStrings,
  truncateLines,
  collapseBlankLines,
  normalizeLineEndings,
  STRING_TRUNCATION_MARKER,
  LINE_TRUNCATION_MARKER,
} from './transform/index.js';

// Rendering and output
export { renderBlock, formatHeader, formatNotice, chooseFence, fenceContent } from './renderer.js';
export {
  writeOutput,
  assembleDocument,
  sanitizeFileName,
  unitFileName,
  FILENAME_SUBSTITUTE,
  type OutputTarget,
  type OutputSink,
  type WriteSummary,
} from './assembler.js';

// Types and constants
export {
  type PathEntry,
  type TransformConfig,
  type IgnoreSettings,
  type RuleSet,
  type Disposition,
  type DispositionReason,
  type Classification,
  type RenderedBlock,
  type PackStats,
  type PackResult,
  EXTENSION_TO_LANGUAGE,
  DEFAULT_IGNORE_PATTERNS,
  getLanguageForExtension,
} from './types.js';
