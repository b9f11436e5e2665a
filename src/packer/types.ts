/**
 * Packer Types
 *
 * Type definitions for the packing pipeline. A run walks one directory tree
 * under a single immutable RuleSet and turns every surviving file into one
 * RenderedBlock.
 */

/**
 * A filesystem entry found during traversal.
 */
export interface PathEntry {
  /** Absolute path to the entry */
  readonly absolutePath: string;

  /** Path relative to the scan root, always with forward slashes */
  readonly relativePath: string;

  /** Base name of the entry */
  readonly name: string;

  /**
   * Extension without the dot (e.g., 'ts', 'py'), case preserved.
   * Empty for names without a dot and for bare dotfiles like '.gitignore'.
   */
  readonly extension: string;

  /** Whether the entry is a directory */
  readonly isDirectory: boolean;

  /** Size in bytes (0 for directories) */
  readonly size: number;

  /** Depth below the root: 0 for entries directly inside it */
  readonly depth: number;
}

/**
 * Settings for the content transforms applied to rendered files.
 * Every limit is optional; an unset limit skips its step.
 */
export interface TransformConfig {
  /** Strip line and block comments for the languages that have a mapping */
  readonly stripComments: boolean;

  /** Cut lines longer than this many characters */
  readonly maxLineLength?: number;

  /** Cut string literal interiors longer than this many characters */
  readonly maxStringLength?: number;

  /** Collapse runs of blank lines longer than this */
  readonly maxBlankLines?: number;
}

/**
 * Ignore-pattern sources for one run.
 */
export interface IgnoreSettings {
  /** Absolute path of a global gitignore-style file, if any */
  readonly globalFile?: string;

  /** Patterns read from the global file (loaded eagerly at startup) */
  readonly globalPatterns: readonly string[];

  /** Discover .gitignore files in every traversed directory */
  readonly perDirectory: boolean;

  /** Apply DEFAULT_IGNORE_PATTERNS as the lowest-priority layer */
  readonly useDefaults: boolean;
}

/**
 * The resolved, immutable rules for a run.
 *
 * Built once by resolveRuleSet() and passed by reference to every stage.
 */
export interface RuleSet {
  /** Extension allow-list; undefined means every extension is eligible */
  readonly extensions?: ReadonlySet<string>;

  /** Extensions noted in the output but whose content is omitted */
  readonly omitExtensions: ReadonlySet<string>;

  /** File names noted in the output but whose content is omitted */
  readonly omitFiles: ReadonlySet<string>;

  /** Directory names never traversed */
  readonly omitDirs: ReadonlySet<string>;

  /** When set, only files with these names are included */
  readonly whitelistFiles?: ReadonlySet<string>;

  /** When set, only directories with these names are traversed */
  readonly whitelistDirs?: ReadonlySet<string>;

  /**
   * When set, only directories and files whose name or relative path is in
   * the set are traversed / included.
   */
  readonly whitelist?: ReadonlySet<string>;

  /**
   * Deepest directory level to enter.
   * - 0: only files directly in the root
   * - undefined: no limit
   */
  readonly maxDepth?: number;

  /** Files larger than this many bytes are referenced but not rendered */
  readonly maxSize: number;

  /** Ignore-pattern sources */
  readonly ignore: IgnoreSettings;

  /** Content transform settings */
  readonly transform: TransformConfig;
}

/**
 * What happens to a file in the output.
 * - excluded: not shown at all
 * - referenced: path noted, content withheld
 * - rendered: path and (transformed) content shown
 */
export type Disposition = 'excluded' | 'referenced' | 'rendered';

/**
 * Why a file was excluded or referenced only.
 */
export type DispositionReason =
  | 'omitted-file'
  | 'omitted-extension'
  | 'not-whitelisted'
  | 'extension-not-allowed'
  | 'too-large'
  | 'binary'
  | 'unreadable'
  | 'undecodable';

/**
 * Result of classifying one file.
 */
export type Classification =
  | { disposition: 'rendered' }
  | {
      disposition: 'excluded';
      reason: 'not-whitelisted' | 'extension-not-allowed';
    }
  | {
      disposition: 'referenced';
      reason: Exclude<DispositionReason, 'not-whitelisted' | 'extension-not-allowed'>;
      /** Extra detail for the notice (e.g., the read error message) */
      detail?: string;
    };

/**
 * The final textual unit for one file.
 *
 * Carried as structured data to the output step, so multi-document output
 * never has to split already-flattened text.
 */
export interface RenderedBlock {
  /** The entry this block belongs to */
  readonly entry: PathEntry;

  /** referenced or rendered (excluded entries have no block) */
  readonly disposition: Exclude<Disposition, 'excluded'>;

  /** Header line, e.g. **src/index.ts** */
  readonly header: string;

  /** Notice or fenced content following the header */
  readonly body: string;

  /** header + body, newline-terminated */
  readonly text: string;
}

/**
 * Statistics about a completed run.
 */
export interface PackStats {
  /** Files that reached the classifier */
  filesSeen: number;

  /** Files rendered with content */
  rendered: number;

  /** Files referenced without content */
  referenced: number;

  /** Files excluded from the output */
  excluded: number;

  /** Subdirectories skipped because they could not be listed */
  directoriesSkipped: number;

  /** Bytes of source read for rendered files */
  bytesRendered: number;

  /** Time taken in milliseconds */
  durationMs: number;
}

/**
 * Result of running the pipeline over one root.
 */
export interface PackResult {
  /** Absolute scan root */
  rootPath: string;

  /** Blocks in traversal order */
  blocks: RenderedBlock[];

  /** Run statistics */
  stats: PackStats;

  /** Non-fatal problems (unlistable directories, dangling links) */
  warnings: string[];
}

/**
 * Extension to fence language mapping.
 * Extensions without an entry use the extension itself as the hint.
 */
export const EXTENSION_TO_LANGUAGE: Readonly<Record<string, string>> = {
  // TypeScript
  ts: 'typescript',
  tsx: 'tsx',
  mts: 'typescript',
  cts: 'typescript',

  // JavaScript
  js: 'javascript',
  jsx: 'jsx',
  mjs: 'javascript',
  cjs: 'javascript',

  // Python
  py: 'python',
  pyw: 'python',
  pyi: 'python',

  // Systems
  go: 'go',
  rs: 'rust',
  java: 'java',
  c: 'c',
  h: 'c',
  cpp: 'cpp',
  hpp: 'cpp',
  cc: 'cpp',
  cs: 'csharp',
  rb: 'ruby',
  php: 'php',
  swift: 'swift',
  kt: 'kotlin',

  // Web
  html: 'html',
  htm: 'html',
  css: 'css',
  scss: 'scss',

  // Config
  json: 'json',
  yaml: 'yaml',
  yml: 'yaml',
  toml: 'toml',

  // Documentation
  md: 'markdown',
  txt: 'text',

  // Shell
  sh: 'bash',
  bash: 'bash',
  zsh: 'zsh',

  sql: 'sql',
};

/**
 * Get the fence language hint for an extension.
 */
export function getLanguageForExtension(extension: string): string {
  return EXTENSION_TO_LANGUAGE[extension] ?? extension;
}

/**
 * Built-in ignore patterns, applied only when IgnoreSettings.useDefaults is
 * set. Lowest priority: any .gitignore can re-include what they exclude.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  // Version control
  '.git/',
  '.svn/',
  '.hg/',

  // Dependencies
  'node_modules/',
  'vendor/',
  'venv/',
  '.venv/',
  '__pycache__/',
  'bower_components/',

  // Build outputs
  'dist/',
  'build/',
  'target/',
  '.next/',
  '.cache/',

  // IDE/Editor
  '.idea/',
  '.vscode/',
  '*.swp',

  // OS files
  '.DS_Store',
  'Thumbs.db',

  // Test coverage
  'coverage/',

  // Lock files (large, auto-generated)
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
];
