/**
 * Configuration Schema
 *
 * Defines the shape of .tree2md.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Keys are snake_case as written in TOML. Command-line flags are mapped onto
 * the same shape before merging, so one schema validates both sources.
 */

import { z } from 'zod';

/**
 * A list of names or extensions. Entries are trimmed; empty entries dropped.
 */
const NameListSchema = z
  .array(z.string())
  .transform((items) => items.map((item) => item.trim()).filter((item) => item !== ''));

/**
 * Root configuration schema
 * This is the complete shape of a resolved configuration
 */
export const PackConfigSchema = z.object({
  /** Extension allow-list; omit to allow every extension */
  extensions: NameListSchema.optional().describe(
    'Only render files with these extensions (default: all)'
  ),
  omit_extensions: NameListSchema.describe(
    'Extensions noted in the output without their content'
  ),
  omit_files: NameListSchema.describe('File names noted without their content'),
  omit_dirs: NameListSchema.describe('Directory names never traversed'),
  whitelist_files: NameListSchema.optional().describe(
    'If set, only files with these names are included'
  ),
  whitelist_dirs: NameListSchema.optional().describe(
    'If set, only directories with these names are traversed'
  ),
  whitelist: NameListSchema.optional().describe(
    'If set, only directories and files with these names or relative paths are processed'
  ),
  max_depth: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Deepest directory level entered (0 = root files only)'),
  max_size: z
    .number()
    .int()
    .positive()
    .describe('Files larger than this many bytes are referenced, not rendered'),
  gitignore: z
    .string()
    .min(1)
    .optional()
    .describe('Path to a global gitignore-style file'),
  obey_gitignores: z
    .boolean()
    .describe('Apply the .gitignore file of every traversed directory'),
  default_ignores: z
    .boolean()
    .describe('Apply built-in ignore patterns (.git, node_modules, build output, ...)'),
  strip_comments: z.boolean().describe('Remove line and block comments'),
  max_line_length: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Truncate lines longer than this many characters'),
  max_string_length: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Truncate string literals longer than this many characters'),
  max_blank_lines: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Maximum consecutive blank lines kept'),
});

/**
 * TypeScript type inferred from the schema
 */
export type PackConfig = z.infer<typeof PackConfigSchema>;

/**
 * Partial config for sparse files and command-line overrides.
 * Unknown keys are rejected so typos surface as errors.
 */
export const PartialPackConfigSchema = PackConfigSchema.partial().strict();
export type PartialPackConfig = z.infer<typeof PartialPackConfigSchema>;
