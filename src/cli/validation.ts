/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Comma-separated lists -> arrays
 * - Helpful error messages
 *
 * The validated options map onto PartialPackConfig, so flags merge over the
 * config file through the same schema.
 */

import { z } from 'zod';

import type { PartialPackConfig } from '../config/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

// ============================================================================
// PACK COMMAND SCHEMA
// ============================================================================

/** "py, ts,,md" -> ['py', 'ts', 'md'] */
const commaList = z
  .string()
  .transform((val) => val.split(',').map((item) => item.trim()).filter(Boolean));

function integerOption(flag: string, min: number) {
  return z
    .string()
    .regex(/^\d+$/, `${flag} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min, { message: `${flag} must be at least ${min}` });
}

export const PackOptionsSchema = z
  .object({
    outputFile: z.string().min(1, 'Output file cannot be empty').optional(),
    outputDir: z.string().min(1, 'Output directory cannot be empty').optional(),
    config: z.string().min(1, 'Config path cannot be empty').optional(),
    extensions: commaList.optional(),
    omit: commaList.optional(),
    omitFiles: commaList.optional(),
    omitDirs: commaList.optional(),
    whitelistFiles: commaList.optional(),
    whitelistDirs: commaList.optional(),
    whitelist: commaList.optional(),
    depth: integerOption('--depth', 0).optional(),
    maxSize: integerOption('--max-size', 1).optional(),
    gitignore: z.string().min(1, 'Ignore file path cannot be empty').optional(),
    obeyGitignores: z.boolean().optional(),
    defaultIgnores: z.boolean().optional(),
    nocom: z.boolean().optional(),
    truncln: integerOption('--truncln', 1).optional(),
    truncstr: integerOption('--truncstr', 1).optional(),
    maxlnspace: integerOption('--maxlnspace', 0).optional(),
  })
  .refine((opts) => !(opts.outputFile && opts.outputDir), {
    message: '--output-file and --output-dir cannot be used together',
    path: ['outputDir'],
  });

export type PackOptionsInput = z.input<typeof PackOptionsSchema>;
export type PackOptions = z.output<typeof PackOptionsSchema>;

export const PackArgsSchema = z.object({
  directory: z.string().min(1, 'Directory cannot be empty'),
});

/**
 * Map validated flags onto config keys.
 *
 * Boolean flags only ever switch a setting on, so an absent flag leaves the
 * config file's value in place. A relative --gitignore is left as given and
 * resolves against the working directory.
 */
export function toConfigOverrides(options: PackOptions): PartialPackConfig {
  return {
    extensions: options.extensions,
    omit_extensions: options.omit,
    omit_files: options.omitFiles,
    omit_dirs: options.omitDirs,
    whitelist_files: options.whitelistFiles,
    whitelist_dirs: options.whitelistDirs,
    whitelist: options.whitelist,
    max_depth: options.depth,
    max_size: options.maxSize,
    gitignore: options.gitignore,
    obey_gitignores: options.obeyGitignores || undefined,
    default_ignores: options.defaultIgnores || undefined,
    strip_comments: options.nocom || undefined,
    max_line_length: options.truncln,
    max_string_length: options.truncstr,
    max_blank_lines: options.maxlnspace,
  };
}

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(PackOptionsSchema, cmdOptions);
 * if (!result.success) {
 *   throw new ValidationError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string; issues: string[] } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  // Format Zod errors into a readable message
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return { success: false, error: `Validation failed:\n  ${issues.join('\n  ')}`, issues };
}
