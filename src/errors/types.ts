/**
 * Error type definitions for the tree2md CLI and library
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for the recover-or-abort decisions of the pipeline
 *
 * Fatal errors (ConfigError, WriteError, FileNotFoundError) propagate to the
 * caller. TraversalError, ReadError and DecodeError are raised by one entry
 * and recovered by the pipeline, which degrades or skips that entry only.
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when the scan root doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax in .tree2md.toml
 * - Unknown or mistyped config values
 * - An ignore file that cannot be loaded
 *
 * Always fatal: a run never starts with a half-loaded rule set.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: tree2md --help  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a directory cannot be listed (permissions, deleted mid-run).
 *
 * Recovered for subdirectories: the subtree is skipped and noted as a
 * warning. Fatal only when the scan root itself cannot be listed.
 *
 * Exit code 4: Traversal error
 */
export class TraversalError extends CLIError {
  /** Directory that could not be listed */
  public readonly path: string;

  /** The underlying filesystem error */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    super(
      `Cannot list directory: ${path}${cause ? ` (${cause.message})` : ''}`,
      'Check the directory permissions',
      4
    );
    this.name = 'TraversalError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown when a selected file cannot be opened or read.
 *
 * The pipeline degrades the entry to a referenced-only block.
 *
 * Exit code 5: Read error
 */
export class ReadError extends CLIError {
  /** File that could not be read */
  public readonly path: string;

  /** The underlying filesystem error */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    super(
      cause ? cause.message : `Cannot read file: ${path}`,
      'Check the file permissions',
      5
    );
    this.name = 'ReadError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown when file content is not valid UTF-8 although it passed the
 * binary sample check.
 *
 * Exit code 5: Read error
 */
export class DecodeError extends CLIError {
  /** File whose content failed to decode */
  public readonly path: string;

  constructor(path: string) {
    super(
      `File is not valid UTF-8 text: ${path}`,
      'Omit the file or its extension with --omit-files / --omit',
      5
    );
    this.name = 'DecodeError';
    this.path = path;
  }
}

/**
 * Thrown when an output artifact cannot be persisted.
 *
 * Fatal. Output already written before the failure is left in place.
 *
 * Exit code 6: Write error
 */
export class WriteError extends CLIError {
  /** Destination that could not be written */
  public readonly path: string;

  /** The underlying filesystem error */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    super(
      `Cannot write output: ${path}${cause ? ` (${cause.message})` : ''}`,
      'Check that the destination is writable and has free space',
      6
    );
    this.name = 'WriteError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
