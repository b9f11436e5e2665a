/**
 * Error reporting for the CLI
 *
 * Every failure is first reduced to an ErrorReport (what kind of failure,
 * which path, which option issues), then printed as text or JSON. Reports
 * always go to stderr: in stream mode stdout carries the artifact.
 */

import chalk from 'chalk';
import {
  CLIError,
  ConfigError,
  DecodeError,
  FileNotFoundError,
  ReadError,
  TraversalError,
  ValidationError,
  WriteError,
} from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Include underlying causes and stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Which stage of a run failed.
 */
export type ErrorKind =
  | 'usage'
  | 'validation'
  | 'config'
  | 'not-found'
  | 'traversal'
  | 'read'
  | 'decode'
  | 'write'
  | 'internal';

/**
 * Structured description of a failure, also the JSON output shape.
 */
export interface ErrorReport {
  kind: ErrorKind;
  message: string;
  code: number;
  hint?: string;
  /** File or directory the failure concerns */
  path?: string;
  /** Individual option problems (validation only) */
  issues?: string[];
  /** Message of the underlying error (verbose only) */
  cause?: string;
  stack?: string;
}

const KIND_LABELS: Record<ErrorKind, string> = {
  usage: 'Error',
  validation: 'Invalid options',
  config: 'Configuration error',
  'not-found': 'Not found',
  traversal: 'Traversal error',
  read: 'Read error',
  decode: 'Decode error',
  write: 'Write error',
  internal: 'Unexpected error',
};

const VERBOSE_HINT = 'Run with --verbose for more details';

function kindOf(error: CLIError): ErrorKind {
  if (error instanceof ValidationError) return 'validation';
  if (error instanceof ConfigError) return 'config';
  if (error instanceof FileNotFoundError) return 'not-found';
  if (error instanceof TraversalError) return 'traversal';
  if (error instanceof ReadError) return 'read';
  if (error instanceof DecodeError) return 'decode';
  if (error instanceof WriteError) return 'write';
  return 'usage';
}

function pathOf(error: CLIError): string | undefined {
  if (
    error instanceof TraversalError ||
    error instanceof ReadError ||
    error instanceof DecodeError ||
    error instanceof WriteError
  ) {
    return error.path;
  }
  return undefined;
}

/**
 * Reduce any thrown value to an ErrorReport.
 */
export function describeError(error: unknown, verbose = false): ErrorReport {
  if (error instanceof CLIError) {
    const report: ErrorReport = {
      kind: kindOf(error),
      message: error.message,
      code: error.code,
      hint: error.hint,
      path: pathOf(error),
    };
    if (error instanceof ValidationError && error.issues.length > 0) {
      report.issues = [...error.issues];
    }
    if (verbose) {
      report.cause = error.cause instanceof Error ? error.cause.message : undefined;
      report.stack = error.stack;
    }
    return report;
  }

  if (error instanceof Error) {
    return {
      kind: 'internal',
      message: error.message,
      code: 1,
      hint: verbose ? undefined : VERBOSE_HINT,
      stack: verbose ? error.stack : undefined,
    };
  }

  return { kind: 'internal', message: String(error), code: 1 };
}

/**
 * Format an error for display.
 *
 * @example
 * formatError(new WriteError('/out/pack.md'))
 * // Write error: Cannot write output: /out/pack.md
 * // Hint: Check that the destination is writable and has free space
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const report = describeError(error, verbose);

  if (json) {
    return JSON.stringify(report, null, 2);
  }

  const lines = [chalk.red(`${KIND_LABELS[report.kind]}: `) + report.message];

  // Read errors carry the OS message; name the file separately
  if (report.path && !report.message.includes(report.path)) {
    lines.push(chalk.dim('Path: ') + report.path);
  }
  if (report.hint) {
    lines.push(chalk.dim('Hint: ') + report.hint);
  }
  if (report.cause) {
    lines.push(chalk.dim('Caused by: ') + report.cause);
  }
  if (report.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(report.stack));
  }

  return lines.join('\n');
}

/**
 * Exit code for an error: the CLIError's own code, otherwise 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Report the error on stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for 'uncaughtException' and 'unhandledRejection'.
 * Options are captured at setup time.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
