/**
 * Error handling module for tree2md
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: tree2md --help');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  TraversalError,
  ReadError,
  DecodeError,
  WriteError,
  toError,
} from './types.js';

// Error handling utilities
export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorKind,
  type ErrorReport,
} from './handler.js';
