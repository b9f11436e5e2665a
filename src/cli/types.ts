/**
 * Global CLI options
 * Parsed at the root level and passed down to the command handler
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Report the summary and errors as JSON instead of human-readable text */
  json: boolean;
}

/**
 * Context passed to command handlers
 * Combines parsed options with runtime utilities.
 *
 * Everything here writes to stderr: stdout may carry the packed document.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Log a message (suppressed by --json) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Log a warning */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
}
