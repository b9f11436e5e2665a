/**
 * Logger Interface for Library Code
 *
 * Library code (the packing pipeline) accepts a Logger via dependency
 * injection. The CLI passes its CommandContext, which satisfies this
 * interface; tests pass silentLogger or a vi.fn()-backed mock.
 */

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default logger when none is injected.
 *
 * Writes warnings to stderr, since stdout may carry the packed document.
 * Debug output is dropped.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
