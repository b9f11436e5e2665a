/**
 * Progress Reporter
 *
 * Manages progress display while a tree is packed.
 * Supports multiple output modes:
 * - Interactive: ora spinner with real-time updates
 * - JSON: a single summary object for scripts and CI
 * - Text: plain summary lines for non-TTY environments
 *
 * Everything goes to stderr; stdout is reserved for the packed document.
 *
 * Design decisions:
 * - Throttles spinner updates to prevent flickering (100ms minimum)
 * - Truncates file paths to fit terminal width
 * - Respects NO_COLOR environment variable
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { Classification, PackResult, PathEntry } from '../../packer/types.js';
import type { WriteSummary } from '../../packer/assembler.js';

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Report the summary as JSON instead of human-readable text */
  json: boolean;

  /** Show warnings and per-run details */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether to show a spinner (stderr is a TTY and stdout is not the output) */
  isInteractive: boolean;
}

/**
 * Everything the final summary reports.
 */
export interface PackSummary {
  /** Pipeline result */
  result: PackResult;

  /** What the assembler wrote */
  written: WriteSummary;

  /** Output file or directory; undefined for stdout */
  destination?: string;
}

/**
 * ProgressReporter manages all progress display during a pack run.
 *
 * Usage:
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, verbose: false, ... });
 *
 * reporter.start('/path/to/project');
 * reporter.updateProgress(entry, classification);
 * reporter.complete();
 *
 * reporter.showSummary({ result, written, destination });
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private processed: number = 0;
  private lastUpdateTime: number = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    // Apply NO_COLOR if set
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start reporting a run.
   */
  start(rootPath: string): void {
    this.processed = 0;

    if (this.options.json || !this.options.isInteractive) {
      return;
    }

    this.spinner?.stop();
    this.spinner = ora({
      text: `Packing ${rootPath}...`,
      prefixText: chalk.cyan('Packing'.padEnd(10)),
      stream: process.stderr,
    }).start();
  }

  /**
   * Record one classified file.
   */
  updateProgress(entry: PathEntry, classification: Classification): void {
    this.processed++;

    if (!this.spinner) return;

    // Throttle updates to prevent flickering
    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const progressText = `${this.processed} files`;
    const label = classification.disposition === 'rendered' ? '' : ` (${classification.disposition})`;
    this.spinner.text = `${progressText.padEnd(12)} ${chalk.dim(this.truncatePath(entry.relativePath) + label)}`;
  }

  /**
   * Number of files reported so far.
   */
  get processedCount(): number {
    return this.processed;
  }

  /**
   * Mark the run as complete.
   */
  complete(): void {
    this.spinner?.succeed(`${this.processed.toLocaleString()} files processed`);
    this.spinner = null;
  }

  /**
   * Mark the run as failed.
   */
  fail(message: string): void {
    this.spinner?.fail(message);
    this.spinner = null;
  }

  /**
   * Display the final summary.
   */
  showSummary(summary: PackSummary): void {
    const { result, written, destination } = summary;

    if (this.options.json) {
      console.error(
        JSON.stringify({
          rootPath: result.rootPath,
          destination: destination ?? null,
          stats: result.stats,
          filesWritten: written.filesWritten,
          characters: written.characters,
          collisions: written.collisions,
          warnings: result.warnings,
        })
      );
      return;
    }

    const { stats } = result;
    const duration = this.formatDuration(stats.durationMs);

    console.error(
      chalk.green('✓ ') +
        `Packed ${stats.rendered.toLocaleString()} files` +
        chalk.dim(
          ` (${stats.referenced} referenced, ${stats.excluded} excluded) in ${duration}`
        )
    );

    if (destination) {
      console.error(`  ${chalk.dim('Output:')}  ${destination}`);
    }
    console.error(`  ${chalk.dim('Size:')}    ${this.formatBytes(written.characters)}`);

    if (written.collisions.length > 0) {
      console.error(
        chalk.yellow(`  ${written.collisions.length} output file(s) overwritten by a later file`)
      );
      if (this.options.verbose) {
        for (const name of written.collisions) {
          console.error(chalk.dim(`    - ${name}`));
        }
      }
    }

    // Warnings were already printed as they happened
    if (result.warnings.length > 0) {
      console.error(chalk.yellow(`  ${result.warnings.length} warning(s) during packing`));
    }
  }

  /**
   * Truncate a file path to fit display width.
   */
  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }

    // Take the last MAX_PATH_LENGTH - 3 characters and prefix with ...
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }

  /**
   * Format milliseconds as human-readable duration.
   */
  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }

  /**
   * Format a character count as a human-readable size.
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) {
      return `${bytes} B`;
    }
    if (bytes < 1024 * 1024) {
      return `${(bytes / 1024).toFixed(1)} KB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
}

/**
 * Create a ProgressReporter with sensible defaults.
 *
 * @param options - Partial options (defaults will be applied)
 * @returns Configured ProgressReporter instance
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stderr.isTTY ?? false),
  });
}
