#!/usr/bin/env node
/**
 * tree2md CLI Entry Point
 *
 * This is the main entry point for the `tree2md` command.
 * It sets up Commander.js with global options and registers the pack command
 * as the default, so `tree2md <dir>` packs a directory directly.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createPackCommand } from './commands/pack.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli)
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
  );
  const parsed = z.object({ version: z.string() }).safeParse(packageJson);
  return parsed.success ? parsed.data.version : '0.0.0';
}

// Create the root program
const program = new Command();

// Configure the program
program
  .name('tree2md')
  .description('Pack a directory tree into Markdown for reading, review or LLM context')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to every command
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Report the summary and errors as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('tree2md ./my-project')}                          Print Markdown to stdout
  ${chalk.cyan('tree2md ./my-project -o project.md')}            Write one document
  ${chalk.cyan('tree2md ./my-project -d packed/')}               Write one document per file
  ${chalk.cyan('tree2md . --omit-dirs .git,node_modules')}       Skip directories
  ${chalk.cyan('tree2md . --extensions ts,md --nocom')}          Only TypeScript and Markdown, no comments
  ${chalk.cyan('tree2md pack --help')}                           Show every packing option
`);

/**
 * Create a command context with logging utilities
 * This is passed to the command handler
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.error(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ warning: message }));
      } else {
        console.error(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// Pack command - the default when no command name is given
program.addCommand(createPackCommand(() => createContext(getGlobalOptions())), {
  isDefault: true,
});

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Set up global error handlers for uncaught exceptions
  // These catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
