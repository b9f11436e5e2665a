/**
 * Pack Command
 *
 * Packs a directory tree into Markdown. This is the default command, so
 * `tree2md <dir>` and `tree2md pack <dir>` are the same.
 *
 * Usage:
 *   tree2md ./project                      Markdown to stdout
 *   tree2md ./project -o project.md        One document
 *   tree2md ./project -d packed/           One document per file
 *   tree2md . --omit-dirs .git --nocom     Skip .git, strip comments
 *
 * The run:
 * 1. Validate flags and the scan root
 * 2. Load config (defaults <- .tree2md.toml <- flags) and resolve rules
 * 3. Walk, classify, transform and render every file
 * 4. Write the output and report a summary on stderr
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { PackOptionsSchema, toConfigOverrides, validateInput, type PackOptionsInput } from '../validation.js';
import { createProgressReporter } from '../utils/progress.js';
import { CONFIG_TEMPLATE, loadConfig, resolveRuleSet } from '../../config/index.js';
import {
  runPackPipeline,
  writeOutput,
  type OutputTarget,
  type PackResult,
  type WriteSummary,
} from '../../packer/index.js';
import { validateOutputPath, validateScanRoot } from '../../utils/path-validation.js';
import { CLIError, FileNotFoundError, ValidationError } from '../../errors/index.js';

/**
 * Command-specific options, as Commander hands them over.
 */
interface PackCommandOptions extends PackOptionsInput {
  printConfig?: boolean;
}

/**
 * Create the pack command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createPackCommand(
  getContext: () => CommandContext
): Command {
  return new Command('pack')
    .argument('[directory]', 'Directory to pack', '.')
    .description('Pack a directory tree into Markdown')
    .option('-o, --output-file <file>', 'Write one Markdown document to this file')
    .option('-d, --output-dir <dir>', 'Write one Markdown document per file into this directory')
    .option('-c, --config <file>', 'Config file (default: <directory>/.tree2md.toml)')
    .option('--extensions <list>', 'Only render these extensions (comma-separated)')
    .option('--omit <list>', 'Note these extensions without their content')
    .option('--omit-files <list>', 'Note these file names without their content')
    .option('--omit-dirs <list>', 'Never traverse these directory names')
    .option('--whitelist-files <list>', 'Only include files with these names')
    .option('--whitelist-dirs <list>', 'Only traverse directories with these names')
    .option('--whitelist <list>', 'Only process these directory/file names or relative paths')
    .option('--depth <n>', 'Deepest directory level to enter (0 = root files only)')
    .option('--max-size <bytes>', 'Reference files larger than this instead of rendering them')
    .option('--gitignore <file>', 'Apply a global gitignore-style file')
    .option('--obey-gitignores', 'Apply .gitignore files found while walking')
    .option('--default-ignores', 'Apply built-in patterns for VCS, dependency and build directories')
    .option('--nocom', 'Strip comments')
    .option('--truncln <n>', 'Truncate lines longer than n characters')
    .option('--truncstr <n>', 'Truncate string literals longer than n characters')
    .option('--maxlnspace <n>', 'Keep at most n consecutive blank lines')
    .option('--print-config', 'Print an example .tree2md.toml and exit')
    .action((directory: string, cmdOptions: PackCommandOptions) => {
      const ctx = getContext();

      if (cmdOptions.printConfig) {
        process.stdout.write(CONFIG_TEMPLATE);
        return;
      }

      const validation = validateInput(PackOptionsSchema, cmdOptions);
      if (!validation.success) {
        throw new ValidationError('Invalid options', validation.issues);
      }
      const options = validation.data;

      // Scan root
      const rootCheck = validateScanRoot(directory);
      if (!rootCheck.valid) {
        if (rootCheck.reason === 'missing') {
          throw new FileNotFoundError(directory);
        }
        throw new CLIError(rootCheck.error, rootCheck.hint);
      }
      const rootPath = rootCheck.normalizedPath;
      rootCheck.warnings.forEach((warning) => ctx.debug(warning));

      // Output target
      let target: OutputTarget = { mode: 'stream' };
      const destination = options.outputFile ?? options.outputDir;
      if (destination) {
        const outputCheck = validateOutputPath(destination, rootPath);
        if (!outputCheck.valid) {
          throw new CLIError(outputCheck.error, outputCheck.hint);
        }
        outputCheck.warnings.forEach((warning) => ctx.warn(warning));
        target = options.outputDir
          ? { mode: 'multi', directory: outputCheck.normalizedPath }
          : { mode: 'single', file: outputCheck.normalizedPath };
      }

      // Config and rules
      const config = loadConfig({
        rootPath,
        configPath: options.config,
        overrides: toConfigOverrides(options),
      });
      const rules = resolveRuleSet(config);

      ctx.debug(`Packing: ${rootPath}`);
      ctx.debug(`Output: ${destination ?? '<stdout>'} (${target.mode})`);
      ctx.debug(`Max size: ${rules.maxSize} bytes, depth: ${rules.maxDepth ?? 'unlimited'}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: target.mode !== 'stream' && (process.stderr.isTTY ?? false),
      });

      reporter.start(rootPath);

      let result: PackResult;
      let written: WriteSummary;
      try {
        result = runPackPipeline(rootPath, rules, {
          logger: ctx,
          onEntry: (entry, classification) => reporter.updateProgress(entry, classification),
        });
        written = writeOutput(result.blocks, target);
      } catch (error) {
        reporter.fail('Packing failed');
        throw error;
      }
      reporter.complete();

      if (target.mode !== 'stream' || ctx.options.verbose || ctx.options.json) {
        reporter.showSummary({ result, written, destination });
      }
    });
}
