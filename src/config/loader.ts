/**
 * Configuration Loader
 *
 * Handles the config lifecycle for one run:
 * 1. Find the config file (--config, else <root>/.tree2md.toml)
 * 2. Parse TOML and validate with the Zod schema
 * 3. Merge: defaults <- config file <- command-line overrides
 * 4. Validate the merged result
 *
 * Every failure is a ConfigError: a run never starts on a partial config.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';

import { PackConfigSchema, PartialPackConfigSchema, type PackConfig, type PartialPackConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './defaults.js';
import { ConfigError, toError } from '../errors/index.js';

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Scan root, searched for .tree2md.toml */
  rootPath: string;

  /** Explicit config file; must exist when given */
  configPath?: string;

  /** Values from the command line (highest priority) */
  overrides?: PartialPackConfig;
}

/**
 * Path of the config file in the scan root, if there is one
 */
export function findConfigFile(rootPath: string): string | undefined {
  const candidate = path.join(rootPath, CONFIG_FILE_NAME);
  return fs.existsSync(candidate) ? candidate : undefined;
}

/**
 * Read, parse and validate a config file
 *
 * A relative `gitignore` in the file is resolved against the file's own
 * directory, so the file means the same thing from any working directory.
 *
 * @throws ConfigError if the file is missing, unreadable, invalid TOML, or
 * fails validation
 */
export function loadConfigFile(configPath: string): PartialPackConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${configPath}`,
      'Check the --config path'
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file: ${configPath} (${toError(error).message})`,
      'Check the file permissions'
    );
  }

  let parsed: unknown;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = PartialPackConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validationResult.error)}`,
      'Run: tree2md --print-config  to see the valid keys'
    );
  }

  const config = validationResult.data;
  if (config.gitignore !== undefined) {
    config.gitignore = path.resolve(path.dirname(configPath), config.gitignore);
  }
  return config;
}

/**
 * Merge partial configs over a base, left to right
 *
 * Fields that are undefined in an override leave the earlier value in place.
 * Lists replace rather than concatenate.
 *
 * @throws ConfigError if the merged result is invalid
 */
export function mergeConfig(
  base: PackConfig,
  ...overrides: Array<PartialPackConfig | undefined>
): PackConfig {
  const merged: Record<string, unknown> = { ...base };

  for (const override of overrides) {
    if (!override) continue;
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const validationResult = PackConfigSchema.safeParse(merged);
  if (!validationResult.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(validationResult.error)}`);
  }
  return validationResult.data;
}

/**
 * Load the effective configuration for a run
 *
 * @throws ConfigError
 */
export function loadConfig(options: LoadConfigOptions): PackConfig {
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : findConfigFile(options.rootPath);

  const fileConfig = configPath ? loadConfigFile(configPath) : undefined;

  return mergeConfig(DEFAULT_CONFIG, fileConfig, options.overrides);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}
