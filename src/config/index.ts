/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export { PackConfigSchema, PartialPackConfigSchema } from './schema.js';
export type { PackConfig, PartialPackConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, DEFAULT_MAX_SIZE, CONFIG_FILE_NAME, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, loadConfigFile, findConfigFile, mergeConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';

// Rule resolution
export { resolveRuleSet } from './rules.js';
