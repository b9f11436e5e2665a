/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No .tree2md.toml exists
 * 2. The config file or the command line leave a field unset
 *
 * The loader merges the config file and then the flags ON TOP of these.
 */

import type { PackConfig } from './schema.js';

/** Default size limit: 100 KB */
export const DEFAULT_MAX_SIZE = 100 * 1024;

/** Config file looked up in the scan root when --config is not given */
export const CONFIG_FILE_NAME = '.tree2md.toml';

/**
 * Default configuration
 *
 * Everything is included and nothing is transformed: every extension is
 * rendered, no directory is skipped and no ignore file applies.
 */
export const DEFAULT_CONFIG: PackConfig = {
  omit_extensions: [],
  omit_files: [],
  omit_dirs: [],
  max_size: DEFAULT_MAX_SIZE,
  obey_gitignores: false,
  default_ignores: false,
  strip_comments: false,
};

/**
 * Example config file, shown by `tree2md --print-config`
 */
export const CONFIG_TEMPLATE = `# tree2md configuration
# Location: <directory>/${CONFIG_FILE_NAME}, or pass --config <path>
# Command-line flags override every value here.

# Only render these extensions (default: all)
# extensions = ["ts", "py", "md"]

# Note these in the output without their content
omit_extensions = []          # e.g. ["lock", "svg"]
omit_files = []               # e.g. ["package-lock.json"]

# Never traverse these directories
omit_dirs = []                # e.g. [".git", "node_modules"]

# Restrict traversal / inclusion (unset = no restriction)
# whitelist_files = ["main.py"]
# whitelist_dirs = ["src"]
# whitelist = ["src", "README.md"]

# max_depth = 2               # 0 = files directly in the root only
max_size = ${DEFAULT_MAX_SIZE}              # bytes; larger files are referenced only

# Ignore patterns
# gitignore = ".gitignore"    # global gitignore-style file
obey_gitignores = false       # apply .gitignore files found while walking
default_ignores = false       # built-in patterns for VCS, dependencies, build output

# Content transforms
strip_comments = false
# max_line_length = 200
# max_string_length = 80
# max_blank_lines = 1
`;
