/**
 * Tests for CLI option validation
 */

import { describe, it, expect } from 'vitest';
import {
  GlobalOptionsSchema,
  PackOptionsSchema,
  toConfigOverrides,
  validateInput,
} from '../validation.js';

describe('GlobalOptionsSchema', () => {
  it('defaults both flags to false', () => {
    expect(GlobalOptionsSchema.parse({})).toEqual({ verbose: false, json: false });
  });
});

describe('PackOptionsSchema', () => {
  it('splits comma-separated lists and drops empty entries', () => {
    const options = PackOptionsSchema.parse({ extensions: 'py, ts,,md', omitDirs: '.git' });
    expect(options.extensions).toEqual(['py', 'ts', 'md']);
    expect(options.omitDirs).toEqual(['.git']);
  });

  it('coerces numeric options', () => {
    const options = PackOptionsSchema.parse({
      depth: '0',
      maxSize: '2048',
      truncln: '120',
      truncstr: '40',
      maxlnspace: '1',
    });
    expect(options.depth).toBe(0);
    expect(options.maxSize).toBe(2048);
    expect(options.truncln).toBe(120);
    expect(options.truncstr).toBe(40);
    expect(options.maxlnspace).toBe(1);
  });

  it('rejects a non-numeric depth', () => {
    const result = validateInput(PackOptionsSchema, { depth: 'deep' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toContain('depth: --depth must be a whole number');
    }
  });

  it('rejects a zero size limit', () => {
    const result = validateInput(PackOptionsSchema, { maxSize: '0' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toEqual(['maxSize: --max-size must be at least 1']);
    }
  });

  it('rejects an output file together with an output directory', () => {
    const result = validateInput(PackOptionsSchema, { outputFile: 'a.md', outputDir: 'out' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe(
        'Validation failed:\n  outputDir: --output-file and --output-dir cannot be used together'
      );
    }
  });

  it('ignores options it does not know', () => {
    const result = validateInput(PackOptionsSchema, { printConfig: false, nocom: true });
    expect(result.success).toBe(true);
  });
});

describe('toConfigOverrides', () => {
  it('maps flags onto config keys', () => {
    const overrides = toConfigOverrides(
      PackOptionsSchema.parse({
        extensions: 'py',
        omit: 'lock',
        omitFiles: 'package-lock.json',
        whitelist: 'src,README.md',
        depth: '2',
        nocom: true,
        obeyGitignores: true,
        truncln: '80',
      })
    );
    expect(overrides).toMatchObject({
      extensions: ['py'],
      omit_extensions: ['lock'],
      omit_files: ['package-lock.json'],
      whitelist: ['src', 'README.md'],
      max_depth: 2,
      strip_comments: true,
      obey_gitignores: true,
      max_line_length: 80,
    });
  });

  it('leaves absent boolean flags undefined so config file values stand', () => {
    const overrides = toConfigOverrides(PackOptionsSchema.parse({}));
    expect(overrides.strip_comments).toBeUndefined();
    expect(overrides.obey_gitignores).toBeUndefined();
    expect(overrides.default_ignores).toBeUndefined();
    expect(overrides.max_depth).toBeUndefined();
  });
});
