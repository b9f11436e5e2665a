/**
 * Path Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync, symlinkSync, realpathSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { validateScanRoot, validateOutputPath } from '../path-validation.js';

// ============================================================================
// Test Setup
// ============================================================================

let testDir: string;

function createTestDir(name: string): string {
  const dir = join(testDir, name);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function createTestFile(name: string, content = ''): string {
  const file = join(testDir, name);
  writeFileSync(file, content);
  return file;
}

// ============================================================================
// Tests
// ============================================================================

describe('validateScanRoot', () => {
  beforeEach(() => {
    // On macOS /var -> /private/var, so compare against the real path
    testDir = realpathSync(mkdtempSync(join(tmpdir(), 'tree2md-paths-')));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns valid for an existing directory', () => {
    const dir = createTestDir('project');
    const result = validateScanRoot(dir);

    expect(result).toEqual({ valid: true, normalizedPath: dir, warnings: [] });
  });

  it('reports a missing path', () => {
    const result = validateScanRoot(join(testDir, 'nope'));

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.reason).toBe('missing');
      expect(result.error).toBe(`Path does not exist: ${join(testDir, 'nope')}`);
    }
  });

  it('rejects a file', () => {
    const file = createTestFile('notes.txt', 'hello');
    const result = validateScanRoot(file);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.reason).toBe('not-directory');
      expect(result.error).toBe(`Path is not a directory: ${file}`);
    }
  });

  it('resolves symlinks and warns about them', () => {
    const target = createTestDir('real');
    const link = join(testDir, 'link');
    symlinkSync(target, link);

    const result = validateScanRoot(link);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.normalizedPath).toBe(target);
      expect(result.warnings).toEqual([`Symlink resolved: ${link} -> ${target}`]);
    }
  });
});

describe('validateOutputPath', () => {
  it('accepts a destination outside the root', () => {
    const result = validateOutputPath('/tmp/out/bundle.md', '/work/project');

    expect(result).toEqual({
      valid: true,
      normalizedPath: '/tmp/out/bundle.md',
      warnings: [],
    });
  });

  it('warns when the destination is inside the root', () => {
    const result = validateOutputPath('/work/project/docs/bundle.md', '/work/project');

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.warnings).toEqual([
        'Output /work/project/docs/bundle.md is inside the scanned directory and will be packed by later runs',
      ]);
    }
  });

  it('does not treat a sibling with a shared prefix as inside', () => {
    const result = validateOutputPath('/work/project-out.md', '/work/project');

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.warnings).toEqual([]);
    }
  });

  it('rejects the scan root itself', () => {
    const result = validateOutputPath('/work/project/', '/work/project');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.reason).toBe('inside-root');
    }
  });
});
