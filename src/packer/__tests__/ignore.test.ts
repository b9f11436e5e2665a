/**
 * Tests for gitignore pattern handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  IgnoreStack,
  createDefaultLayer,
  createGlobalLayer,
  createIgnoreLayer,
  loadDirectoryLayer,
  loadIgnoreFile,
  parseIgnoreContent,
  testLayer,
} from '../ignore.js';
import { ConfigError } from '../../errors/index.js';

// Mock fs module
vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('parseIgnoreContent', () => {
  it('parses simple patterns', () => {
    const content = `
node_modules
dist
*.log
`;
    expect(parseIgnoreContent(content)).toEqual(['node_modules', 'dist', '*.log']);
  });

  it('skips comment lines but keeps escaped hashes', () => {
    const content = `
# This is a comment
node_modules
\\#literal
`;
    expect(parseIgnoreContent(content)).toEqual(['node_modules', '\\#literal']);
  });

  it('preserves negation patterns starting with !', () => {
    expect(parseIgnoreContent('*.log\n!important.log\n')).toEqual(['*.log', '!important.log']);
  });

  it('handles CRLF line endings', () => {
    expect(parseIgnoreContent('build/\r\n*.tmp\r\n')).toEqual(['build/', '*.tmp']);
  });
});

describe('loadIgnoreFile', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('throws ConfigError when the file does not exist', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(() => loadIgnoreFile('/project/.customignore')).toThrow(ConfigError);
    expect(() => loadIgnoreFile('/project/.customignore')).toThrow(
      'Ignore file not found: /project/.customignore'
    );
  });

  it('loads and parses an existing file', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('# build\ndist/\n*.log\n');

    expect(loadIgnoreFile('/project/.gitignore')).toEqual(['dist/', '*.log']);
    expect(readFileSync).toHaveBeenCalledWith('/project/.gitignore', 'utf-8');
  });

  it('throws ConfigError when the file cannot be read', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('EACCES: permission denied');
    });

    expect(() => loadIgnoreFile('/project/.gitignore')).toThrow(
      'Cannot read ignore file: /project/.gitignore (EACCES: permission denied)'
    );
  });
});

describe('loadDirectoryLayer', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('returns undefined when the directory has no .gitignore', () => {
    vi.mocked(existsSync).mockReturnValue(false);
    expect(loadDirectoryLayer('/project/src')).toBeUndefined();
  });

  it('anchors the layer at the directory', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('*.tmp\n');

    const layer = loadDirectoryLayer('/project/src');

    expect(layer?.baseDir).toBe('/project/src');
    expect(layer?.source).toBe(join('/project/src', '.gitignore'));
    expect(layer && testLayer(layer, '/project/src/a.tmp', false)).toBe('ignored');
  });
});

describe('testLayer', () => {
  const layer = createIgnoreLayer('/repo', ['*.log', 'build/', '!keep.log', '/root-only.txt'], 'test');

  it('reports ignored paths', () => {
    expect(testLayer(layer, '/repo/debug.log', false)).toBe('ignored');
    expect(testLayer(layer, '/repo/deep/nested/debug.log', false)).toBe('ignored');
  });

  it('reports re-included paths', () => {
    expect(testLayer(layer, '/repo/keep.log', false)).toBe('unignored');
  });

  it('applies directory-only patterns to directories only', () => {
    expect(testLayer(layer, '/repo/build', true)).toBe('ignored');
    expect(testLayer(layer, '/repo/build', false)).toBe('undecided');
  });

  it('anchors leading-slash patterns at the base directory', () => {
    expect(testLayer(layer, '/repo/root-only.txt', false)).toBe('ignored');
    expect(testLayer(layer, '/repo/sub/root-only.txt', false)).toBe('undecided');
  });

  it('is undecided outside its base directory and for the base itself', () => {
    expect(testLayer(layer, '/elsewhere/debug.log', false)).toBe('undecided');
    expect(testLayer(layer, '/repo', true)).toBe('undecided');
  });

  it('matches names that merely start with two dots', () => {
    expect(testLayer(layer, '/repo/..old.log', false)).toBe('ignored');
    expect(testLayer(layer, '/repo/..cache/build', true)).toBe('ignored');
  });

  it('supports ** patterns', () => {
    const deep = createIgnoreLayer('/repo', ['**/tmp/'], 'test');
    expect(testLayer(deep, '/repo/a/b/tmp', true)).toBe('ignored');
  });
});

describe('createGlobalLayer', () => {
  it('anchors at the file directory when the root is inside it', () => {
    const layer = createGlobalLayer('/repo/packages/app', '/repo/.gitignore', ['*.log']);
    expect(layer.baseDir).toBe('/repo');
  });

  it('anchors at the root when the file lives elsewhere', () => {
    const layer = createGlobalLayer('/work/project', '/home/user/global-ignore', ['*.log']);
    expect(layer.baseDir).toBe('/work/project');
    expect(testLayer(layer, '/work/project/a.log', false)).toBe('ignored');
  });

  it('treats a root whose name starts with two dots as inside', () => {
    const layer = createGlobalLayer('/repo/..cache', '/repo/.gitignore', ['*.log']);
    expect(layer.baseDir).toBe('/repo');
  });
});

describe('createDefaultLayer', () => {
  const layer = createDefaultLayer('/repo');

  it('ignores common dependency and VCS directories', () => {
    expect(testLayer(layer, '/repo/node_modules', true)).toBe('ignored');
    expect(testLayer(layer, '/repo/.git', true)).toBe('ignored');
  });

  it('leaves source directories alone', () => {
    expect(testLayer(layer, '/repo/src', true)).toBe('undecided');
  });
});

describe('IgnoreStack', () => {
  const rootLayer = createIgnoreLayer('/repo', ['*.log'], 'root');
  const childLayer = createIgnoreLayer('/repo/sub', ['!keep.log'], 'child');
  const stack = new IgnoreStack().extend(rootLayer).extend(childLayer);

  it('lets the innermost deciding layer win', () => {
    expect(stack.isIgnored('/repo/sub/keep.log', false)).toBe(false);
    expect(stack.isIgnored('/repo/sub/other.log', false)).toBe(true);
  });

  it('does not apply a child layer outside its directory', () => {
    expect(stack.isIgnored('/repo/keep.log', false)).toBe(true);
  });

  it('treats undecided paths as not ignored', () => {
    expect(stack.isIgnored('/repo/main.py', false)).toBe(false);
  });

  it('returns the same stack when extended with nothing', () => {
    expect(stack.extend(undefined)).toBe(stack);
  });

  it('does not change when extended', () => {
    const base = new IgnoreStack();
    const extended = base.extend(rootLayer);
    expect(base.isEmpty).toBe(true);
    expect(extended.isEmpty).toBe(false);
    expect(extended.layers).toHaveLength(1);
  });
});
