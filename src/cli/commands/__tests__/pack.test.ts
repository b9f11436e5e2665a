/**
 * Tests for the pack command
 *
 * Runs the command against real temporary directories and captures what is
 * written to stdout.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createPackCommand } from '../pack.js';
import type { CommandContext } from '../../types.js';
import { CONFIG_TEMPLATE } from '../../../config/index.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';

describe('createPackCommand', () => {
  let mockContext: CommandContext;
  let rootDir: string;
  let outDir: string;
  let stdout: string[];

  beforeEach(() => {
    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    rootDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tree2md-pack-')));
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tree2md-out-'));
    fs.writeFileSync(path.join(rootDir, 'a.py'), 'x = 1  # note\n');
    fs.writeFileSync(path.join(rootDir, 'b.txt'), 'hello\n');

    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(rootDir, { recursive: true, force: true });
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  function run(...args: string[]): Promise<Command> {
    const program = new Command();
    program.addCommand(createPackCommand(() => mockContext), { isDefault: true });
    return program.parseAsync(['node', 'tree2md', ...args]);
  }

  describe('command structure', () => {
    it('creates command with correct name', () => {
      const cmd = createPackCommand(() => mockContext);
      expect(cmd.name()).toBe('pack');
    });

    it('has description', () => {
      const cmd = createPackCommand(() => mockContext);
      expect(cmd.description()).toBe('Pack a directory tree into Markdown');
    });
  });

  describe('stdout output', () => {
    it('prints the packed document', async () => {
      await run(rootDir);

      expect(stdout.join('')).toBe(
        '**a.py**\n```python\nx = 1  # note\n```\n' +
          '\n' +
          '**b.txt**\n```text\nhello\n```\n'
      );
    });

    it('runs as the default command and by name', async () => {
      await run('pack', rootDir);
      expect(stdout.join('')).toContain('**b.txt**\n');
    });

    it('strips comments with --nocom', async () => {
      await run(rootDir, '--nocom');
      expect(stdout.join('')).toContain('**a.py**\n```python\nx = 1\n```\n');
    });

    it('references omitted extensions', async () => {
      await run(rootDir, '--omit', 'txt');
      expect(stdout.join('')).toContain('**b.txt** (Source omitted to save space)\n');
    });

    it('applies the config file in the root', async () => {
      fs.writeFileSync(path.join(rootDir, '.tree2md.toml'), 'omit_files = ["b.txt"]\n');
      await run(rootDir);
      expect(stdout.join('')).toContain('**b.txt** (Source omitted to save space)\n');
    });

    it('lets flags override the config file', async () => {
      fs.writeFileSync(path.join(rootDir, '.tree2md.toml'), 'extensions = ["txt"]\n');
      await run(rootDir, '--extensions', 'py');
      const output = stdout.join('');
      expect(output).toContain('**a.py**\n');
      expect(output).not.toContain('**b.txt**');
    });
  });

  describe('file output', () => {
    it('writes one document with --output-file', async () => {
      const outFile = path.join(outDir, 'packed.md');
      await run(rootDir, '-o', outFile);

      expect(fs.readFileSync(outFile, 'utf-8')).toBe(
        '**a.py**\n```python\nx = 1  # note\n```\n\n**b.txt**\n```text\nhello\n```\n'
      );
      expect(stdout).toEqual([]);
    });

    it('writes one document per file with --output-dir', async () => {
      await run(rootDir, '-d', outDir);

      expect(fs.readdirSync(outDir).sort()).toEqual(['a.py.md', 'b.txt.md']);
      expect(fs.readFileSync(path.join(outDir, 'b.txt.md'), 'utf-8')).toBe(
        '**b.txt**\n```text\nhello\n```\n'
      );
    });

    it('warns when the output is inside the scanned directory', async () => {
      await run(rootDir, '-o', path.join(rootDir, 'packed.md'));
      expect(mockContext.warn).toHaveBeenCalledWith(
        `Output ${path.join(rootDir, 'packed.md')} is inside the scanned directory and will be packed by later runs`
      );
    });
  });

  describe('errors', () => {
    it('throws FileNotFoundError for a missing directory', async () => {
      await expect(run(path.join(rootDir, 'missing'))).rejects.toThrow(FileNotFoundError);
    });

    it('throws ValidationError for conflicting outputs', async () => {
      await expect(run(rootDir, '-o', 'a.md', '-d', outDir)).rejects.toThrow(ValidationError);
    });

    it('throws ValidationError for a non-numeric depth', async () => {
      await expect(run(rootDir, '--depth', 'deep')).rejects.toThrow(ValidationError);
    });
  });

  it('prints the config template with --print-config', async () => {
    await run('--print-config');
    expect(stdout.join('')).toBe(CONFIG_TEMPLATE);
  });
});
