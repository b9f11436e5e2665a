/**
 * Tests for file classification
 */

import { describe, it, expect, vi } from 'vitest';
import { classifyEntry } from '../classifier.js';
import type { SampleReader } from '../binary.js';
import { makeEntry, makeRules } from './helpers.js';

const textReader: SampleReader = () => new TextEncoder().encode('plain text');
const binaryReader: SampleReader = () => Uint8Array.of(0x89, 0x50, 0x00, 0x47);

describe('classifyEntry', () => {
  it('renders a plain text file when no rule applies', () => {
    expect(classifyEntry(makeEntry('main.py'), makeRules(), textReader)).toEqual({
      disposition: 'rendered',
    });
  });

  it('references files in the omit list', () => {
    const rules = makeRules({ omitFiles: new Set(['package-lock.json']) });
    expect(classifyEntry(makeEntry('package-lock.json'), rules, textReader)).toEqual({
      disposition: 'referenced',
      reason: 'omitted-file',
    });
  });

  it('lets the extension omit list win over the allow-list', () => {
    const rules = makeRules({ omitExtensions: new Set(['json']), extensions: new Set(['json']) });
    expect(classifyEntry(makeEntry('data.json'), rules, textReader)).toEqual({
      disposition: 'referenced',
      reason: 'omitted-extension',
    });
  });

  it('lets the file omit list win over the allow-list', () => {
    const sampleReader = vi.fn(textReader);
    const rules = makeRules({ extensions: new Set(['py']), omitFiles: new Set(['main.py']) });
    expect(classifyEntry(makeEntry('main.py'), rules, sampleReader)).toEqual({
      disposition: 'referenced',
      reason: 'omitted-file',
    });
    expect(sampleReader).not.toHaveBeenCalled();
  });

  it('lets the omit lists win over the whitelists', () => {
    const rules = makeRules({
      omitFiles: new Set(['main.py']),
      whitelistFiles: new Set(['main.py']),
    });
    expect(classifyEntry(makeEntry('main.py'), rules, textReader).disposition).toBe('referenced');
  });

  it('excludes files outside the file whitelist', () => {
    const rules = makeRules({ whitelistFiles: new Set(['main.py']) });
    expect(classifyEntry(makeEntry('other.py'), rules, textReader)).toEqual({
      disposition: 'excluded',
      reason: 'not-whitelisted',
    });
    expect(classifyEntry(makeEntry('src/main.py'), rules, textReader).disposition).toBe('rendered');
  });

  it('matches the combined whitelist by relative path', () => {
    const rules = makeRules({ whitelist: new Set(['src/main.py']) });
    expect(classifyEntry(makeEntry('src/main.py'), rules, textReader).disposition).toBe('rendered');
    expect(classifyEntry(makeEntry('lib/main.py'), rules, textReader).disposition).toBe('excluded');
  });

  it('excludes extensions outside the allow-list', () => {
    const rules = makeRules({ extensions: new Set(['py']) });
    expect(classifyEntry(makeEntry('notes.md'), rules, textReader)).toEqual({
      disposition: 'excluded',
      reason: 'extension-not-allowed',
    });
    expect(classifyEntry(makeEntry('Makefile'), rules, textReader).disposition).toBe('excluded');
  });

  it('references files over the size limit without reading them', () => {
    const reader = vi.fn(textReader);
    const rules = makeRules({ maxSize: 100 });

    expect(classifyEntry(makeEntry('big.txt', { size: 200 }), rules, reader)).toEqual({
      disposition: 'referenced',
      reason: 'too-large',
    });
    expect(reader).not.toHaveBeenCalled();
  });

  it('renders files exactly at the size limit', () => {
    const rules = makeRules({ maxSize: 100 });
    expect(classifyEntry(makeEntry('edge.txt', { size: 100 }), rules, textReader).disposition).toBe(
      'rendered'
    );
  });

  it('references binary files even when whitelisted', () => {
    const rules = makeRules({
      whitelistFiles: new Set(['logo.png']),
      extensions: new Set(['png']),
    });
    expect(classifyEntry(makeEntry('logo.png'), rules, binaryReader)).toEqual({
      disposition: 'referenced',
      reason: 'binary',
    });
  });

  it('classifies a mixed directory', () => {
    const rules = makeRules({
      omitDirs: new Set(['.git']),
      omitExtensions: new Set(['env']),
    });
    const readers: Record<string, SampleReader> = {
      'a.py': textReader,
      'b.bin': () => Uint8Array.of(1, 2, 3, 0, 5),
      'secrets.env': textReader,
    };

    const dispositions = Object.entries(readers).map(([name, reader]) =>
      classifyEntry(makeEntry(name, { size: 50 }), rules, reader)
    );

    expect(dispositions).toEqual([
      { disposition: 'rendered' },
      { disposition: 'referenced', reason: 'binary' },
      { disposition: 'referenced', reason: 'omitted-extension' },
    ]);
  });
});
