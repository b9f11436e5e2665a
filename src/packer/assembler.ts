/**
 * Output Assembler
 *
 * Writes rendered blocks in one of three mutually exclusive forms:
 * - single: one document in a file
 * - multi: one document per block in a directory
 * - stream: one document to a writable stream (stdout by default)
 *
 * Blocks stay structured until this step. Multi-document output writes each
 * block on its own and never re-splits flattened text, so content that looks
 * like a header cannot break the split.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { WriteError, toError } from '../errors/index.js';
import type { RenderedBlock } from './types.js';

/**
 * Minimal writable sink for stream mode (process.stdout satisfies it).
 */
export interface OutputSink {
  write(chunk: string): boolean;
}

/**
 * Where the output goes.
 */
export type OutputTarget =
  | { mode: 'single'; file: string }
  | { mode: 'multi'; directory: string }
  | { mode: 'stream'; stream?: OutputSink };

/**
 * Summary of what was written.
 */
export interface WriteSummary {
  /** Files written (0 for stream mode) */
  filesWritten: number;

  /** Characters of Markdown produced */
  characters: number;

  /** Multi-document units overwritten by a later block with the same name */
  collisions: string[];
}

/** Characters that are unsafe in file names on common filesystems */
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/** Replacement for each unsafe character */
export const FILENAME_SUBSTITUTE = '_';

/**
 * Concatenate blocks into one document, one blank line between blocks.
 */
export function assembleDocument(blocks: readonly RenderedBlock[]): string {
  return blocks.map((block) => block.text).join('\n');
}

/**
 * Make a relative path usable as a flat file name.
 *
 * @example
 * sanitizeFileName('src/app:main.ts') // => 'src_app_main.ts'
 */
export function sanitizeFileName(relativePath: string): string {
  return relativePath.replace(UNSAFE_FILENAME_CHARS, FILENAME_SUBSTITUTE);
}

/**
 * Name of the multi-document unit for a block.
 */
export function unitFileName(block: RenderedBlock): string {
  return `${sanitizeFileName(block.entry.relativePath)}.md`;
}

/**
 * Write blocks to the target.
 *
 * In multi mode, distinct paths that sanitize to the same name overwrite
 * each other; the later block wins and the name is listed in `collisions`.
 *
 * @throws WriteError on any failure; output already written stays in place
 */
export function writeOutput(
  blocks: readonly RenderedBlock[],
  target: OutputTarget
): WriteSummary {
  switch (target.mode) {
    case 'single': {
      const document = assembleDocument(blocks);
      const file = resolve(target.file);
      writeFile(file, document, true);
      return { filesWritten: 1, characters: document.length, collisions: [] };
    }

    case 'multi': {
      const directory = resolve(target.directory);
      try {
        mkdirSync(directory, { recursive: true });
      } catch (error) {
        throw new WriteError(directory, toError(error));
      }

      const written = new Set<string>();
      const collisions: string[] = [];
      let characters = 0;

      for (const block of blocks) {
        const name = unitFileName(block);
        if (written.has(name)) {
          collisions.push(name);
        }
        writeFile(join(directory, name), block.text, false);
        written.add(name);
        characters += block.text.length;
      }

      return { filesWritten: written.size, characters, collisions };
    }

    case 'stream': {
      const document = assembleDocument(blocks);
      const stream = target.stream ?? process.stdout;
      try {
        stream.write(document);
      } catch (error) {
        throw new WriteError('<stdout>', toError(error));
      }
      return { filesWritten: 0, characters: document.length, collisions: [] };
    }
  }
}

function writeFile(path: string, content: string, createParent: boolean): void {
  try {
    if (createParent) {
      mkdirSync(dirname(path), { recursive: true });
    }
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    throw new WriteError(path, toError(error));
  }
}
