/**
 * Content Transformer
 *
 * Applies the configured text transforms to a rendered file, always in this
 * order:
 *
 * 1. Comment stripping (by extension)
 * 2. String literal truncation
 * 3. Line truncation
 * 4. Blank-line collapsing
 *
 * Every step is lexical. The regex-based comment and string handling lives
 * behind this module so it can be swapped per language without touching
 * traversal or classification.
 */

import { DecodeError } from '../../errors/index.js';
import type { TransformConfig } from '../types.js';
import { stripComments } from './comments.js';
import { truncateStrings } from './strings.js';
import { collapseBlankLines, normalizeLineEndings, truncateLines } from './lines.js';

export { stripComments, getCommentStyle, COMMENT_STYLES, type CommentStyle } from './comments.js';
export { truncateStrings, STRING_TRUNCATION_MARKER } from './strings.js';
export {
  truncateLines,
  collapseBlankLines,
  normalizeLineEndings,
  LINE_TRUNCATION_MARKER,
} from './lines.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes as UTF-8.
 *
 * @param path - Used in the error only
 * @throws DecodeError on malformed byte sequences
 */
export function decodeContent(bytes: Uint8Array, path: string): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new DecodeError(path);
  }
}

/**
 * Transform decoded file content.
 *
 * Line endings are normalized to LF first. The result ends with exactly one
 * newline, or is empty for empty input.
 *
 * @param extension - Selects the comment syntax
 *
 * @example
 * ```ts
 * transformContent('x = 1  # note\r\n', 'py', { stripComments: true });
 * // => 'x = 1\n'
 * ```
 */
export function transformContent(
  content: string,
  extension: string,
  config: TransformConfig
): string {
  let text = normalizeLineEndings(content);

  if (config.stripComments) {
    text = stripComments(text, extension);
  }

  if (config.maxStringLength !== undefined) {
    text = truncateStrings(text, config.maxStringLength);
  }

  if (config.maxLineLength !== undefined) {
    text = truncateLines(text, config.maxLineLength);
  }

  if (config.maxBlankLines !== undefined) {
    text = collapseBlankLines(text, config.maxBlankLines);
  }

  if (text === '' || text.endsWith('\n')) {
    return text;
  }
  return `${text}\n`;
}
