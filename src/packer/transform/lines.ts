/**
 * Line-level transforms: line ending normalization, long line truncation and
 * blank-line collapsing.
 */

/** Appended to a truncated line */
export const LINE_TRUNCATION_MARKER = ' ... (Line truncated)';

/**
 * Convert CRLF and lone CR line endings to LF.
 */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n?/g, '\n');
}

/**
 * Cut lines longer than `maxLength` characters and mark them.
 *
 * Length is counted in code points, so a cut never splits a surrogate pair.
 */
export function truncateLines(content: string, maxLength: number): string {
  return content
    .split('\n')
    .map((line) => {
      // UTF-16 length is an upper bound on the code point count
      if (line.length <= maxLength) {
        return line;
      }
      const chars = Array.from(line);
      if (chars.length <= maxLength) {
        return line;
      }
      return chars.slice(0, maxLength).join('') + LINE_TRUNCATION_MARKER;
    })
    .join('\n');
}

/**
 * Reduce runs of blank (whitespace-only) lines longer than `maxBlankLines`
 * to exactly `maxBlankLines`.
 *
 * Idempotent: collapsing collapsed content with the same limit is a no-op.
 *
 * @example
 * collapseBlankLines('a\n\n\n\nb\n', 1)
 * // => 'a\n\nb\n'
 */
export function collapseBlankLines(content: string, maxBlankLines: number): string {
  // The final newline terminates the last line; it does not start a blank one
  const terminated = content.endsWith('\n');
  const body = terminated ? content.slice(0, -1) : content;

  const kept: string[] = [];
  let blankRun = 0;

  for (const line of body.split('\n')) {
    if (line.trim() === '') {
      blankRun++;
      if (blankRun > maxBlankLines) {
        continue;
      }
    } else {
      blankRun = 0;
    }
    kept.push(line);
  }

  return kept.join('\n') + (terminated ? '\n' : '');
}
