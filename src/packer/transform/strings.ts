/**
 * String Literal Truncation
 *
 * Shortens long string literals found by pattern matching. Recognized
 * delimiters: ''' and """ (may span lines), ' and " (single line), and
 * backticks (may span lines). Escaped quotes are not understood, so an
 * escaped delimiter ends the literal early.
 */

/** Appended inside a truncated literal, before its closing delimiter */
export const STRING_TRUNCATION_MARKER = '... (String truncated)';

// Triple quotes first so they are not read as empty '' / "" literals
const STRING_LITERAL = /'''[\s\S]*?'''|"""[\s\S]*?"""|'[^'\n]*'|"[^"\n]*"|`[^`]*`/g;

/**
 * Cut every string literal whose interior is longer than `maxLength`
 * code points down to `maxLength`, then append the truncation marker.
 *
 * @example
 * truncateStrings('x = "abcdefgh"', 3)
 * // => 'x = "abc... (String truncated)"'
 */
export function truncateStrings(content: string, maxLength: number): string {
  return content.replace(STRING_LITERAL, (literal) => {
    const delimiter =
      literal.startsWith("'''") || literal.startsWith('"""')
        ? literal.slice(0, 3)
        : literal.charAt(0);
    const interior = literal.slice(delimiter.length, literal.length - delimiter.length);
    // Code points, so a surrogate pair is never split
    const characters = Array.from(interior);

    if (characters.length <= maxLength) {
      return literal;
    }

    const kept = characters.slice(0, maxLength).join('');
    return `${delimiter}${kept}${STRING_TRUNCATION_MARKER}${delimiter}`;
  });
}
