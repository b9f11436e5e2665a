/**
 * Comment Stripping
 *
 * Line-oriented, regex-based removal of comments for a fixed set of
 * extensions. This is not a tokenizer: a comment marker inside a string
 * literal is treated as a real comment, so `url = "http://x#y"` in Python
 * loses everything from the `#`.
 */

/**
 * Comment syntax families.
 * - hash: `#` to end of line
 * - c: `//` to end of line, and `/* ... *\/` spans
 */
export type CommentStyle = 'hash' | 'c';

/**
 * Extension to comment syntax. Extensions not listed are left untouched.
 */
export const COMMENT_STYLES: Readonly<Record<string, CommentStyle>> = {
  py: 'hash',
  pyw: 'hash',
  sh: 'hash',
  bash: 'hash',
  rb: 'hash',
  yaml: 'hash',
  yml: 'hash',
  toml: 'hash',

  js: 'c',
  mjs: 'c',
  cjs: 'c',
  jsx: 'c',
  ts: 'c',
  tsx: 'c',
  java: 'c',
  c: 'c',
  h: 'c',
  cpp: 'c',
  go: 'c',
  rs: 'c',
  css: 'c',
  html: 'c',
};

// Whitespace before the marker goes with the comment
const HASH_COMMENT = /[ \t]*#.*$/gm;
const LINE_COMMENT = /[ \t]*\/\/.*$/gm;
const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;

/**
 * Get the comment syntax for an extension, if it has a mapping.
 */
export function getCommentStyle(extension: string): CommentStyle | undefined {
  return COMMENT_STYLES[extension];
}

/**
 * Remove comments from content according to the extension's syntax.
 *
 * Lines that held only a comment stay behind as empty lines; blank-line
 * collapsing can reduce them afterwards.
 */
export function stripComments(content: string, extension: string): string {
  switch (getCommentStyle(extension)) {
    case 'hash':
      return content.replace(HASH_COMMENT, '');
    case 'c':
      // Line comments go first, so a `//` inside a block comment also takes
      // the rest of its line, closing marker included
      return content.replace(LINE_COMMENT, '').replace(BLOCK_COMMENT, '');
    default:
      return content;
  }
}
