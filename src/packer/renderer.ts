/**
 * Block Renderer
 *
 * Turns a classified entry into its Markdown block:
 *
 *   **src/index.ts**
 *   ```typescript
 *   export const x = 1;
 *   ```
 *
 * or, for a referenced-only file:
 *
 *   **assets/logo.png** (Binary file)
 */

import { getLanguageForExtension, type Classification, type PathEntry, type RenderedBlock } from './types.js';

type ReferencedClassification = Extract<Classification, { disposition: 'referenced' }>;

/**
 * Header line for an entry.
 */
export function formatHeader(entry: PathEntry): string {
  return `**${entry.relativePath}**`;
}

/**
 * Short notice explaining why a referenced file has no content.
 */
export function formatNotice(
  entry: PathEntry,
  classification: ReferencedClassification,
  maxSize: number
): string {
  switch (classification.reason) {
    case 'omitted-file':
    case 'omitted-extension':
      return 'Source omitted to save space';
    case 'too-large':
      return `Exceeds size limit of ${maxSize} bytes: ${entry.size} bytes`;
    case 'binary':
      return 'Binary file';
    case 'unreadable':
      return `Error reading file: ${classification.detail ?? 'unknown error'}`;
    case 'undecodable':
      return 'Not valid UTF-8 text';
  }
}

/**
 * Backtick fence long enough that no backtick run inside the content can
 * close it early: three, or one more than the longest run.
 */
export function chooseFence(content: string): string {
  let longest = 0;
  for (const run of content.match(/`+/g) ?? []) {
    longest = Math.max(longest, run.length);
  }
  return '`'.repeat(Math.max(3, longest + 1));
}

/**
 * Wrap transformed content in a fenced block labeled with the language hint.
 *
 * @param content - Transformed content, newline-terminated or empty
 */
export function fenceContent(content: string, extension: string): string {
  const fence = chooseFence(content);
  return `${fence}${getLanguageForExtension(extension)}\n${content}${fence}\n`;
}

/**
 * Render the block for a classified entry.
 *
 * @param content - Transformed content; required for rendered entries
 * @param maxSize - Size limit, quoted in too-large notices
 * @returns The block, or undefined for excluded entries
 */
export function renderBlock(
  entry: PathEntry,
  classification: Classification,
  content: string | undefined,
  maxSize: number
): RenderedBlock | undefined {
  const header = formatHeader(entry);

  switch (classification.disposition) {
    case 'excluded':
      return undefined;

    case 'referenced': {
      const body = ` (${formatNotice(entry, classification, maxSize)})\n`;
      return { entry, disposition: 'referenced', header, body, text: header + body };
    }

    case 'rendered': {
      const body = `\n${fenceContent(content ?? '', entry.extension)}`;
      return { entry, disposition: 'rendered', header, body, text: header + body };
    }
  }
}
