/**
 * File Classifier
 *
 * Decides for each file reached by the walk whether it is excluded,
 * referenced without content, or rendered. Rules are checked in a fixed
 * order and the first match wins:
 *
 * 1. Name in the file omit list        -> referenced (omitted-file)
 * 2. Extension in the omit list        -> referenced (omitted-extension)
 * 3. Not in a configured whitelist     -> excluded   (not-whitelisted)
 * 4. Extension not in the allow-list   -> excluded   (extension-not-allowed)
 * 5. Larger than the size limit        -> referenced (too-large)
 * 6. NUL byte in the leading sample    -> referenced (binary)
 * 7. Otherwise                         -> rendered
 *
 * Omit lists come before the allow-lists, so a file can be noted without its
 * content even when its extension would qualify for rendering. Binary files
 * are never rendered, whitelisted or not.
 */

import { BINARY_SAMPLE_SIZE, isBinarySample, readSample, type SampleReader } from './binary.js';
import { matchesExtension, matchesName, matchesWhitelist } from './match.js';
import type { Classification, PathEntry, RuleSet } from './types.js';

/**
 * Classify one file.
 *
 * Only the binary check touches the filesystem, through `sampleReader`,
 * and only once every other rule has passed.
 *
 * @throws ReadError if the sample cannot be read
 */
export function classifyEntry(
  entry: PathEntry,
  rules: RuleSet,
  sampleReader: SampleReader = readSample
): Classification {
  if (matchesName(entry.name, rules.omitFiles)) {
    return { disposition: 'referenced', reason: 'omitted-file' };
  }

  if (matchesExtension(entry.extension, rules.omitExtensions)) {
    return { disposition: 'referenced', reason: 'omitted-extension' };
  }

  if (rules.whitelistFiles && !matchesName(entry.name, rules.whitelistFiles)) {
    return { disposition: 'excluded', reason: 'not-whitelisted' };
  }

  if (rules.whitelist && !matchesWhitelist(entry, rules.whitelist)) {
    return { disposition: 'excluded', reason: 'not-whitelisted' };
  }

  if (rules.extensions && !matchesExtension(entry.extension, rules.extensions)) {
    return { disposition: 'excluded', reason: 'extension-not-allowed' };
  }

  if (entry.size > rules.maxSize) {
    return { disposition: 'referenced', reason: 'too-large' };
  }

  if (isBinarySample(sampleReader(entry.absolutePath, BINARY_SAMPLE_SIZE))) {
    return { disposition: 'referenced', reason: 'binary' };
  }

  return { disposition: 'rendered' };
}
