/**
 * Binary Detection
 *
 * Classifies a file as binary from a sample of its leading bytes: a NUL byte
 * anywhere in the first BINARY_SAMPLE_SIZE bytes means binary.
 */

import { openSync, readSync, closeSync } from 'node:fs';

import { ReadError, toError } from '../errors/index.js';

/** Number of leading bytes inspected */
export const BINARY_SAMPLE_SIZE = 1024;

/**
 * Reads up to `size` leading bytes of a file.
 * Throws ReadError when the file cannot be opened or read.
 */
export type SampleReader = (absolutePath: string, size?: number) => Uint8Array;

/**
 * Check a content sample for a NUL byte.
 *
 * Only the first BINARY_SAMPLE_SIZE bytes are inspected, even when a longer
 * buffer is passed.
 */
export function isBinarySample(sample: Uint8Array): boolean {
  const limit = Math.min(sample.length, BINARY_SAMPLE_SIZE);
  for (let i = 0; i < limit; i++) {
    if (sample[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * Read the leading bytes of a file.
 *
 * The descriptor is closed before returning, whether the read succeeded or
 * not; no handle outlives the call.
 */
export const readSample: SampleReader = (
  absolutePath: string,
  size: number = BINARY_SAMPLE_SIZE
): Uint8Array => {
  let fd: number;
  try {
    fd = openSync(absolutePath, 'r');
  } catch (error) {
    throw new ReadError(absolutePath, toError(error));
  }

  try {
    const buffer = Buffer.alloc(size);
    const bytesRead = readSync(fd, buffer, 0, size, 0);
    return buffer.subarray(0, bytesRead);
  } catch (error) {
    throw new ReadError(absolutePath, toError(error));
  } finally {
    closeSync(fd);
  }
};
