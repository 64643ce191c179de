/**
 * Splits the input file list into fixed-size batches, one model request each.
 */

import type { Batch, FileRecord } from '../../types/index.js';
import { errors } from '../../utils/errors.js';

export const DEFAULT_BATCH_SIZE = 150;

/**
 * Chunk files into batches of `batchSize`; only the last batch may be shorter.
 * Batches are frozen slices, the input is left untouched.
 */
export function chunkFiles(
  files: readonly FileRecord[],
  batchSize: number = DEFAULT_BATCH_SIZE
): Batch[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw errors.invalidArgument(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const batches: Batch[] = [];
  for (let start = 0; start < files.length; start += batchSize) {
    batches.push(Object.freeze(files.slice(start, start + batchSize)));
  }
  return batches;
}
