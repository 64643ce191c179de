/**
 * Completeness Guard
 *
 * Files no batch reply accounted for go into the reserved "unclassified"
 * category, so every input file ends up in exactly one category.
 */

import type { ClassificationMap, FileRecord } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

/** Reserved category for files the model left out */
export const UNCLASSIFIED_CATEGORY = 'unclassified';

/**
 * Build the fallback map for unprocessed files, or null when there are none.
 * Input order is kept.
 */
export function collectUnclassified(
  files: readonly FileRecord[],
  processed: ReadonlyMap<string, boolean>
): ClassificationMap | null {
  const missing = files.filter((file) => processed.get(file.path) !== true);
  if (missing.length === 0) {
    return null;
  }

  logger.warning(`${missing.length} file(s) were not classified by the model:`);
  for (const file of missing) {
    logger.listItem(file.path, 1);
  }

  return new Map([
    [UNCLASSIFIED_CATEGORY, missing.map((file) => ({ ...file, category: UNCLASSIFIED_CATEGORY }))],
  ]);
}
