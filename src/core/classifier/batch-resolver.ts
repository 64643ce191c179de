/**
 * Batch Resolver
 *
 * Turns a normalized model reply into a ClassificationMap for one batch.
 * Only paths of the batch itself are matched; anything else the model lists
 * (renamed, invented or from another batch) is dropped without error.
 */

import type { Batch, BatchResolution, ClassificationMap, FileRecord } from '../../types/index.js';
import { errors } from '../../utils/errors.js';

/**
 * Parse the reply into category -> paths, rejecting any other shape
 */
export function parseCategoryPaths(json: string): Map<string, string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw errors.malformedResponse(`failed to parse classification JSON: ${reason}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw errors.malformedResponse('expected a JSON object of category -> file paths');
  }

  const categories = new Map<string, string[]>();
  for (const [category, paths] of Object.entries(parsed)) {
    if (!Array.isArray(paths) || !paths.every((p): p is string => typeof p === 'string')) {
      throw errors.malformedResponse(`category "${category}" is not a list of file paths`);
    }
    categories.set(category, paths);
  }

  if (categories.size === 0) {
    throw errors.malformedResponse('the classification is empty');
  }

  return categories;
}

/**
 * Match the reply against the batch. Each record is returned as a copy with
 * its category set; the first category naming a path wins.
 */
export function resolveBatch(json: string, batch: Batch): BatchResolution {
  const categories = parseCategoryPaths(json);
  const byPath = new Map<string, FileRecord>(batch.map((file) => [file.path, file]));

  const classification: ClassificationMap = new Map();
  const matched = new Set<string>();

  for (const [category, paths] of categories) {
    if (category.trim() === '') continue;

    const assigned: FileRecord[] = [];
    for (const path of paths) {
      const file = byPath.get(path);
      if (!file || matched.has(path)) continue;

      assigned.push({ ...file, category });
      matched.add(path);
    }

    if (assigned.length > 0) {
      classification.set(category, assigned);
    }
  }

  return { classification, matched };
}
