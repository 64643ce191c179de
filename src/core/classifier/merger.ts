/**
 * Merger
 *
 * Folds per-batch classifications into one map. Categories with the same
 * name accumulate; a path already placed is not placed again.
 */

import type { ClassificationMap } from '../../types/index.js';

export function mergeClassifications(maps: Iterable<ClassificationMap>): ClassificationMap {
  const merged: ClassificationMap = new Map();
  const placed = new Set<string>();

  for (const map of maps) {
    for (const [category, files] of map) {
      const fresh = files.filter((file) => !placed.has(file.path));
      if (fresh.length === 0) continue;

      for (const file of fresh) {
        placed.add(file.path);
      }
      merged.set(category, [...(merged.get(category) ?? []), ...fresh]);
    }
  }

  return merged;
}

/**
 * Plain-object view with sorted categories and paths, for printing and JSON output
 */
export function classificationToRecord(map: ClassificationMap): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const category of [...map.keys()].sort()) {
    record[category] = (map.get(category) ?? []).map((file) => file.path).sort();
  }
  return record;
}
