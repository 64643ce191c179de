import { describe, it, expect } from 'vitest';
import { classificationToRecord, mergeClassifications } from './merger.js';
import { collectUnclassified, UNCLASSIFIED_CATEGORY } from './completeness-guard.js';
import type { ClassificationMap } from '../../types/index.js';

function map(entries: Record<string, string[]>): ClassificationMap {
  return new Map(
    Object.entries(entries).map(([category, paths]) => [category, paths.map((path) => ({ path, category }))])
  );
}

describe('mergeClassifications', () => {
  it('should return an empty map for no input', () => {
    expect(mergeClassifications([]).size).toBe(0);
  });

  it('should accumulate categories that span batches', () => {
    const merged = mergeClassifications([
      map({ images: ['a.jpg'], docs: ['a.txt'] }),
      map({ images: ['b.png'] }),
    ]);

    expect(classificationToRecord(merged)).toEqual({ docs: ['a.txt'], images: ['a.jpg', 'b.png'] });
  });

  it('should never place a path twice', () => {
    const merged = mergeClassifications([map({ images: ['a.jpg'] }), map({ photos: ['a.jpg'], docs: ['b.txt'] })]);

    expect(classificationToRecord(merged)).toEqual({ docs: ['b.txt'], images: ['a.jpg'] });
  });
});

describe('classificationToRecord', () => {
  it('should sort categories and paths', () => {
    const record = classificationToRecord(map({ zeta: ['b', 'a'], alpha: ['c'] }));

    expect(Object.keys(record)).toEqual(['alpha', 'zeta']);
    expect(record.zeta).toEqual(['a', 'b']);
  });
});

describe('collectUnclassified', () => {
  const files = [{ path: 'a.txt' }, { path: 'b.jpg' }, { path: 'c.txt' }];

  it('should return null when every file was processed', () => {
    const processed = new Map([
      ['a.txt', true],
      ['b.jpg', true],
      ['c.txt', true],
    ]);

    expect(collectUnclassified(files, processed)).toBeNull();
  });

  it('should put exactly the unprocessed files in the reserved category', () => {
    const processed = new Map([
      ['a.txt', true],
      ['b.jpg', false],
      ['c.txt', false],
    ]);

    const fallback = collectUnclassified(files, processed);

    expect(fallback).not.toBeNull();
    expect([...(fallback ?? new Map()).keys()]).toEqual([UNCLASSIFIED_CATEGORY]);
    expect(fallback?.get(UNCLASSIFIED_CATEGORY)).toEqual([
      { path: 'b.jpg', category: 'unclassified' },
      { path: 'c.txt', category: 'unclassified' },
    ]);
  });
});
