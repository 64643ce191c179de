import { describe, it, expect } from 'vitest';
import { parseCategoryPaths, resolveBatch } from './batch-resolver.js';
import type { Batch, ClassificationMap } from '../../types/index.js';

function paths(map: ClassificationMap): Record<string, string[]> {
  return Object.fromEntries([...map].map(([category, files]) => [category, files.map((f) => f.path)]));
}

describe('batch resolver', () => {
  const batch: Batch = [{ path: 'a.txt' }, { path: 'b.jpg' }, { path: 'c.txt' }];

  describe('parseCategoryPaths', () => {
    it('should parse a category map', () => {
      const parsed = parseCategoryPaths('{"docs":["a.txt"],"images":[]}');

      expect([...parsed]).toEqual([
        ['docs', ['a.txt']],
        ['images', []],
      ]);
    });

    it('should reject invalid JSON', () => {
      expect(() => parseCategoryPaths('{"docs":["a.txt",]}')).toThrow('failed to parse classification JSON');
    });

    it('should reject an array at the top level', () => {
      expect(() => parseCategoryPaths('["a.txt"]')).toThrow('expected a JSON object');
    });

    it('should reject a category that is not a list of strings', () => {
      expect(() => parseCategoryPaths('{"docs":"a.txt"}')).toThrow('category "docs" is not a list of file paths');
      expect(() => parseCategoryPaths('{"docs":[1]}')).toThrow('category "docs" is not a list of file paths');
    });

    it('should reject an empty classification', () => {
      expect(() => parseCategoryPaths('{}')).toThrow('the classification is empty');
    });
  });

  describe('resolveBatch', () => {
    it('should group batch records by category', () => {
      const { classification, matched } = resolveBatch(
        '{"docs":["a.txt","c.txt"],"images":["b.jpg"]}',
        batch
      );

      expect(paths(classification)).toEqual({ docs: ['a.txt', 'c.txt'], images: ['b.jpg'] });
      expect([...matched].sort()).toEqual(['a.txt', 'b.jpg', 'c.txt']);
    });

    it('should stamp the category on copies of the records', () => {
      const { classification } = resolveBatch('{"docs":["a.txt"]}', batch);

      expect(classification.get('docs')).toEqual([{ path: 'a.txt', category: 'docs' }]);
      expect(batch[0].category).toBeUndefined();
    });

    it('should keep other record fields', () => {
      const { classification } = resolveBatch('{"albums":["photos"]}', [{ path: 'photos', isDirectory: true }]);

      expect(classification.get('albums')).toEqual([{ path: 'photos', isDirectory: true, category: 'albums' }]);
    });

    it('should ignore paths that are not in the batch', () => {
      const { classification, matched } = resolveBatch('{"docs":["a.txt","z.txt","A.TXT"]}', batch);

      expect(paths(classification)).toEqual({ docs: ['a.txt'] });
      expect([...matched]).toEqual(['a.txt']);
    });

    it('should leave out categories with no matching files', () => {
      const { classification } = resolveBatch('{"docs":["a.txt"],"ghosts":["nope.txt"]}', batch);

      expect([...classification.keys()]).toEqual(['docs']);
    });

    it('should assign a path listed twice to the first category only', () => {
      const { classification } = resolveBatch('{"docs":["a.txt"],"text":["a.txt","c.txt"]}', batch);

      expect(paths(classification)).toEqual({ docs: ['a.txt'], text: ['c.txt'] });
    });

    it('should not count a path repeated in one category twice', () => {
      const { classification } = resolveBatch('{"docs":["a.txt","a.txt"]}', batch);

      expect(paths(classification)).toEqual({ docs: ['a.txt'] });
    });

    it('should skip blank category names', () => {
      const { classification, matched } = resolveBatch('{" ":["a.txt"],"images":["b.jpg"]}', batch);

      expect(paths(classification)).toEqual({ images: ['b.jpg'] });
      expect(matched.has('a.txt')).toBe(false);
    });
  });
});
