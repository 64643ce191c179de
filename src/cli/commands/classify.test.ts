/**
 * Tests for file-organizer classify command
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { classifyCommand, classifyFolder, collect, parseBatchSize } from './classify.js';
import type { Transport } from '../../core/classifier/index.js';
import { classificationToRecord } from '../../core/classifier/index.js';
import { configureLogger } from '../../utils/logger.js';

/**
 * Answers with every listed path grouped by extension
 */
function extensionTransport(prompts: string[] = []): Transport {
  return {
    invoke: async (prompt) => {
      prompts.push(prompt);
      const reply: Record<string, string[]> = {};
      for (const [, path] of prompt.matchAll(/^- (.+)$/gm)) {
        const ext = path.slice(path.lastIndexOf('.') + 1);
        (reply[ext] ??= []).push(path);
      }
      return JSON.stringify(reply);
    },
  };
}

describe('classify command', () => {
  describe('command configuration', () => {
    it('should have correct name and description', () => {
      expect(classifyCommand.name()).toBe('classify');
      expect(classifyCommand.description()).toContain('without moving');
    });

    it('should have --exclude option (repeatable)', () => {
      const excludeOption = classifyCommand.options.find((o) => o.long === '--exclude');
      expect(excludeOption).toBeDefined();
      expect(excludeOption?.description).toContain('repeatable');
      expect(excludeOption?.defaultValue).toEqual([]);
    });

    it('should have --no-recursive option', () => {
      const recursiveOption = classifyCommand.options.find((o) => o.long === '--no-recursive');
      expect(recursiveOption).toBeDefined();
      expect(recursiveOption?.negate).toBe(true);
    });

    it('should have --output, --provider, --model and --batch-size options', () => {
      const longs = classifyCommand.options.map((o) => o.long);
      expect(longs).toEqual(expect.arrayContaining(['--output', '--provider', '--model', '--batch-size']));
    });
  });

  describe('helpers', () => {
    it('should collect repeated values', () => {
      expect(collect('*.png', collect('*.tmp', []))).toEqual(['*.tmp', '*.png']);
    });

    it('should parse a batch size', () => {
      expect(parseBatchSize(undefined)).toBeUndefined();
      expect(parseBatchSize('25')).toBe(25);
    });

    it('should reject an invalid batch size', () => {
      expect(() => parseBatchSize('0')).toThrow('--batch-size must be a positive integer, got "0"');
      expect(() => parseBatchSize('ten')).toThrow('--batch-size must be a positive integer, got "ten"');
      expect(() => parseBatchSize('2.5')).toThrow('--batch-size must be a positive integer');
    });
  });

  describe('classifyFolder', () => {
    let workDir: string;
    let folder: string;
    let configPath: string;

    beforeAll(() => {
      configureLogger({ quiet: true });
    });

    afterAll(() => {
      configureLogger({ quiet: false });
    });

    beforeEach(async () => {
      workDir = join(tmpdir(), `classify-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      folder = join(workDir, 'inbox');
      configPath = join(workDir, 'file-organizer.config.json');
      await mkdir(join(folder, 'sub'), { recursive: true });
      await writeFile(join(folder, 'a.txt'), '');
      await writeFile(join(folder, 'b.jpg'), '');
      await writeFile(join(folder, 'sub', 'c.txt'), '');
    });

    afterEach(async () => {
      await rm(workDir, { recursive: true, force: true });
    });

    it('should classify every file in the folder', async () => {
      const result = await classifyFolder(folder, {
        configPath,
        recursive: true,
        exclude: [],
        transport: extensionTransport(),
      });

      expect(result.root).toBe(folder);
      expect(result.files.map((f) => f.path)).toEqual(['a.txt', 'b.jpg', 'sub/c.txt']);
      expect(classificationToRecord(result.classification)).toEqual({
        jpg: ['b.jpg'],
        txt: ['a.txt', 'sub/c.txt'],
      });
    });

    it('should create the default config when it is missing', async () => {
      await classifyFolder(folder, { configPath, recursive: true, exclude: [], transport: extensionTransport() });

      const written = JSON.parse(await readFile(configPath, 'utf-8'));
      expect(written.classification.batchSize).toBe(150);
    });

    it('should use the configured batch size unless overridden', async () => {
      await writeFile(configPath, JSON.stringify({ classification: { batchSize: 1 } }));

      const fromConfig: string[] = [];
      await classifyFolder(folder, {
        configPath,
        recursive: true,
        exclude: [],
        transport: extensionTransport(fromConfig),
      });
      const overridden: string[] = [];
      await classifyFolder(folder, {
        configPath,
        recursive: true,
        exclude: [],
        batchSize: 2,
        transport: extensionTransport(overridden),
      });

      expect(fromConfig).toHaveLength(3);
      expect(overridden).toHaveLength(2);
    });

    it('should pass configured prompt settings to the model', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ classification: { otherCategory: 'misc', categoryLanguage: 'German' } })
      );
      const prompts: string[] = [];

      await classifyFolder(folder, { configPath, recursive: true, exclude: [], transport: extensionTransport(prompts) });

      expect(prompts[0]).toContain('Name every category in German.');
      expect(prompts[0]).toContain('under "misc"');
    });

    it('should list only the top level when not recursive', async () => {
      const result = await classifyFolder(folder, {
        configPath,
        recursive: false,
        exclude: ['*.jpg'],
        transport: {
          invoke: async () => '{"documents":["a.txt"],"folders":["sub"]}',
        },
      });

      expect(result.files).toEqual([{ path: 'a.txt' }, { path: 'sub', isDirectory: true }]);
      expect(result.classification.get('folders')).toEqual([{ path: 'sub', isDirectory: true, category: 'folders' }]);
    });

    it('should not call the model for an empty folder', async () => {
      const empty = join(workDir, 'empty');
      await mkdir(empty);
      const prompts: string[] = [];

      const result = await classifyFolder(empty, {
        configPath,
        recursive: true,
        exclude: [],
        transport: extensionTransport(prompts),
      });

      expect(result.classification.size).toBe(0);
      expect(prompts).toHaveLength(0);
    });

    it('should require an API key when no transport is given', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ defaultProvider: 'siliconflow', providers: { siliconflow: { apiKey: 'your_key_here' } } })
      );
      const previous = process.env.SILICONFLOW_API_KEY;
      delete process.env.SILICONFLOW_API_KEY;

      try {
        await expect(classifyFolder(folder, { configPath, recursive: true, exclude: [] })).rejects.toMatchObject({
          code: 'NO_API_KEY',
        });
      } finally {
        if (previous !== undefined) process.env.SILICONFLOW_API_KEY = previous;
      }
    });
  });
});
