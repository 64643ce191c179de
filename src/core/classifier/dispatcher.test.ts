import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { classifyBatch, dispatchBatches, type Transport } from './dispatcher.js';
import { configureLogger } from '../../utils/logger.js';
import { errors, isFileOrganizerError } from '../../utils/errors.js';

/**
 * Transport that answers from a table keyed by the first path in the prompt
 */
class ScriptedTransport implements Transport {
  prompts: string[] = [];
  finished: string[] = [];

  constructor(private replies: Record<string, { reply?: string; error?: Error; delay?: number }>) {}

  async invoke(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const match = /^- (.+)$/m.exec(prompt);
    const key = match ? match[1] : '';
    const script = this.replies[key] ?? { reply: '{}' };

    await new Promise((resolve) => setTimeout(resolve, script.delay ?? 0));
    this.finished.push(key);

    if (script.error) {
      throw script.error;
    }
    return script.reply ?? '{}';
  }
}

describe('dispatcher', () => {
  beforeAll(() => {
    configureLogger({ quiet: true });
  });

  afterAll(() => {
    configureLogger({ quiet: false });
  });

  describe('classifyBatch', () => {
    it('should resolve a batch from a fenced reply', async () => {
      const transport = new ScriptedTransport({
        'a.txt': { reply: '```json\n{"docs":["a.txt"],"images":["b.jpg"]}\n```' },
      });

      const outcome = await classifyBatch([{ path: 'a.txt' }, { path: 'b.jpg' }], 0, 1, transport);

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect([...outcome.value.classification.keys()]).toEqual(['docs', 'images']);
        expect([...outcome.value.matched].sort()).toEqual(['a.txt', 'b.jpg']);
      }
      expect(outcome.batchIndex).toBe(0);
    });

    it('should return a failed outcome instead of rejecting', async () => {
      const transport = new ScriptedTransport({ 'a.txt': { error: errors.transportFailed('boom', 500) } });

      const outcome = await classifyBatch([{ path: 'a.txt' }], 1, 3, transport);

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe('BATCH_FAILED');
        expect(outcome.error.message).toBe('Batch 2/3 failed: boom');
      }
    });

    it('should fail on a malformed reply without asking again', async () => {
      const transport = new ScriptedTransport({ 'a.txt': { reply: 'I could not classify these files.' } });

      const outcome = await classifyBatch([{ path: 'a.txt' }], 0, 1, transport);

      expect(outcome.ok).toBe(false);
      expect(transport.prompts).toHaveLength(1);
    });

    it('should pass prompt options through', async () => {
      const transport = new ScriptedTransport({ 'a.txt': { reply: '{"misc":["a.txt"]}' } });

      await classifyBatch([{ path: 'a.txt' }], 0, 1, transport, { otherCategory: 'misc', categoryLanguage: 'French' });

      expect(transport.prompts[0]).toContain('Name every category in French.');
      expect(transport.prompts[0]).toContain('under "misc"');
    });
  });

  describe('dispatchBatches', () => {
    it('should return one resolution per batch', async () => {
      const transport = new ScriptedTransport({
        'a.txt': { reply: '{"docs":["a.txt"]}', delay: 20 },
        'b.jpg': { reply: '{"images":["b.jpg"]}' },
      });

      const resolutions = await dispatchBatches([[{ path: 'a.txt' }], [{ path: 'b.jpg' }]], transport);

      expect(resolutions).toHaveLength(2);
      // completion order: the delayed batch finishes last
      expect([...resolutions[0].classification.keys()]).toEqual(['images']);
      expect([...resolutions[1].classification.keys()]).toEqual(['docs']);
    });

    it('should send every batch before any reply arrives', async () => {
      const transport = new ScriptedTransport({
        'a.txt': { reply: '{"docs":["a.txt"]}', delay: 10 },
        'b.txt': { reply: '{"docs":["b.txt"]}', delay: 10 },
        'c.txt': { reply: '{"docs":["c.txt"]}', delay: 10 },
      });

      const pending = dispatchBatches([[{ path: 'a.txt' }], [{ path: 'b.txt' }], [{ path: 'c.txt' }]], transport);

      expect(transport.prompts).toHaveLength(3);
      expect(transport.finished).toHaveLength(0);
      await pending;
    });

    it('should throw the first failure after all batches finish', async () => {
      const transport = new ScriptedTransport({
        'a.txt': { reply: '{"docs":["a.txt"]}', delay: 30 },
        'b.txt': { error: errors.transportFailed('first', 503), delay: 5 },
        'c.txt': { error: errors.transportFailed('second', 503), delay: 15 },
      });

      let caught: unknown;
      try {
        await dispatchBatches([[{ path: 'a.txt' }], [{ path: 'b.txt' }], [{ path: 'c.txt' }]], transport);
      } catch (error) {
        caught = error;
      }

      expect(isFileOrganizerError(caught)).toBe(true);
      if (isFileOrganizerError(caught)) {
        expect(caught.code).toBe('BATCH_FAILED');
        expect(caught.message).toBe('Batch 2/3 failed: first');
      }
      expect(transport.finished.sort()).toEqual(['a.txt', 'b.txt', 'c.txt']);
    });

    it('should resolve to an empty list for no batches', async () => {
      const transport = new ScriptedTransport({});

      await expect(dispatchBatches([], transport)).resolves.toEqual([]);
      expect(transport.prompts).toHaveLength(0);
    });
  });
});
