/**
 * Dispatcher
 *
 * Runs prompt -> transport -> normalize -> resolve for every batch at once and
 * collects the outcomes as they complete. Workers share nothing: each returns
 * its own result and only this fan-in point records it. If any batch fails,
 * the remaining ones still run to completion and then the first failure (in
 * completion order) is thrown; successful results are discarded.
 */

import type { Batch, BatchResolution, Result } from '../../types/index.js';
import { errors, type FileOrganizerError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { buildClassificationPrompt, type PromptOptions } from './prompt-builder.js';
import { normalizeModelReply } from './response-normalizer.js';
import { resolveBatch } from './batch-resolver.js';

/**
 * Sends a prompt to a model and returns its raw reply. Implementations
 * handle their own timeouts and retries.
 */
export interface Transport {
  invoke(prompt: string): Promise<string>;
}

export type BatchOutcome = Result<BatchResolution, FileOrganizerError> & { batchIndex: number };

/**
 * Classify one batch. Never rejects: failures come back as an outcome.
 * A reply that cannot be normalized or resolved fails the batch right away;
 * the model is not asked again.
 */
export async function classifyBatch(
  batch: Batch,
  batchIndex: number,
  batchCount: number,
  transport: Transport,
  options: PromptOptions = {}
): Promise<BatchOutcome> {
  const label = `${batchIndex + 1}/${batchCount}`;
  logger.debug(`Batch ${label}: sending ${batch.length} files`);

  try {
    const prompt = buildClassificationPrompt(batch, options);
    const reply = await transport.invoke(prompt);
    const json = normalizeModelReply(reply);
    const resolution = resolveBatch(json, batch);

    logger.debug(
      `Batch ${label}: ${resolution.matched.size}/${batch.length} files in ${resolution.classification.size} categories`
    );
    return { ok: true, value: resolution, batchIndex };
  } catch (error) {
    return { ok: false, error: errors.batchFailed(batchIndex + 1, batchCount, error), batchIndex };
  }
}

/**
 * Fan out over all batches and wait for every one of them.
 * Resolves with the results in completion order.
 */
export async function dispatchBatches(
  batches: readonly Batch[],
  transport: Transport,
  options: PromptOptions = {}
): Promise<BatchResolution[]> {
  const outcomes: BatchOutcome[] = [];

  await Promise.all(
    batches.map(async (batch, index) => {
      const outcome = await classifyBatch(batch, index, batches.length, transport, options);
      outcomes.push(outcome);
    })
  );

  const resolutions: BatchResolution[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      throw outcome.error;
    }
    resolutions.push(outcome.value);
  }

  return resolutions;
}
