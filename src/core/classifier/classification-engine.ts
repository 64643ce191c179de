/**
 * Classification Engine
 *
 * classify(files) -> category -> files. Chunks the input, dispatches the
 * batches concurrently, marks every path a reply accounted for, sends the
 * rest to the unclassified bucket, and merges everything into one map in
 * which each input path appears exactly once.
 */

import type { ClassificationMap, FileRecord } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { chunkFiles, DEFAULT_BATCH_SIZE } from './chunker.js';
import { collectUnclassified } from './completeness-guard.js';
import { dispatchBatches, type Transport } from './dispatcher.js';
import { mergeClassifications } from './merger.js';
import type { PromptOptions } from './prompt-builder.js';

export interface ClassificationEngineOptions extends PromptOptions {
  /** Maximum files per model request */
  batchSize?: number;
}

export class ClassificationEngine {
  private transport: Transport;
  private batchSize: number;
  private promptOptions: PromptOptions;

  constructor(transport: Transport, options: ClassificationEngineOptions = {}) {
    this.transport = transport;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.promptOptions = {
      otherCategory: options.otherCategory,
      categoryLanguage: options.categoryLanguage,
    };
  }

  /**
   * Classify files. Rejects with the first failed batch's error;
   * no partial result is ever returned.
   */
  async classify(files: readonly FileRecord[]): Promise<ClassificationMap> {
    const batches = chunkFiles(files, this.batchSize);
    if (batches.length === 0) {
      return new Map();
    }

    const processed = new Map<string, boolean>(files.map((file) => [file.path, false]));

    logger.inference(
      `Classifying ${files.length} files in ${batches.length} batch${batches.length === 1 ? '' : 'es'}`
    );
    const resolutions = await dispatchBatches(batches, this.transport, this.promptOptions);

    for (const { matched } of resolutions) {
      for (const path of matched) {
        processed.set(path, true);
      }
    }

    const maps = resolutions.map((resolution) => resolution.classification);
    const unclassified = collectUnclassified(files, processed);
    if (unclassified) {
      maps.push(unclassified);
    }

    return mergeClassifications(maps);
  }
}

/**
 * Classify files with a one-off engine
 */
export async function classifyFiles(
  files: readonly FileRecord[],
  transport: Transport,
  options?: ClassificationEngineOptions
): Promise<ClassificationMap> {
  return new ClassificationEngine(transport, options).classify(files);
}
