/**
 * Classifier Module
 *
 * Batch classification of file paths through an LLM.
 */

export { chunkFiles, DEFAULT_BATCH_SIZE } from './chunker.js';
export {
  buildClassificationPrompt,
  DEFAULT_CATEGORY_LANGUAGE,
  DEFAULT_OTHER_CATEGORY,
  type PromptOptions,
} from './prompt-builder.js';
export {
  extractJsonObject,
  isBalancedJsonObject,
  normalizeModelReply,
  repairJson,
  stripCodeFence,
} from './response-normalizer.js';
export { parseCategoryPaths, resolveBatch } from './batch-resolver.js';
export { classifyBatch, dispatchBatches, type BatchOutcome, type Transport } from './dispatcher.js';
export { collectUnclassified, UNCLASSIFIED_CATEGORY } from './completeness-guard.js';
export { classificationToRecord, mergeClassifications } from './merger.js';
export {
  ClassificationEngine,
  classifyFiles,
  type ClassificationEngineOptions,
} from './classification-engine.js';
