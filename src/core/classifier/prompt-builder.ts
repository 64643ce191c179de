/**
 * Prompt Builder
 *
 * Renders one batch into the instruction sent to the model. Paths are listed
 * verbatim: the batch resolver matches the reply against the same strings.
 */

import type { Batch } from '../../types/index.js';

export interface PromptOptions {
  /** Bucket for files the model cannot place */
  otherCategory?: string;
  /** Language the category names should be written in */
  categoryLanguage?: string;
}

export const DEFAULT_OTHER_CATEGORY = 'other';
export const DEFAULT_CATEGORY_LANGUAGE = 'English';

/**
 * Build the classification prompt for a batch
 */
export function buildClassificationPrompt(batch: Batch, options: PromptOptions = {}): string {
  const otherCategory = options.otherCategory ?? DEFAULT_OTHER_CATEGORY;
  const language = options.categoryLanguage ?? DEFAULT_CATEGORY_LANGUAGE;
  const fileList = batch.map((file) => `- ${file.path}`).join('\n');

  return `Group the following files into categories by similarity of name, type and purpose.
Name every category in ${language}.

Files:
${fileList}

Return the classification as a JSON object in exactly this shape:
{
  "category name 1": ["file path 1", "file path 2"],
  "category name 2": ["file path 3"]
}

Rules:
1. Return valid JSON only, with no text before or after it.
2. Classify every listed file exactly once and copy each path exactly as it is written above.
3. Put files whose category is unclear under "${otherCategory}".`;
}
