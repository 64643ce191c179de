/**
 * file-organizer classify command
 *
 * Lists a folder, classifies its entries with the configured LLM provider and
 * prints the result (or writes it as JSON) without moving anything. The
 * shared pipeline here is also what `organize` runs before moving.
 */

import { Command } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { classificationToRecord, classifyFiles, type Transport } from '../../core/classifier/index.js';
import { listFiles } from '../../core/organizer/file-walker.js';
import { loadConfig, resolveProvider } from '../../core/services/config-manager.js';
import { createLLMService, type TokenUsage } from '../../core/services/llm-service.js';
import type { ClassificationMap, ClassifyOptions, FileRecord } from '../../types/index.js';
import { errors, handleError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { promptFolderPath } from '../../utils/prompts.js';

export interface ClassifyFolderOptions {
  configPath: string;
  provider?: string;
  model?: string;
  batchSize?: number;
  recursive: boolean;
  exclude: readonly string[];
  /** Talk to this transport instead of the configured provider */
  transport?: Transport;
}

export interface ClassifyFolderResult {
  root: string;
  files: FileRecord[];
  classification: ClassificationMap;
  tokenUsage?: TokenUsage;
}

/**
 * Collect repeatable option values
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Parse --batch-size. Undefined keeps the configured size.
 */
export function parseBatchSize(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const size = Number(value);
  if (!Number.isInteger(size) || size <= 0) {
    throw errors.invalidArgument(`--batch-size must be a positive integer, got "${value}"`);
  }
  return size;
}

/**
 * Folder argument, or ask for it when none was given
 */
export async function resolveFolder(folder: string | undefined): Promise<string> {
  return resolve(folder && folder.trim() !== '' ? folder : await promptFolderPath());
}

/**
 * List and classify a folder
 */
export async function classifyFolder(folder: string, options: ClassifyFolderOptions): Promise<ClassifyFolderResult> {
  const root = resolve(folder);
  const config = await loadConfig(resolve(options.configPath));

  logger.discovery(`Scanning ${root}${options.recursive ? '' : ' (top level only)'}`);
  const files = await listFiles(root, { recursive: options.recursive, exclude: options.exclude });
  logger.info('Entries found', files.length);

  if (files.length === 0) {
    logger.warning('Nothing to classify');
    return { root, files, classification: new Map() };
  }

  let transport = options.transport;
  let tokenUsage: (() => TokenUsage) | undefined;
  if (!transport) {
    const provider = resolveProvider(config, { provider: options.provider, model: options.model });
    logger.info('Provider', `${provider.name} (${provider.modelName})`);
    const service = createLLMService(provider, {
      ...config.transport,
      maxTokens: config.classification.maxTokens,
    });
    transport = service;
    tokenUsage = () => service.getTokenUsage();
  }

  const spinner = logger.spinner(`Classifying ${files.length} entries...`);
  let classification: ClassificationMap;
  try {
    classification = await classifyFiles(files, transport, {
      batchSize: options.batchSize ?? config.classification.batchSize,
      otherCategory: config.classification.otherCategory,
      categoryLanguage: config.classification.categoryLanguage,
    });
  } catch (error) {
    spinner.fail('Classification failed');
    throw error;
  }
  spinner.succeed(`Classified ${files.length} entries into ${classification.size} categories`);

  const usage = tokenUsage?.();
  if (usage) {
    logger.debug(`Tokens used: ${usage.totalTokens} over ${usage.requests} request(s)`);
  }

  return { root, files, classification, tokenUsage: usage };
}

/**
 * Print categories with their file counts, and the files themselves when
 * listFiles is set
 */
export function printClassificationSummary(classification: ClassificationMap, listFilesToo = false): void {
  const record = classificationToRecord(classification);

  logger.blank();
  logger.section('Classification');
  for (const [category, paths] of Object.entries(record)) {
    logger.info(category, `${paths.length} file(s)`);
    if (listFilesToo) {
      for (const path of paths) {
        logger.listItem(path, 2);
      }
    }
  }
  logger.blank();
}

export const classifyCommand = new Command('classify')
  .description('Classify the files in a folder without moving them')
  .argument('[folder]', 'Folder to classify')
  .option('--provider <name>', 'LLM provider (deepseek, siliconflow, aliyun, github, openai)')
  .option('--model <name>', 'Model name, overrides the configured one')
  .option('--batch-size <n>', 'Files per LLM request')
  .option('--no-recursive', 'Only classify the top-level entries of the folder')
  .option('--exclude <glob>', 'Pattern to skip, gitignore syntax (repeatable)', collect, [])
  .option('--output <file>', 'Write the classification as JSON to a file')
  .addHelpText(
    'after',
    `
Examples:
  $ file-organizer classify ~/Downloads
  $ file-organizer classify . --provider openai --output plan.json
  $ file-organizer classify ./inbox --no-recursive --exclude "*.tmp"
`
  )
  .action(async (folder: string | undefined, _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<ClassifyOptions>();

    try {
      logger.section('Classifying Folder');
      const root = await resolveFolder(folder);
      const { classification } = await classifyFolder(root, {
        configPath: options.config,
        provider: options.provider,
        model: options.model,
        batchSize: parseBatchSize(options.batchSize),
        recursive: options.recursive,
        exclude: options.exclude,
      });

      if (options.output) {
        const outputPath = resolve(options.output);
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, JSON.stringify(classificationToRecord(classification), null, 2) + '\n', 'utf-8');
        printClassificationSummary(classification);
        logger.success(`Classification written to ${outputPath}`);
      } else {
        printClassificationSummary(classification, true);
      }
    } catch (error) {
      handleError(error);
    }
  });
