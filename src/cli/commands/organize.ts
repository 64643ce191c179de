/**
 * file-organizer organize command (default)
 *
 * Classifies a folder, shows the plan, asks for confirmation and moves every
 * entry into a folder named after its category.
 */

import { Command } from 'commander';
import { moveClassifiedFiles, type MoveSummary } from '../../core/organizer/file-mover.js';
import type { OrganizeOptions } from '../../types/index.js';
import { handleError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { confirmMove, isInteractive } from '../../utils/prompts.js';
import {
  classifyFolder,
  collect,
  parseBatchSize,
  printClassificationSummary,
  resolveFolder,
} from './classify.js';

/**
 * Print what the move did
 */
export function printMoveSummary(summary: MoveSummary, dryRun: boolean): void {
  logger.section(dryRun ? 'Dry Run' : 'Results');
  logger.info(dryRun ? 'Would move' : 'Moved', summary.moved.length);
  if (summary.skipped.length > 0) {
    logger.info('Skipped', summary.skipped.length);
  }
  if (summary.failed.length > 0) {
    logger.info('Failed', summary.failed.length);
    for (const failure of summary.failed) {
      logger.listItem(`${failure.path}: ${failure.error.message}`, 2);
    }
  }
  if (summary.removedDirectories.length > 0) {
    logger.info('Empty folders removed', summary.removedDirectories.length);
  }
  logger.blank();
}

export const organizeCommand = new Command('organize')
  .description('Classify the files in a folder and move them into category folders')
  .argument('[folder]', 'Folder to organize (asked for when omitted)')
  .option('--provider <name>', 'LLM provider (deepseek, siliconflow, aliyun, github, openai)')
  .option('--model <name>', 'Model name, overrides the configured one')
  .option('--batch-size <n>', 'Files per LLM request')
  .option('--no-recursive', 'Only organize the top-level entries; folders move as a whole')
  .option('--exclude <glob>', 'Pattern to skip, gitignore syntax (repeatable)', collect, [])
  .option('--dry-run', 'Show where files would go without moving them', false)
  .option('-y, --yes', 'Move without asking for confirmation', false)
  .addHelpText(
    'after',
    `
Examples:
  $ file-organizer ~/Downloads               Organize a folder (asks before moving)
  $ file-organizer organize . --dry-run      Preview the result
  $ file-organizer organize ./inbox -y --provider aliyun
`
  )
  .action(async (folder: string | undefined, _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<OrganizeOptions>();

    try {
      logger.section('Organizing Folder');
      const root = await resolveFolder(folder);
      const { classification, files } = await classifyFolder(root, {
        configPath: options.config,
        provider: options.provider,
        model: options.model,
        batchSize: parseBatchSize(options.batchSize),
        recursive: options.recursive,
        exclude: options.exclude,
      });

      if (files.length === 0) {
        return;
      }

      printClassificationSummary(classification, options.verbose);

      if (!options.dryRun && !options.yes) {
        const approved = await confirmMove(files.length, classification.size);
        if (!approved) {
          logger.warning(
            isInteractive() ? 'Cancelled, nothing was moved' : 'Not a terminal: pass --yes to move files'
          );
          return;
        }
      }

      const summary = await moveClassifiedFiles(root, classification, {
        dryRun: options.dryRun,
        exclude: options.exclude,
      });
      printMoveSummary(summary, options.dryRun);

      if (summary.failed.length > 0) {
        logger.error(`${summary.failed.length} entr${summary.failed.length === 1 ? 'y' : 'ies'} could not be moved`);
        process.exitCode = 1;
      } else if (!options.dryRun) {
        logger.success(`Organized ${summary.moved.length} entries in ${root}`);
      }
    } catch (error) {
      handleError(error);
    }
  });
