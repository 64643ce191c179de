#!/usr/bin/env node

/**
 * file-organizer CLI entry point
 *
 * Sorts the files of a folder into category folders chosen by an LLM.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { classifyCommand } from './commands/classify.js';
import { organizeCommand } from './commands/organize.js';
import { configureLogger } from '../utils/logger.js';
import { DEFAULT_CONFIG_FILE } from '../core/services/config-manager.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet ?? false,
    verbose: opts.verbose ?? false,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('file-organizer')
  .description('Sort the files of a folder into category folders chosen by an LLM.')
  .version('1.0.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .option('--config <path>', 'Path to config file (.json, .yaml or .yml)', DEFAULT_CONFIG_FILE)
  .addHelpText(
    'after',
    `
Quick start:
  $ file-organizer init
  $ file-organizer ~/Downloads --dry-run
  $ file-organizer ~/Downloads

API keys are read from the config file or from DEEPSEEK_API_KEY,
SILICONFLOW_API_KEY, DASHSCOPE_API_KEY, GITHUB_TOKEN or OPENAI_API_KEY.
`
  );

program.addCommand(organizeCommand, { isDefault: true });
program.addCommand(classifyCommand);
program.addCommand(initCommand);

await program.parseAsync();
