/**
 * file-organizer init command
 *
 * Writes the configuration file, asking for the default provider and its
 * API key when run in a terminal.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { configExists, getDefaultConfig, writeConfig } from '../../core/services/config-manager.js';
import { PROVIDER_PRESETS } from '../../core/services/llm-service.js';
import type { InitOptions, OrganizerConfig } from '../../types/index.js';
import { handleError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { promptApiKey, selectProvider } from '../../utils/prompts.js';

/**
 * Create the config file. Returns false when it exists and force is off.
 */
export async function initConfig(configPath: string, force: boolean): Promise<boolean> {
  if ((await configExists(configPath)) && !force) {
    logger.warning(`${configPath} already exists`);
    logger.info('Tip', 'Use --force to overwrite it');
    return false;
  }

  const config: OrganizerConfig = getDefaultConfig();
  config.defaultProvider = await selectProvider(config.defaultProvider);

  const apiKey = await promptApiKey(config.defaultProvider);
  if (apiKey) {
    config.providers[config.defaultProvider] = {
      ...config.providers[config.defaultProvider],
      apiKey,
    };
  }

  await writeConfig(configPath, config);
  logger.success(`Created ${configPath}`);
  logger.info('Default provider', config.defaultProvider);
  if (!apiKey) {
    logger.info(
      'API key',
      `set ${PROVIDER_PRESETS[config.defaultProvider].apiKeyEnv} or edit the apiKey field in the config file`
    );
  }
  return true;
}

export const initCommand = new Command('init')
  .description('Create the configuration file')
  .option('--force', 'Overwrite existing configuration', false)
  .addHelpText(
    'after',
    `
Examples:
  $ file-organizer init                       Create file-organizer.config.json
  $ file-organizer init --force               Overwrite an existing config
  $ file-organizer --config org.yaml init     Write the config as YAML
`
  )
  .action(async (_options: unknown, command: Command) => {
    const options = command.optsWithGlobals<InitOptions>();

    try {
      logger.section('Initializing file-organizer');
      const created = await initConfig(resolve(options.config), options.force);
      if (created) {
        logger.blank();
        logger.info('Next step', "Run 'file-organizer <folder>' to organize a folder");
      }
    } catch (error) {
      handleError(error);
    }
  });
