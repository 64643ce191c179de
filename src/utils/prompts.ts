/**
 * Interactive prompts
 *
 * Thin wrappers over @inquirer/prompts. When the session is not interactive
 * (no TTY, CI, or turned off explicitly) they fall back to safe answers
 * instead of waiting for input.
 */

import { confirm, input, password, select } from '@inquirer/prompts';
import type { ProviderName } from '../types/index.js';
import { PROVIDER_NAMES, PROVIDER_PRESETS } from '../core/services/llm-service.js';
import { errors } from './errors.js';

let interactive = process.stdin.isTTY === true && process.stdout.isTTY === true && !process.env.CI;

/**
 * Whether prompts may wait for user input
 */
export function isInteractive(): boolean {
  return interactive;
}

export function setInteractiveMode(enabled: boolean): void {
  interactive = enabled;
}

/**
 * Ask for the folder to organize
 */
export async function promptFolderPath(): Promise<string> {
  if (!interactive) {
    throw errors.invalidArgument('No folder given. Pass the folder to organize as an argument.');
  }

  const folder = await input({
    message: 'Folder to organize:',
    validate: (value) => (value.trim() === '' ? 'Please enter a folder path' : true),
  });
  return folder.trim();
}

/**
 * Confirm moving the classified files. Non-interactive sessions never move
 * without --yes.
 */
export async function confirmMove(fileCount: number, categoryCount: number): Promise<boolean> {
  if (!interactive) {
    return false;
  }

  return confirm({
    message: `Move ${fileCount} file(s) into ${categoryCount} category folder(s)?`,
    default: false,
  });
}

/**
 * Choose an LLM provider
 */
export async function selectProvider(current: ProviderName): Promise<ProviderName> {
  if (!interactive) {
    return current;
  }

  return select<ProviderName>({
    message: 'Default LLM provider:',
    choices: PROVIDER_NAMES.map((name) => ({
      name,
      value: name,
      description: `${PROVIDER_PRESETS[name].model} (key from ${PROVIDER_PRESETS[name].apiKeyEnv})`,
    })),
    default: current,
  });
}

/**
 * Ask for an API key. An empty answer keeps the environment variable route.
 */
export async function promptApiKey(provider: ProviderName): Promise<string> {
  if (!interactive) {
    return '';
  }

  const key = await password({
    message: `API key for ${provider} (leave empty to use ${PROVIDER_PRESETS[provider].apiKeyEnv}):`,
    mask: '*',
  });
  return key.trim();
}
