/**
 * Configuration management service
 *
 * Handles reading/writing file-organizer.config.json (or .yaml/.yml) and
 * resolving the provider a run talks to.
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import YAML from 'yaml';
import type {
  ClassificationConfig,
  OrganizerConfig,
  ProviderConfig,
  ProviderName,
  ResolvedProvider,
  TransportConfig,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { isProviderName, normalizeApiUrl, PROVIDER_NAMES, PROVIDER_PRESETS } from './llm-service.js';

export const DEFAULT_CONFIG_FILE = 'file-organizer.config.json';

const CONFIG_VERSION = '1.0.0';
const PLACEHOLDER_KEY = /^your_/i;

type Environment = Record<string, string | undefined>;

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isYamlPath(configPath: string): boolean {
  const ext = extname(configPath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): OrganizerConfig {
  const providers: Partial<Record<ProviderName, ProviderConfig>> = {};
  for (const name of PROVIDER_NAMES) {
    providers[name] = {
      apiKey: `your_${name}_api_key`,
      apiUrl: PROVIDER_PRESETS[name].apiUrl,
      modelName: PROVIDER_PRESETS[name].model,
    };
  }

  return {
    version: CONFIG_VERSION,
    defaultProvider: 'deepseek',
    providers,
    classification: {
      batchSize: 150,
      otherCategory: 'other',
      categoryLanguage: 'English',
      maxTokens: 8192,
    },
    transport: {
      maxAttempts: 3,
      initialDelay: 1000,
      timeout: 180_000,
    },
  };
}

// ============================================================================
// VALIDATION
// ============================================================================

function readPositiveInteger(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  configPath: string,
  allowZero = false
): number {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw errors.invalidConfig(configPath, `"${key}" must be a ${allowZero ? 'non-negative' : 'positive'} integer`);
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, fallback: string, configPath: string): string {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw errors.invalidConfig(configPath, `"${key}" must be a non-empty string`);
  }
  return value;
}

function readSection(raw: Record<string, unknown>, key: string, configPath: string): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    throw errors.invalidConfig(configPath, `"${key}" must be an object`);
  }
  return section;
}

function validateProviders(
  raw: Record<string, unknown>,
  configPath: string
): Partial<Record<ProviderName, ProviderConfig>> {
  const section = readSection(raw, 'providers', configPath);
  const providers: Partial<Record<ProviderName, ProviderConfig>> = {};

  for (const [name, value] of Object.entries(section)) {
    if (!isProviderName(name)) {
      throw errors.invalidConfig(configPath, `unknown provider "${name}" (known: ${PROVIDER_NAMES.join(', ')})`);
    }
    if (!isRecord(value)) {
      throw errors.invalidConfig(configPath, `provider "${name}" must be an object`);
    }

    const { apiKey, apiUrl, modelName } = value;
    if (apiKey !== undefined && typeof apiKey !== 'string') {
      throw errors.invalidConfig(configPath, `"providers.${name}.apiKey" must be a string`);
    }
    if (apiUrl !== undefined && typeof apiUrl !== 'string') {
      throw errors.invalidConfig(configPath, `"providers.${name}.apiUrl" must be a string`);
    }
    if (modelName !== undefined && typeof modelName !== 'string') {
      throw errors.invalidConfig(configPath, `"providers.${name}.modelName" must be a string`);
    }

    providers[name] = {
      apiKey: apiKey ?? '',
      ...(apiUrl ? { apiUrl } : {}),
      ...(modelName ? { modelName } : {}),
    };
  }

  return providers;
}

/**
 * Validate parsed config content, filling missing fields from defaults
 */
export function validateConfig(raw: unknown, configPath: string): OrganizerConfig {
  if (!isRecord(raw)) {
    throw errors.invalidConfig(configPath, 'expected an object at the top level');
  }

  const defaults = getDefaultConfig();

  const defaultProvider = raw.defaultProvider ?? defaults.defaultProvider;
  if (typeof defaultProvider !== 'string' || !isProviderName(defaultProvider)) {
    throw errors.invalidConfig(
      configPath,
      `"defaultProvider" must be one of: ${PROVIDER_NAMES.join(', ')}`
    );
  }

  const classificationSection = readSection(raw, 'classification', configPath);
  const classification: ClassificationConfig = {
    batchSize: readPositiveInteger(classificationSection, 'batchSize', defaults.classification.batchSize, configPath),
    otherCategory: readString(classificationSection, 'otherCategory', defaults.classification.otherCategory, configPath),
    categoryLanguage: readString(
      classificationSection,
      'categoryLanguage',
      defaults.classification.categoryLanguage,
      configPath
    ),
    maxTokens: readPositiveInteger(classificationSection, 'maxTokens', defaults.classification.maxTokens, configPath),
  };

  const transportSection = readSection(raw, 'transport', configPath);
  const transport: TransportConfig = {
    maxAttempts: readPositiveInteger(transportSection, 'maxAttempts', defaults.transport.maxAttempts, configPath),
    initialDelay: readPositiveInteger(
      transportSection,
      'initialDelay',
      defaults.transport.initialDelay,
      configPath,
      true
    ),
    timeout: readPositiveInteger(transportSection, 'timeout', defaults.transport.timeout, configPath),
  };

  const version = typeof raw.version === 'string' ? raw.version : CONFIG_VERSION;

  return {
    version,
    defaultProvider,
    providers: validateProviders(raw, configPath),
    classification,
    transport,
  };
}

// ============================================================================
// READ / WRITE
// ============================================================================

/**
 * Check if a config file already exists
 */
export async function configExists(configPath: string): Promise<boolean> {
  return fileExists(configPath);
}

/**
 * Write a config file as JSON, or YAML for .yaml/.yml paths
 */
export async function writeConfig(configPath: string, config: OrganizerConfig): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  const content = isYamlPath(configPath) ? YAML.stringify(config) : JSON.stringify(config, null, 2) + '\n';
  await writeFile(configPath, content, 'utf-8');
}

/**
 * Read and validate a config file. A missing file is created with the
 * defaults, which are then returned.
 */
export async function loadConfig(configPath: string): Promise<OrganizerConfig> {
  if (!(await fileExists(configPath))) {
    const config = getDefaultConfig();
    await writeConfig(configPath, config);
    return config;
  }

  let raw: unknown;
  try {
    const content = await readFile(configPath, 'utf-8');
    raw = isYamlPath(configPath) ? YAML.parse(content) : JSON.parse(content);
  } catch (error) {
    throw errors.invalidConfig(configPath, error instanceof Error ? error.message : String(error));
  }

  return validateConfig(raw, configPath);
}

// ============================================================================
// PROVIDERS
// ============================================================================

/**
 * Look up a provider's config section. No name means the default provider.
 */
export function getProviderConfig(
  config: OrganizerConfig,
  name?: string
): { name: ProviderName; provider: ProviderConfig } {
  const selected = name && name.trim() !== '' ? name.trim() : config.defaultProvider;
  if (!isProviderName(selected)) {
    throw errors.unknownProvider(selected, PROVIDER_NAMES);
  }

  return { name: selected, provider: config.providers[selected] ?? { apiKey: '' } };
}

/**
 * Provider settings for a run: environment key over config key, config URL
 * and model over the preset, and an explicit model over both.
 */
export function resolveProvider(
  config: OrganizerConfig,
  options: { provider?: string; model?: string } = {},
  env: Environment = process.env
): ResolvedProvider {
  const { name, provider } = getProviderConfig(config, options.provider);
  const preset = PROVIDER_PRESETS[name];

  const apiKey = (env[preset.apiKeyEnv] ?? '').trim() || provider.apiKey.trim();
  if (apiKey === '' || PLACEHOLDER_KEY.test(apiKey)) {
    throw errors.noApiKey(name, preset.apiKeyEnv);
  }

  return {
    name,
    apiKey,
    apiUrl: normalizeApiUrl(provider.apiUrl ?? preset.apiUrl),
    modelName: options.model?.trim() || provider.modelName || preset.model,
  };
}
