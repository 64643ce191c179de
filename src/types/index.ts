/**
 * Core type definitions for file-organizer
 */

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * A file (or, in non-recursive mode, a top-level directory) to classify.
 * `path` is relative to the organized folder, uses forward slashes,
 * and is the only key used to match model output back to input.
 */
export interface FileRecord {
  path: string;
  category?: string;
  isDirectory?: boolean;
}

/** Ordered slice of the input, sent to the model in one request */
export type Batch = readonly FileRecord[];

/** Category name to the files assigned to it */
export type ClassificationMap = Map<string, FileRecord[]>;

/**
 * Outcome of classifying one batch
 */
export interface BatchResolution {
  classification: ClassificationMap;
  /** Paths of this batch that the model reply accounted for */
  matched: Set<string>;
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

// ============================================================================
// CONFIGURATION
// ============================================================================

export type ProviderName = 'deepseek' | 'siliconflow' | 'aliyun' | 'github' | 'openai';

export interface ProviderConfig {
  apiKey: string;
  apiUrl?: string;
  modelName?: string;
}

export interface ClassificationConfig {
  batchSize: number;
  otherCategory: string;
  categoryLanguage: string;
  maxTokens: number;
}

export interface TransportConfig {
  maxAttempts: number;
  /** Delay before the second attempt in ms, doubled for each further attempt */
  initialDelay: number;
  /** Per-request timeout in ms */
  timeout: number;
}

export interface OrganizerConfig {
  version: string;
  defaultProvider: ProviderName;
  providers: Partial<Record<ProviderName, ProviderConfig>>;
  classification: ClassificationConfig;
  transport: TransportConfig;
}

/**
 * Provider settings after defaults, presets and environment are applied
 */
export interface ResolvedProvider {
  name: ProviderName;
  apiKey: string;
  apiUrl: string;
  modelName: string;
}

// ============================================================================
// CLI OPTIONS
// ============================================================================

export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  color: boolean;
  config: string;
}

export interface ClassifyOptions extends GlobalOptions {
  provider?: string;
  model?: string;
  batchSize?: string;
  recursive: boolean;
  exclude: string[];
  output?: string;
}

export interface OrganizeOptions extends ClassifyOptions {
  dryRun: boolean;
  yes: boolean;
}

export interface InitOptions extends GlobalOptions {
  force: boolean;
}
