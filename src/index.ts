/**
 * file-organizer library entry point
 */

export * from './core/classifier/index.js';
export { listFiles, type FileWalkerOptions } from './core/organizer/file-walker.js';
export {
  moveClassifiedFiles,
  removeEmptyDirectories,
  sanitizeCategoryName,
  type MoveOptions,
  type MoveSummary,
} from './core/organizer/file-mover.js';
export {
  DEFAULT_CONFIG_FILE,
  getDefaultConfig,
  loadConfig,
  resolveProvider,
  writeConfig,
} from './core/services/config-manager.js';
export {
  ChatCompletionsProvider,
  createLLMService,
  LLMService,
  MockLLMProvider,
  PROVIDER_PRESETS,
  type LLMProvider,
} from './core/services/llm-service.js';
export { errors, FileOrganizerError, formatError, type ErrorCode } from './utils/errors.js';
export type * from './types/index.js';
