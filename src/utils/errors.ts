/**
 * Custom error classes for file-organizer with helpful user-facing messages
 */

export type ErrorCode =
  | 'NO_API_KEY'
  | 'UNKNOWN_PROVIDER'
  | 'INVALID_ARGUMENT'
  | 'TRANSPORT_FAILED'
  | 'RETRIES_EXHAUSTED'
  | 'MALFORMED_RESPONSE'
  | 'BATCH_FAILED'
  | 'INVALID_CONFIG'
  | 'DIRECTORY_NOT_FOUND'
  | 'FILE_MOVE_FAILED'
  | 'UNKNOWN_ERROR';

export interface FileOrganizerErrorOptions {
  /** HTTP status of a failed provider request */
  status?: number;
  cause?: unknown;
}

/**
 * Base error class for file-organizer with code and suggestion
 */
export class FileOrganizerError extends Error {
  public status?: number;

  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string,
    options: FileOrganizerErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FileOrganizerError';
    this.status = options.status;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display with color support
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    let output = `${red}Error [${this.code}]:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  noApiKey(provider: string, envVar: string): FileOrganizerError {
    return new FileOrganizerError(
      `No API key configured for provider "${provider}"`,
      'NO_API_KEY',
      `Set the ${envVar} environment variable, or put the key in the config file.
Run 'file-organizer init' to create a config file.`
    );
  },

  unknownProvider(provider: string, known: readonly string[]): FileOrganizerError {
    return new FileOrganizerError(
      `Unsupported provider: ${provider}`,
      'UNKNOWN_PROVIDER',
      `Use one of: ${known.join(', ')}`
    );
  },

  invalidArgument(message: string): FileOrganizerError {
    return new FileOrganizerError(message, 'INVALID_ARGUMENT');
  },

  transportFailed(message: string, status?: number, cause?: unknown): FileOrganizerError {
    return new FileOrganizerError(
      message,
      'TRANSPORT_FAILED',
      'Check the API URL, the API key and your network connection.',
      { status, cause }
    );
  },

  retriesExhausted(attempts: number, lastError: unknown): FileOrganizerError {
    return new FileOrganizerError(
      `LLM request still failing after ${attempts} attempts: ${messageOf(lastError)}`,
      'RETRIES_EXHAUSTED',
      `The provider may be overloaded or unreachable. Try again later or switch providers with --provider.`,
      { cause: lastError }
    );
  },

  malformedResponse(details: string): FileOrganizerError {
    return new FileOrganizerError(
      `Model returned an unusable classification: ${details}`,
      'MALFORMED_RESPONSE',
      `Large batches are more likely to be truncated. Try a smaller --batch-size or a different model.`
    );
  },

  batchFailed(batchNumber: number, batchCount: number, cause: unknown): FileOrganizerError {
    const suggestion = cause instanceof FileOrganizerError ? cause.suggestion : undefined;
    return new FileOrganizerError(
      `Batch ${batchNumber}/${batchCount} failed: ${messageOf(cause)}`,
      'BATCH_FAILED',
      suggestion,
      { cause }
    );
  },

  invalidConfig(path: string, details?: string): FileOrganizerError {
    return new FileOrganizerError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      `Check the configuration file format. You may need to delete it and run 'file-organizer init' again.`
    );
  },

  directoryNotFound(path: string): FileOrganizerError {
    return new FileOrganizerError(
      `Folder not found: ${path}`,
      'DIRECTORY_NOT_FOUND',
      `Check the path and that you have read permissions for it.`
    );
  },

  fileMoveFailed(path: string, reason?: string): FileOrganizerError {
    return new FileOrganizerError(
      `Failed to move ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_MOVE_FAILED',
      `Check that you have write permissions for the folder.`
    );
  },

  unknown(error: unknown): FileOrganizerError {
    return new FileOrganizerError(
      `An unexpected error occurred: ${messageOf(error)}`,
      'UNKNOWN_ERROR',
      `Run again with --verbose for more details.`,
      { cause: error }
    );
  },
};

/**
 * Type guard to check if an error is a FileOrganizerError
 */
export function isFileOrganizerError(error: unknown): error is FileOrganizerError {
  return error instanceof FileOrganizerError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isFileOrganizerError(error)) {
    return error.format(useColor);
  }

  return errors.unknown(error).format(useColor);
}

/**
 * Handle errors in CLI commands by formatting and logging them
 */
export function handleError(error: unknown): void {
  console.error(formatError(error, process.stdout.isTTY === true));
  process.exitCode = 1;
}
