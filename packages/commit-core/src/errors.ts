/**
 * Error codes used throughout discovery autocommit.
 * User-correctable errors map to exit code 2, runtime errors to exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'SummaryMissingError'
  | 'GitError'
  | 'ArtifactsDirNotFoundError'
  | 'FileListEmptyError'
  | 'UnknownError';

export interface AutocommitErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all autocommit errors.
 *
 * @example
 * ```typescript
 * throw new GitError('git commit failed', {
 *   cause: originalError,
 *   details: { api: 'drive' }
 * });
 * ```
 */
export class AutocommitError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AutocommitErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Configuration file or value is invalid.
 */
export class ConfigError extends AutocommitError {
  constructor(message: string, options: AutocommitErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * CLI was invoked incorrectly.
 */
export class UsageError extends AutocommitError {
  constructor(message: string, options: AutocommitErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Summary file is absent while running in strict mode.
 */
export class SummaryMissingError extends AutocommitError {
  constructor(api: string, summaryPath: string) {
    super('SummaryMissingError', `Summary file for '${api}' not found: ${summaryPath}`, {
      details: { api, summaryPath },
    });
  }
}

/**
 * A git operation failed.
 */
export class GitError extends AutocommitError {
  constructor(message: string, options: AutocommitErrorOptions = {}) {
    super('GitError', message, options);
  }
}

export class ArtifactsDirNotFoundError extends AutocommitError {
  constructor(directory: string) {
    super('ArtifactsDirNotFoundError', `Artifacts directory does not exist: ${directory}`, {
      details: { directory },
    });
  }
}

export class FileListEmptyError extends AutocommitError {
  constructor(message = 'List of changed discovery files should not be empty') {
    super('FileListEmptyError', message);
  }
}

/**
 * Whether the error is one the user can fix by changing config or flags
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
