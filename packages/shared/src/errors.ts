/**
 * Error codes used throughout roster.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'CacheError'
  | 'RepositoryError'
  | 'BackendError'
  | 'CancelledError'
  | 'ProcessError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all roster errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('CacheError', 'Could not write cache', {
 *   cause: originalError,
 *   details: { path: '/home/me/.roster/repos.txt' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the repository cache cannot be read or written at all.
 * Fatal: the caller decides whether to retry.
 */
export class CacheError extends AppError {
  /** Location of the cache file involved */
  public readonly cachePath: string;

  constructor(cachePath: string, message: string, options: AppErrorOptions = {}) {
    super('CacheError', message, options);
    this.cachePath = cachePath;
  }
}

/**
 * Error thrown when a known repository path can no longer be opened.
 * Scoped to one repository; aggregation of the others continues.
 */
export class RepositoryUnavailableError extends AppError {
  /** Path of the repository that failed to open */
  public readonly repoPath: string;

  constructor(repoPath: string, options: AppErrorOptions = {}) {
    super('RepositoryError', `Could not open ${repoPath} as a git repository.`, options);
    this.repoPath = repoPath;
  }
}

/**
 * Error thrown when a version-control query fails on an opened repository.
 */
export class BackendError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('BackendError', message, options);
  }
}

/**
 * Error thrown when a scan is interrupted through its abort signal.
 */
export class ScanAbortedError extends AppError {
  constructor(options: AppErrorOptions = {}) {
    super('CancelledError', 'Scan was aborted before it completed.', options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Returns true for errors the user can fix (bad config, bad usage).
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}
