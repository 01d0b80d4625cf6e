/**
 * Error codes used throughout pacup.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ManifestReadError'
  | 'EvaluationError'
  | 'UnsupportedExpression'
  | 'InvalidVersion'
  | 'HttpError'
  | 'TimeoutError'
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
 * Base error class for all pacup errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('HttpError', 'Download failed', {
 *   cause: originalError,
 *   details: { statusCode: 404, url },
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
 * Error thrown when a pacscript cannot be read from disk.
 */
export class ManifestReadError extends AppError {
  /** Path of the pacscript that could not be read */
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('ManifestReadError', `Could not read pacscript: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when the shell expansion mechanism itself fails
 * (the interpreter exited, never started, or stopped answering).
 */
export class EvaluationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('EvaluationError', message, options);
  }
}

/**
 * Raised by the internal evaluator for shell syntax outside the manifest grammar.
 * Callers holding a fallback interpreter retry the query there.
 */
export class UnsupportedExpressionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UnsupportedExpression', message, options);
  }
}

/**
 * Error thrown when a string that is not a resolution failure cannot be parsed as a version.
 */
export class InvalidVersionError extends AppError {
  public readonly version: string;

  constructor(version: string, options: AppErrorOptions = {}) {
    super('InvalidVersion', `Invalid version: "${version}"`, options);
    this.version = version;
  }
}

/**
 * Error thrown for HTTP-related failures.
 * Carries the response status when the server answered.
 */
export class HttpError extends AppError {
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('HttpError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
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
 * Renders any thrown value as a one-line reason.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
