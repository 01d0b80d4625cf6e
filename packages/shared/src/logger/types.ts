/**
 * Logging levels, from most to least verbose.
 * `silent` suppresses everything except errors.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'silent';

/**
 * Interface for logging throughout pacup.
 *
 * @example
 * ```typescript
 * logger.info('Parsing 3 pacscripts');
 * logger.error(new Error('Failed'), 'Could not install');
 *
 * // Create a child logger with additional context
 * const scoped = logger.child({ pacscript: 'neofetch' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, shown with --debug) */
  debug(message: string): void;
  /** Log an informational message (shown with --verbose) */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * Errors are written at every level.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   * @returns A new logger instance with the bindings applied
   */
  child(bindings: Record<string, unknown>): Logger;
}
