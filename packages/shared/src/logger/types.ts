import type { ShellgateEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for logging throughout shellgate.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'CommandClassified', ... });
 *
 * // Standard logging
 * logger.warn('Denied: program not in allowlist');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ session: 'abc' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: ShellgateEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: ShellgateEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
