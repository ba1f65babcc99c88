/**
 * Error codes used throughout shellgate.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'PolicyConfigurationError'
  // Runtime errors (exit code 1)
  | 'PolicyError'
  | 'HookError'
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
 * Base error class for all shellgate errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ConfigError', 'Unknown policy preset', {
 *   details: { preset: 'lenient' },
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
 * Error thrown when a policy definition or project root cannot form a valid Policy.
 * Raised at session setup only; a session must never start with a degraded policy.
 */
export class PolicyConfigurationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PolicyConfigurationError', message, options);
  }
}

/**
 * Error thrown when an operation is denied by policy.
 */
export class PolicyDeniedError extends AppError {
  /** Which rule produced the denial */
  public readonly rule: string;

  constructor(rule: string, message: string, options: AppErrorOptions = {}) {
    super('PolicyError', message, options);
    this.rule = rule;
  }
}

/**
 * Error thrown when a hook payload from the agent runtime cannot be handled.
 */
export class HookError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('HookError', message, options);
  }
}

/**
 * Whether an error should map to the user-correctable exit code.
 */
export function isUserCorrectable(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof UsageError ||
    error instanceof PolicyConfigurationError
  );
}
