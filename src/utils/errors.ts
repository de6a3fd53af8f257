/**
 * @arch lintcache.common.errors
 *
 * Error types and codes for lintcache.
 * All errors thrown by the package extend LintCacheError.
 */

/**
 * Base error class for all lintcache errors.
 */
export class LintCacheError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LintCacheError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A persisted cache cannot be used for the current run.
 * Error codes: C001-C004
 */
export class CacheError extends LintCacheError {
  constructor(code: CacheErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CacheError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LintCacheError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (I/O failures, parse errors).
 * Error codes: S001, S006
 */
export class SystemError extends LintCacheError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Cache invalidation (C001-C004), checked in this order
  INVALID_FORMAT: 'C001',
  DIFFERENT_VERSION: 'C002',
  DIFFERENT_CONFIGURATION: 'C003',
  INCONSISTENT_LAST_RUN_DATE: 'C004',

  // System errors
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S005',
  IO_ERROR: 'S006',

  // Config errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type CacheErrorCode =
  | typeof ErrorCodes.INVALID_FORMAT
  | typeof ErrorCodes.DIFFERENT_VERSION
  | typeof ErrorCodes.DIFFERENT_CONFIGURATION
  | typeof ErrorCodes.INCONSISTENT_LAST_RUN_DATE;

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
