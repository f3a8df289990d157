/**
 * Error types and codes for Seal Stack.
 * Every error raised by the library extends SealStackError.
 */

/**
 * Base error class for all Seal Stack errors.
 */
export class SealStackError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SealStackError';
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
 * Unparsable or out-of-range coordinate text.
 */
export class CoordinateError extends SealStackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CoordinateError';
  }
}

/**
 * Pattern store construction errors. Fatal at startup.
 */
export class StoreError extends SealStackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StoreError';
  }
}

/**
 * Module assembly errors.
 */
export class AssemblyError extends SealStackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AssemblyError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends SealStackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, parse errors, invalid data tables).
 */
export class SystemError extends SealStackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  MALFORMED_COORDINATE: 'MALFORMED_COORDINATE',
  DUPLICATE_COORDINATE: 'DUPLICATE_COORDINATE',
  EMPTY_MODULE: 'EMPTY_MODULE',
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_PATTERN_TABLE: 'INVALID_PATTERN_TABLE',
  INVALID_VOCABULARY: 'INVALID_VOCABULARY',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Render any thrown value as a single line, keeping the code of library errors.
 */
export function describeError(error: unknown): string {
  if (error instanceof SealStackError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
