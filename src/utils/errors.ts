/**
 * Error types and codes for fixture-sample.
 * All errors raised by the package extend FixtureError.
 */

/**
 * Base error class for all fixture-sample errors.
 */
export class FixtureError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FixtureError';
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
 * Input-contract violations (bad integers, unknown status labels).
 */
export class ValidationError extends FixtureError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends FixtureError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Validation
  INVALID_INTEGER: 'INVALID_INTEGER',
  INTEGER_OVERFLOW: 'INTEGER_OVERFLOW',
  INVALID_STATUS: 'INVALID_STATUS',
  INVALID_USER: 'INVALID_USER',

  // Config
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
