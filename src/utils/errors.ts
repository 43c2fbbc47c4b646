/**
 * Error types and codes for trajeval.
 * All errors raised by the project extend TrajevalError.
 */

/**
 * Base error class for all trajeval errors.
 */
export class TrajevalError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TrajevalError';
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
 * Input batch does not line up with its expectations: a trace references an
 * unknown task, a record is malformed, or a domain has no runs.
 * The offending run_id / task_id travel in `details`.
 */
export class InputMismatchError extends TrajevalError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputMismatchError';
  }

  get runId(): string | undefined {
    const value = this.details?.runId;
    return typeof value === 'string' ? value : undefined;
  }

  get taskId(): string | undefined {
    const value = this.details?.taskId;
    return typeof value === 'string' ? value : undefined;
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TrajevalError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends TrajevalError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Input mismatch (M001-M006)
  MISSING_PLAN: 'M001',
  MALFORMED_TRACE: 'M002',
  MALFORMED_PLAN: 'M003',
  DUPLICATE_RUN: 'M004',
  EMPTY_DOMAIN: 'M005',
  NO_RUNS: 'M006',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',

  // Configuration (C001-C003)
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_BUCKETS: 'C002',
  INVALID_WEIGHT: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
