/**
 * @arch codeout.common.errors
 *
 * Error types and codes for codeout.
 * Every error raised by the pipeline extends CodeoutError.
 */

/**
 * Base error class for all codeout errors.
 */
export class CodeoutError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CodeoutError';
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
 * The output directory or file path is unusable.
 * Error codes: P001-P002
 */
export class PathError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PathError';
  }
}

/**
 * Writing the artifact failed. Whatever is left on disk is indeterminate.
 */
export class IoError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'IoError';
  }
}

/**
 * The external formatter could not be spawned or exited non-zero.
 * Never returned from emit; only logged.
 */
export class FormatterError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FormatterError';
  }
}

/**
 * The status line could not be written.
 */
export class NotifyError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NotifyError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable input, parse errors).
 */
export class SystemError extends CodeoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/** Errors that abort an emit call and are handed back to the caller. */
export type EmitError = PathError | IoError;

export const ErrorCodes = {
  // Path errors
  INVALID_PATH: 'P001',
  DIRECTORY_CREATE_FAILED: 'P002',

  // Write errors
  WRITE_FAILED: 'IO001',

  // Formatter errors
  FORMATTER_SPAWN_FAILED: 'F001',
  FORMATTER_EXIT_NONZERO: 'F002',

  // Notification errors
  NOTIFY_FAILED: 'N001',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // System errors
  PARSE_ERROR: 'S001',
  INPUT_READ_ERROR: 'S002',
} as const;

/**
 * Narrow an unknown thrown value to a Node.js system error carrying `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
