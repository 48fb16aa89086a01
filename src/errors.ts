/**
 * API Assert - Custom Error Classes
 */

/**
 * Base error class for api-assert errors
 */
export class ApiAssertError extends Error {
  public readonly code: string;
  public readonly hint?: string;

  constructor(message: string, code: string, hint?: string) {
    super(message);
    this.name = 'ApiAssertError';
    this.code = code;
    this.hint = hint;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Incorrect use of the library itself: leaving a chain twice, mutating a
 * closed chain, reporting a malformed failure. Never reported as a test
 * failure, always thrown.
 */
export class UsageError extends ApiAssertError {
  constructor(message: string, hint?: string) {
    super(message, 'USAGE_ERROR', hint);
    this.name = 'UsageError';
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ApiAssertError {
  constructor(message: string, hint?: string) {
    super(message, 'CONFIG_ERROR', hint);
    this.name = 'ConfigurationError';
  }
}

/**
 * Config file validation errors
 */
export class ValidationError extends ApiAssertError {
  public readonly filePath?: string;
  public readonly errors: SchemaError[];

  constructor(message: string, errors: SchemaError[] = [], filePath?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.filePath = filePath;
    this.errors = errors;
  }
}

export interface SchemaError {
  path: string;
  message: string;
  keyword?: string;
}

/**
 * Thrown by fail-fast reporters
 */
export class AssertionError extends ApiAssertError {
  public readonly failures: string[];

  constructor(message: string, failures: string[] = [message]) {
    super(message, 'ASSERTION_ERROR');
    this.name = 'AssertionError';
    this.failures = failures;
  }

  /**
   * Format all collected failure messages, numbered
   */
  toDetailedString(): string {
    if (this.failures.length <= 1) {
      return this.message;
    }

    const lines = [this.message];
    this.failures.forEach((failure, index) => {
      lines.push('');
      lines.push(`#${index + 1}`);
      lines.push(failure);
    });

    return lines.join('\n');
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is an api-assert error
 */
export function isApiAssertError(error: unknown): error is ApiAssertError {
  return error instanceof ApiAssertError;
}

/**
 * Wrap an unknown error in an ApiAssertError
 */
export function wrapError(error: unknown, context?: string): ApiAssertError {
  if (error instanceof ApiAssertError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const fullMessage = context ? `${context}: ${message}` : message;

  return new ApiAssertError(fullMessage, 'UNKNOWN_ERROR');
}
