/**
 * Core Error Classes
 * ==================
 * Error taxonomy shared by every fxledger package. Lives in @fxledger/core so the
 * contract types and the errors they raise stay dependency-free; @fxledger/utils
 * re-exports everything here.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

export type ValidationErrorKind =
  | 'INVERTED_DATE_RANGE'
  | 'UNKNOWN_FREQUENCY'
  | 'UNSUPPORTED_SOURCE'
  | 'UNSUPPORTED_METAL'
  | 'INVALID_DATE'
  | 'INVALID_OBSERVATION'
  | 'DATE_BEFORE_SOURCE_MINIMUM';

/**
 * Validation error - caller input rejected before any I/O
 */
export class ValidationError extends AppError {
  public readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, { kind, ...context });
    this.kind = kind;
  }
}

/**
 * Configuration error - malformed connection strings, bad environment values
 */
export class ConfigurationError extends AppError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * No driver registered for the requested backend kind
 */
export class DriverNotConfiguredError extends ConfigurationError {
  public readonly backend: string;

  constructor(backend: string, hint?: string) {
    super(
      `Driver not configured for ${backend} backend${hint ? ` (${hint})` : ''}`,
      'driver',
      { backend }
    );
    this.backend = backend;
  }
}

/**
 * Schema error - the backend could not create or patch its tables/collections
 */
export class SchemaError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SCHEMA_ERROR', 500, context, false);
  }
}

/**
 * Database error - for database operation failures
 */
export class DatabaseError extends AppError {
  public readonly operation?: string;

  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'DATABASE_ERROR', 500, { operation, ...context });
    this.operation = operation;
  }
}

/**
 * Check if error is a retryable error
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof DatabaseError;
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
