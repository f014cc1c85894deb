/**
 * Custom Error Classes
 * ====================
 * The taxonomy itself lives in @fxledger/core; it is re-exported here so
 * application code has a single import for logging, config and errors.
 */

export {
  AppError,
  ValidationError,
  ConfigurationError,
  DriverNotConfiguredError,
  SchemaError,
  DatabaseError,
  isRetryableError,
  toError,
} from '@fxledger/core';
export type { ValidationErrorKind } from '@fxledger/core';
