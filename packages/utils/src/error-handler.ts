/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError, isRetryableError, toError } from '@fxledger/core';
import { logger as rootLogger } from './logger.js';
import type { Logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message?: string;
  code?: string;
  shouldRetry?: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(
  error: unknown,
  context?: Record<string, unknown>,
  logger: Logger = rootLogger
): ErrorHandlerResult {
  const err = toError(error);

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    code: err instanceof AppError ? err.code : undefined,
    shouldRetry: isRetryableError(err),
  };
}
