/**
 * Centralized Logging System
 * ==========================
 * Package-aware logging with namespaces.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@fxledger/utils';
 *
 * const logger = createPackageLogger('@fxledger/storage');
 * logger.info('Schema ready', { backend: 'sqlite' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log database statement with timing
   */
  static dbQuery(
    logger: Logger,
    operation: string,
    table: string,
    duration: number,
    context?: LogContext
  ): void {
    logger.debug('Database Query', { operation, table, duration, ...context });
  }

  /**
   * Log performance metric
   */
  static performance(
    logger: Logger,
    operation: string,
    duration: number,
    success: boolean,
    context?: LogContext
  ): void {
    logger.info('Performance Metric', { operation, duration, success, ...context });
  }
}
