/**
 * @fxledger/utils
 *
 * Logging, configuration and error handling shared by the fxledger packages.
 */

export { Logger, createLogger, createWinstonLogger, loggerConfigFromEnv, logger, winstonLogger } from './logger.js';
export type { LogContext, LoggerConfig } from './logger.js';
export { createPackageLogger, LogHelpers } from './logging/index.js';
export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
export {
  getFxLedgerConfig,
  defaultSqlitePath,
  resolveSourcePriority,
  DEFAULT_SOURCE_PRIORITY,
} from './config/index.js';
export type { FxLedgerConfig } from './config/index.js';
