/**
 * Structured Logging System
 * =========================
 * Winston-backed logging with structured output, log rotation and context
 * propagation. Components take a `Logger` through their constructor; the
 * package loggers below are only defaults.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  source?: string;
  metal?: string;
  backend?: string;
  table?: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

export function loggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: env.LOG_CONSOLE !== 'false',
    enableFile: env.LOG_FILE !== 'false',
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable console output for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

export function createWinstonLogger(config: LoggerConfig = loggerConfigFromEnv()): winston.Logger {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
        level: config.level,
      })
    );
  }

  // No file logging under test
  if (config.enableFile && process.env.NODE_ENV !== 'test') {
    if (!fs.existsSync(config.logDir)) {
      fs.mkdirSync(config.logDir, { recursive: true });
    }

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );
  }

  return winston.createLogger({
    level: config.level,
    format: structuredFormat,
    defaultMeta: { service: 'fxledger' },
    transports,
    silent: transports.length === 0,
    exitOnError: false,
  });
}

const winstonLogger = createWinstonLogger();

/**
 * Logger with context support and package namespacing
 */
class Logger {
  private context: LogContext = {};
  private namespace: string = 'fxledger';
  private readonly sink: winston.Logger;

  constructor(namespace?: string, sink: winston.Logger = winstonLogger) {
    if (namespace) {
      this.namespace = namespace;
    }
    this.sink = sink;
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      this.sink.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error !== undefined) {
      this.sink.error(message, { ...logContext, error });
    } else {
      this.sink.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.sink.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    this.sink.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    this.sink.debug(message, this.mergeContext(context));
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace, this.sink);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('fxledger');

export { Logger };

export { winstonLogger };
