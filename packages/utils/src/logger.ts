/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation
 * and per-package namespaces.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getLoggingConfig } from './config/index.js';

// Log context interface
export interface LogContext {
  field?: string;
  input?: string;
  [key: string]: unknown;
}

const config = getLoggingConfig();

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

// Create transports array
const transports: winston.transport[] = [];

// Console transport
if (config.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: config.level,
      silent: process.env.NODE_ENV === 'test',
    })
  );
}

// File transports with rotation
// Skip file logging in test environment to avoid file system issues
if (config.enableFile && process.env.NODE_ENV !== 'test') {
  if (!fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  // Error log file
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

  // Combined log file
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

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'addrkit' },
  transports,
  // Don't exit on handled exceptions
  exitOnError: false,
});

// Logger class with package namespacing
class Logger {
  private readonly namespace: string;

  /**
   * Create a logger with a specific namespace (package name)
   */
  constructor(namespace: string) {
    this.namespace = namespace;
  }

  getNamespace(): string {
    return this.namespace;
  }

  /**
   * Merge context for a single log call, including namespace
   */
  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...additionalContext,
    };
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export { Logger };

// Transport-level logger; tests spy on it
export { winstonLogger };
