/**
 * Centralized Logging System
 * ==========================
 * Package-aware logging with namespaces.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@addrkit/utils';
 *
 * const logger = createPackageLogger('@addrkit/address');
 * logger.debug('Recovered from ambiguous tagging', { removed: ['addr:unit'] });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
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
 * Get all registered package loggers
 */
export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log fields dropped from a parse result
   */
  static droppedFields(
    logger: Logger,
    stage: 'reconcile' | 'validate',
    fields: readonly string[],
    context?: LogContext
  ): void {
    if (fields.length === 0) {
      return;
    }
    logger.debug('Dropped address fields', { stage, fields: [...fields], ...context });
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
    logger.debug('Performance Metric', { operation, duration, success, ...context });
  }
}

export type { LogContext };
