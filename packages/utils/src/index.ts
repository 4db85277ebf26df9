/**
 * @addrkit/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Logger and logging utilities
export { Logger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, getPackageLoggers, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
