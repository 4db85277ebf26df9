/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and other
 * environment-based settings.
 */

import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevelName;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const loggingEnvSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional(),
  LOG_CONSOLE: booleanFlag(true),
  LOG_FILE: booleanFlag(false),
  LOG_DIR: z.string().min(1).optional(),
  LOG_MAX_FILES: z.string().min(1).default('14d'),
  LOG_MAX_SIZE: z.string().min(1).default('20m'),
  NODE_ENV: z.string().optional(),
});

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(
  env: Record<string, string | undefined> = process.env
): LoggingConfig {
  const parsed = loggingEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const configKey = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      `Invalid logging configuration${configKey ? `: ${configKey}` : ''}`,
      configKey,
      { issues: parsed.error.issues.map((i) => i.message) }
    );
  }

  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } =
    parsed.data;

  return {
    level: LOG_LEVEL ?? (NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: LOG_CONSOLE,
    enableFile: LOG_FILE,
    logDir: LOG_DIR ?? join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES,
    maxSize: LOG_MAX_SIZE,
  };
}
