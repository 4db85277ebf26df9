/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for better error handling and debugging.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
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
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code: string = 'VALIDATION_ERROR') {
    super(message, code, context);
  }
}

/**
 * Phone number text that does not match the North American pattern
 */
export class InvalidPhoneNumberError extends ValidationError {
  public readonly phone: string;

  constructor(phone: string) {
    super(`Invalid phone number: ${phone}`, { phone }, 'INVALID_PHONE_NUMBER');
    this.phone = phone;
  }
}

/**
 * Token and label pair as reported by a tagger, before the label is checked
 * against the known vocabulary.
 */
export interface RawTaggedToken {
  text: string;
  label: string;
}

/**
 * Tagger could not map its labels onto fields uniquely.
 *
 * Carries the ordered token sequence the tagger computed before giving up, so
 * the caller can reconcile it.
 */
export class AmbiguousTaggingError extends AppError {
  public readonly tokens: readonly RawTaggedToken[];

  constructor(tokens: readonly RawTaggedToken[], context?: Record<string, unknown>) {
    const labels = Array.from(new Set(tokens.map((t) => t.label)));
    super('Tagger produced a repeated label', 'AMBIGUOUS_TAGGING', { labels, ...context });
    this.tokens = tokens;
  }
}

/**
 * A tagger emitted a label outside the known vocabulary
 */
export class UnknownLabelError extends AppError {
  constructor(label: string, context?: Record<string, unknown>) {
    super(`Unknown tagger label '${label}'`, 'UNKNOWN_LABEL', { label, ...context }, false);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
