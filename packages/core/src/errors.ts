/**
 * @module
 * Error classes shared by all spanwise packages.
 *
 * @example
 * ```typescript
 * import { ValidationError } from '@spanwise/core';
 *
 * throw new ValidationError('Invalid export config', [{ field: 'timeoutMs', message: 'must be positive' }]);
 * ```
 */

/**
 * Base error class for all spanwise errors.
 * Carries a machine-readable code and optional details.
 *
 * @example
 * ```typescript
 * throw new SpanwiseError('Something went wrong', 'CUSTOM_ERROR', { extra: 'info' });
 * ```
 */
export class SpanwiseError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SpanwiseError";
    this.code = code;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/** Input failed schema validation with one or more field errors */
export class ValidationError extends SpanwiseError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[],
    details?: Record<string, unknown>
  ) {
    super(message, "VALIDATION_ERROR", { ...details, errors });
    this.name = "ValidationError";
  }
}
