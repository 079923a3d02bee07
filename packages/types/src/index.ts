/**
 * @module
 * Validation schemas for spanwise, built on ArkType for runtime validation
 * with inferred TypeScript types.
 *
 * @example
 * ```typescript
 * import { exportConfig, validateWithSchema } from '@spanwise/types';
 *
 * // Throws a ValidationError listing every failing field
 * const config = validateWithSchema(exportConfig, input);
 * ```
 */

import { type, type Type } from "arktype";
import { ValidationError, type ValidationErrorDetail } from "@spanwise/core";

export { type } from "arktype";
export type { Type } from "arktype";

export * from "./common.js";
export * from "./tracing.js";

// ============================================================================
// Validation Helpers
// ============================================================================

function toDetails(errors: type.errors): ValidationErrorDetail[] {
  return errors.map((e) => ({
    field: e.path.map(String).join(".") || "root",
    message: e.message,
  }));
}

/**
 * Validate data against an ArkType schema.
 * Returns the validated data or throws a ValidationError.
 *
 * @example
 * ```typescript
 * const identity = validateWithSchema(resourceIdentity, { serviceName, serviceVersion });
 * ```
 */
export function validateWithSchema<T extends Type>(
  schema: T,
  data: unknown
): T["infer"] {
  const result = schema(data);

  if (result instanceof type.errors) {
    throw new ValidationError(`Validation failed: ${result.summary}`, toDetails(result));
  }

  return result;
}
