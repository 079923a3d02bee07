/**
 * @spanwise/tracing - Log Correlation
 */

import { defaultContextManager, type TraceContextManager } from "./context.js";

/**
 * Fields identifying the active span, for use as a logger mixin.
 * Empty outside of a span.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'api', mixin: traceLogFields });
 * ```
 */
export function traceLogFields(
  contextManager: TraceContextManager = defaultContextManager
): Record<string, unknown> {
  const ctx = contextManager.current();
  if (!ctx) return {};
  return { traceId: ctx.traceId, spanId: ctx.spanId };
}
