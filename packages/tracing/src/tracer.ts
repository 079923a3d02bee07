/**
 * @spanwise/tracing - Tracer
 * High-level API for spans inside request handling
 */

import { defaultContextManager, type TraceContextManager } from "./context.js";
import { closeSpan, getTracerProvider } from "./provider.js";
import {
  addEvent,
  createSpan,
  recordException,
  setAttribute,
  setStatus,
} from "./spans.js";
import type { Span, SpanAttributeMap, SpanAttributeValue, SpanKind, TraceContext } from "./types.js";

export interface StartSpanOptions {
  /** Span kind (default: internal) */
  kind?: SpanKind;
  /** Parent context (default: the active span) */
  parent?: TraceContext;
  /** Initial attributes */
  attributes?: SpanAttributeMap;
}

/**
 * Creates spans that nest under the active scope.
 *
 * @example
 * ```typescript
 * const tracer = getTracer();
 * const user = await tracer.trace('load-user', async (span) => {
 *   tracer.setAttribute('user.id', id);
 *   return repo.find(id);
 * });
 * ```
 */
export class Tracer {
  constructor(private readonly contextManager: TraceContextManager = defaultContextManager) {}

  /**
   * Start a new span.
   * The span is not made active; use `trace` for that.
   */
  startSpan(name: string, options: StartSpanOptions = {}): Span {
    return createSpan({
      name,
      kind: options.kind ?? "internal",
      parent: options.parent ?? this.contextManager.current(),
      attributes: options.attributes ?? {},
      resource: getTracerProvider()?.resource,
    });
  }

  /**
   * End a span and hand it to the export pipeline
   */
  endSpan(span: Span, error?: unknown): void {
    if (error !== undefined) {
      recordException(span, error);
      setStatus(span, "error");
    } else if (span.status === "unset") {
      setStatus(span, "ok");
    }
    closeSpan(span);
  }

  /**
   * Run a function inside a new child span of the active one
   */
  async trace<T>(
    name: string,
    fn: (span: Span) => Promise<T> | T,
    options: Omit<StartSpanOptions, "parent"> = {}
  ): Promise<T> {
    const span = this.startSpan(name, options);

    try {
      const result = await this.contextManager.run(span, () => fn(span));
      this.endSpan(span);
      return result;
    } catch (error) {
      this.endSpan(span, error);
      throw error;
    }
  }

  /**
   * Get the active span
   */
  currentSpan(): Span | undefined {
    return this.contextManager.active();
  }

  /**
   * Get the trace ID of the active span
   */
  currentTraceId(): string | undefined {
    return this.contextManager.current()?.traceId;
  }

  /**
   * Add attribute to current span
   */
  setAttribute(key: string, value: SpanAttributeValue): void {
    const span = this.contextManager.active();
    if (span) {
      setAttribute(span, key, value);
    }
  }

  /**
   * Add event to current span
   */
  addEvent(name: string, attributes?: Record<string, SpanAttributeValue>): void {
    const span = this.contextManager.active();
    if (span) {
      addEvent(span, name, attributes);
    }
  }
}

const defaultTracer = new Tracer();

/**
 * Get the tracer bound to the process scope
 */
export function getTracer(): Tracer {
  return defaultTracer;
}
