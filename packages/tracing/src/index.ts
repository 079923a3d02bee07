/**
 * @module
 * Request tracing for HTTP services: W3C trace context propagation, one
 * server span per request, outcome classification and batched export.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { initTracing, installShutdownHooks, tracing, type TracingEnv } from '@spanwise/tracing';
 *
 * const guard = initTracing({ serviceName: 'hello-api', serviceVersion: '0.1.0' });
 *
 * const app = new Hono<TracingEnv>();
 * app.use('*', tracing());
 * app.get('/hello/:name', (c) => c.text(`Hello, ${c.req.param('name')}!`));
 *
 * installShutdownHooks(guard);
 * ```
 */

// Types
export type {
  TraceContext,
  Span,
  SpanKind,
  SpanStatus,
  SpanAttributeValue,
  SpanAttributeMap,
  SpanEvent,
  Resource,
} from "./types.js";

// Carrier
export {
  HeadersCarrier,
  RecordCarrier,
  toCarrier,
  type Carrier,
  type HeaderRecord,
} from "./carrier.js";

// Context
export {
  generateTraceId,
  generateSpanId,
  createTraceContext,
  createChildContext,
  TraceFlags,
  TraceContextManager,
  defaultContextManager,
  INVALID_TRACE_ID,
  INVALID_SPAN_ID,
} from "./context.js";

// Propagation
export {
  parseTraceparent,
  formatTraceparent,
  W3CTraceContextPropagator,
  NoopPropagator,
  TRACEPARENT_HEADER,
  TRACESTATE_HEADER,
  type TextMapPropagator,
} from "./propagation.js";

// Spans
export {
  createSpan,
  record,
  setAttribute,
  setStatus,
  addEvent,
  recordException,
  endSpan,
  isSpanOpen,
  getSpanDuration,
  recordedAttributes,
  spanToLogObject,
  SpanAttributes,
  type SpanOptions,
} from "./spans.js";

// Span factory
export {
  SpanFactory,
  UNKNOWN_ROUTE,
  DEFAULT_PROTOCOL_VERSION,
  type RequestMetadata,
  type SpanFactoryOptions,
  type HttpSpanKind,
} from "./factory.js";

// Response classifier
export { classifyStatus, onResponse, onFailure, type StatusClassification } from "./classifier.js";

// Configuration
export {
  DEFAULT_EXPORT_CONFIG,
  DEFAULT_BATCH_CONFIG,
  loadExportConfigFromEnv,
  resolveExportConfig,
  parseHeaderList,
  type ExportOptions,
  type EnvExportConfig,
} from "./config.js";

// Sinks
export {
  ConsoleSink,
  InMemorySink,
  NoopSink,
  OtlpHttpSink,
  buildOtlpPayload,
  createSink,
  type SpanSink,
  type ConsoleSinkOptions,
  type OtlpHttpSinkOptions,
  type OtlpTracePayload,
  type OtlpSpan,
  type FetchFn,
} from "./exporters.js";

// Batch processor
export {
  BatchSpanProcessor,
  type BatchSpanProcessorOptions,
  type BatchSpanProcessorStats,
  type FlushOutcome,
} from "./processor.js";

// Provider lifecycle
export {
  TracerProvider,
  ShutdownGuard,
  initTracing,
  withTracing,
  installShutdownHooks,
  getTracerProvider,
  getPropagator,
  setGlobalPropagator,
  resetTracing,
  closeSpan,
  type TracingOptions,
  type ShutdownHookOptions,
} from "./provider.js";

// Tracer
export { Tracer, getTracer, type StartSpanOptions } from "./tracer.js";

// Middleware
export {
  instrumentRequest,
  instrumentFetchHandler,
  requestMetadataFromRequest,
  type InstrumentOptions,
} from "./middleware.js";

// Hono
export {
  tracing,
  type TracingEnv,
  type TracingVariables,
  type HonoTracingOptions,
} from "./hono.js";

// Outgoing requests
export { createTracedFetch, type TracedFetchOptions, type FetchLike } from "./client.js";

// Log correlation
export { traceLogFields } from "./logging.js";

// Errors and timeouts
export { TracingInitError, ExportError, TimeoutExceededError } from "./errors.js";
export { executeWithTimeout } from "./timeout.js";
