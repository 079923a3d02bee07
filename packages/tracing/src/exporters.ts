/**
 * @spanwise/tracing - Span Sinks
 * Destinations for exported span batches: OTLP over HTTP, console and memory
 */

import type { Logger } from "@spanwise/core";
import { createLogger } from "@spanwise/core";
import type { ExportConfig } from "@spanwise/types";
import { ExportError, TracingInitError } from "./errors.js";
import { getSpanDuration, recordedAttributes, spanToLogObject } from "./spans.js";
import type { Resource, Span, SpanAttributeValue, SpanKind } from "./types.js";

// ============================================================================
// SINK INTERFACE
// ============================================================================

/**
 * Receives finished spans from the batch processor.
 */
export interface SpanSink {
  /** Sink name */
  readonly name: string;
  /** Deliver one batch; rejects when delivery failed */
  send(batch: readonly Span[]): Promise<void>;
  /** Push out anything the sink buffers itself, within the given time */
  flush(timeoutMs: number): Promise<void>;
  /** Release resources held by the sink */
  shutdown?(): Promise<void>;
}

// ============================================================================
// CONSOLE SINK
// ============================================================================

/**
 * Options for the console sink.
 */
export interface ConsoleSinkOptions {
  /** Logger used when not pretty printing */
  logger?: Logger;
  /** Pretty print (default: true) */
  pretty?: boolean;
  /** Include attributes (default: true) */
  includeAttributes?: boolean;
  /** Include events (default: true) */
  includeEvents?: boolean;
}

/**
 * Console sink for development and debugging.
 * Prints one line per span, or a structured log entry when not pretty.
 */
export class ConsoleSink implements SpanSink {
  readonly name = "console";
  private readonly logger: Logger;
  private readonly pretty: boolean;
  private readonly includeAttributes: boolean;
  private readonly includeEvents: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: "trace-sink" });
    this.pretty = options.pretty ?? true;
    this.includeAttributes = options.includeAttributes ?? true;
    this.includeEvents = options.includeEvents ?? true;
  }

  async send(batch: readonly Span[]): Promise<void> {
    for (const span of batch) {
      const duration = getSpanDuration(span);

      if (this.pretty) {
        const indent = span.parentSpanId ? "  └─" : "──";
        const statusIcon = span.status === "error" ? "✗" : span.status === "ok" ? "✓" : "○";
        const durationStr = duration !== undefined ? `${duration}ms` : "?ms";

        console.log(
          `${indent} ${statusIcon} [${span.kind}] ${span.name} (${durationStr}) trace=${span.traceContext.traceId.slice(0, 8)}`
        );

        const attributes = recordedAttributes(span);
        if (this.includeAttributes && Object.keys(attributes).length > 0) {
          console.log(`     attributes:`, attributes);
        }

        if (this.includeEvents && span.events.length > 0) {
          for (const event of span.events) {
            console.log(`     event: ${event.name}`, event.attributes ?? "");
          }
        }
      } else {
        this.logger.info(`Span: ${span.name}`, spanToLogObject(span));
      }
    }
  }

  async flush(): Promise<void> {
    // Writes are synchronous
  }
}

// ============================================================================
// MEMORY SINK
// ============================================================================

/**
 * Keeps exported spans in memory. Used by tests and local tooling.
 */
export class InMemorySink implements SpanSink {
  readonly name = "memory";
  private readonly spans: Span[] = [];
  private batches = 0;
  private flushes = 0;

  async send(batch: readonly Span[]): Promise<void> {
    this.spans.push(...batch);
    this.batches++;
  }

  async flush(): Promise<void> {
    this.flushes++;
  }

  /** Spans received so far, in arrival order */
  getFinishedSpans(): readonly Span[] {
    return [...this.spans];
  }

  /** Number of `send` calls */
  get batchCount(): number {
    return this.batches;
  }

  /** Number of `flush` calls */
  get flushCount(): number {
    return this.flushes;
  }

  reset(): void {
    this.spans.length = 0;
    this.batches = 0;
    this.flushes = 0;
  }
}

/**
 * Discards every span. Used for the `none` exporter.
 */
export class NoopSink implements SpanSink {
  readonly name = "none";

  async send(): Promise<void> {}

  async flush(): Promise<void> {}
}

// ============================================================================
// OTLP SINK
// ============================================================================

/** Fetch implementation used by the OTLP sink */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Options for the OTLP sink.
 */
export interface OtlpHttpSinkOptions {
  /** OTLP endpoint URL; spans are posted to `{endpoint}/v1/traces` */
  endpoint: string;
  /** Service identity sent as resource attributes */
  resource: Resource;
  /** Custom headers */
  headers?: Record<string, string>;
  /** Per-request timeout in ms (default: 3000) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Logger */
  logger?: Logger;
}

const INSTRUMENTATION_SCOPE = {
  name: "@spanwise/tracing",
  version: "0.1.0",
};

/**
 * OTLP sink for production tracing.
 * Sends span batches to an OpenTelemetry collector as OTLP/HTTP JSON.
 */
export class OtlpHttpSink implements SpanSink {
  readonly name = "otlp";
  private readonly url: string;
  private readonly resource: Resource;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: OtlpHttpSinkOptions) {
    this.url = `${options.endpoint.replace(/\/+$/, "")}/v1/traces`;
    this.resource = options.resource;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 3_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger({ name: "otlp-sink" });
  }

  /** Collector URL spans are posted to */
  get targetUrl(): string {
    return this.url;
  }

  async send(batch: readonly Span[]): Promise<void> {
    if (batch.length === 0) return;

    const payload = buildOtlpPayload(this.resource, batch);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...this.headers,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ExportError(
          `OTLP export failed: ${response.status} ${response.statusText}`,
          this.name,
          batch.length
        );
      }

      this.logger.debug(`Exported ${batch.length} spans to OTLP`, { url: this.url });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async flush(): Promise<void> {
    // Each send completes its own request
  }
}

// ============================================================================
// OTLP ENCODING
// ============================================================================

/**
 * Build an OTLP/JSON trace export request body
 */
export function buildOtlpPayload(resource: Resource, spans: readonly Span[]): OtlpTracePayload {
  return {
    resourceSpans: [
      {
        resource: {
          attributes: [
            { key: "service.name", value: { stringValue: resource.serviceName } },
            { key: "service.version", value: { stringValue: resource.serviceVersion } },
          ],
        },
        scopeSpans: [
          {
            scope: INSTRUMENTATION_SCOPE,
            spans: spans.map(convertSpan),
          },
        ],
      },
    ],
  };
}

function convertSpan(span: Span): OtlpSpan {
  const otlpSpan: OtlpSpan = {
    traceId: span.traceContext.traceId,
    spanId: span.traceContext.spanId,
    name: span.name,
    kind: convertSpanKind(span.kind),
    startTimeUnixNano: String(span.startTime * 1_000_000),
    attributes: toOtlpAttributes(recordedAttributes(span)),
    events: span.events.map((event) => ({
      name: event.name,
      timeUnixNano: String(event.time * 1_000_000),
      attributes: event.attributes ? toOtlpAttributes(event.attributes) : [],
    })),
    status: {
      code: span.status === "error" ? 2 : span.status === "ok" ? 1 : 0,
    },
  };

  if (span.parentSpanId) {
    otlpSpan.parentSpanId = span.parentSpanId;
  }
  if (span.traceContext.traceState) {
    otlpSpan.traceState = span.traceContext.traceState;
  }
  if (span.endTime !== undefined) {
    otlpSpan.endTimeUnixNano = String(span.endTime * 1_000_000);
  }

  return otlpSpan;
}

function convertSpanKind(kind: SpanKind): number {
  switch (kind) {
    case "internal":
      return 1;
    case "server":
      return 2;
    case "client":
      return 3;
  }
}

function toOtlpAttributes(attributes: Record<string, SpanAttributeValue>): OtlpAttribute[] {
  return Object.entries(attributes).map(([key, value]) => ({
    key,
    value: convertAttributeValue(value),
  }));
}

function convertAttributeValue(value: SpanAttributeValue | string | number | boolean): OtlpAttributeValue {
  if (typeof value === "string") {
    return { stringValue: value };
  }
  if (typeof value === "number") {
    if (Number.isInteger(value)) {
      return { intValue: String(value) };
    }
    return { doubleValue: value };
  }
  if (typeof value === "boolean") {
    return { boolValue: value };
  }
  const values: Array<string | number | boolean> = [...value];
  return {
    arrayValue: {
      values: values.map((v) => convertAttributeValue(v)),
    },
  };
}

// ============================================================================
// SINK FACTORY
// ============================================================================

/**
 * Build the sink named by the export configuration.
 * Throws TracingInitError for unsupported settings.
 */
export function createSink(config: ExportConfig, resource: Resource, logger?: Logger): SpanSink {
  switch (config.exporter) {
    case "none":
      return new NoopSink();
    case "console":
      return new ConsoleSink(logger ? { logger } : {});
    case "otlp": {
      if (config.protocol !== "http/json") {
        throw new TracingInitError(`Unsupported OTLP protocol "${config.protocol}"`, {
          protocol: config.protocol,
          supported: ["http/json"],
        });
      }
      return new OtlpHttpSink({
        endpoint: config.endpoint,
        resource,
        headers: config.headers,
        timeoutMs: config.timeoutMs,
        ...(logger ? { logger } : {}),
      });
    }
  }
}

// ============================================================================
// OTLP TYPES
// ============================================================================

export interface OtlpTracePayload {
  resourceSpans: Array<{
    resource: {
      attributes: OtlpAttribute[];
    };
    scopeSpans: Array<{
      scope: {
        name: string;
        version: string;
      };
      spans: OtlpSpan[];
    }>;
  }>;
}

export interface OtlpSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  traceState?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano?: string;
  attributes: OtlpAttribute[];
  events: Array<{
    name: string;
    timeUnixNano: string;
    attributes: OtlpAttribute[];
  }>;
  status: {
    code: number;
  };
}

interface OtlpAttribute {
  key: string;
  value: OtlpAttributeValue;
}

interface OtlpAttributeValue {
  stringValue?: string;
  intValue?: string;
  doubleValue?: number;
  boolValue?: boolean;
  arrayValue?: {
    values: OtlpAttributeValue[];
  };
}
