/**
 * @module
 * Validation schemas for tracer configuration: export pipeline settings and
 * the resource identity attached to every span.
 *
 * @example
 * ```typescript
 * import { exportConfig, validateWithSchema } from '@spanwise/types';
 *
 * const config = validateWithSchema(exportConfig, candidate);
 * ```
 */

import { type } from "arktype";
import { nonEmptyString, positiveInt, url } from "./common.js";

// ============================================================================
// Export Pipeline
// ============================================================================

/** Which sink receives exported spans */
export const exporterKind = type("'otlp' | 'console' | 'none'");

/** Wire protocol used by the OTLP sink */
export const exportProtocol = type("'http/json' | 'grpc'");

/** What the batch processor does with a span when its queue is full */
export const queueFullPolicy = type("'drop-newest' | 'drop-oldest'");

/** Batch processor settings */
export const batchConfig = type({
  maxQueueSize: positiveInt,
  maxExportBatchSize: positiveInt,
  scheduledDelayMs: positiveInt,
  queueFullPolicy: queueFullPolicy,
});

/** Complete export configuration */
export const exportConfig = type({
  exporter: exporterKind,
  endpoint: url,
  protocol: exportProtocol,
  headers: "Record<string, string>",
  timeoutMs: positiveInt,
  batch: batchConfig,
  shutdownTimeoutMs: positiveInt,
});

// ============================================================================
// Resource
// ============================================================================

/** Service identity attached to all spans of a process */
export const resourceIdentity = type({
  serviceName: nonEmptyString,
  serviceVersion: nonEmptyString,
});

// ============================================================================
// Types
// ============================================================================

export type ExporterKind = typeof exporterKind.infer;
export type ExportProtocol = typeof exportProtocol.infer;
export type QueueFullPolicy = typeof queueFullPolicy.infer;
export type BatchConfig = typeof batchConfig.infer;
export type ExportConfig = typeof exportConfig.infer;
export type ResourceIdentity = typeof resourceIdentity.infer;
