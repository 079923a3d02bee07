/**
 * @spanwise/tracing - Configuration
 * Export defaults, environment loading and validation
 */

import { ValidationError, getEnv, getEnvNumber } from "@spanwise/core";
import {
  exportConfig,
  validateWithSchema,
  type BatchConfig,
  type ExportConfig,
  type ExporterKind,
  type ExportProtocol,
  type QueueFullPolicy,
} from "@spanwise/types";

// ============================================================================
// DEFAULT CONFIGURATIONS
// ============================================================================

/**
 * Default batch processor configuration.
 * Exports every 5s or once 512 spans are queued; drops new spans when full.
 */
export const DEFAULT_BATCH_CONFIG: BatchConfig = {
  maxQueueSize: 2048,
  maxExportBatchSize: 512,
  scheduledDelayMs: 5_000,
  queueFullPolicy: "drop-newest",
};

/**
 * Default export configuration.
 * OTLP over HTTP/JSON to a local collector with a 3s export timeout.
 */
export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  exporter: "otlp",
  endpoint: "http://localhost:4318",
  protocol: "http/json",
  headers: {},
  timeoutMs: 3_000,
  batch: DEFAULT_BATCH_CONFIG,
  shutdownTimeoutMs: 5_000,
};

// ============================================================================
// CONFIG LAYERS
// ============================================================================

/**
 * Export options given in code; each field overrides environment and defaults
 */
export interface ExportOptions {
  exporter?: ExporterKind | undefined;
  endpoint?: string | undefined;
  protocol?: ExportProtocol | undefined;
  headers?: Record<string, string> | undefined;
  timeoutMs?: number | undefined;
  batch?: {
    maxQueueSize?: number | undefined;
    maxExportBatchSize?: number | undefined;
    scheduledDelayMs?: number | undefined;
    queueFullPolicy?: QueueFullPolicy | undefined;
  } | undefined;
  shutdownTimeoutMs?: number | undefined;
}

/**
 * Export settings read from the environment.
 * Values are unchecked until the merged config is validated.
 */
export interface EnvExportConfig {
  exporter: string | undefined;
  endpoint: string | undefined;
  protocol: string | undefined;
  headers: Record<string, string> | undefined;
  timeoutMs: number | undefined;
  batch: {
    maxQueueSize: number | undefined;
    maxExportBatchSize: number | undefined;
    scheduledDelayMs: number | undefined;
  };
}

/**
 * Parse a `key=value,key2=value2` header list
 */
export function parseHeaderList(value: string | undefined): Record<string, string> | undefined {
  if (!value) return undefined;

  const headers: Record<string, string> = {};
  for (const pair of value.split(",")) {
    const index = pair.indexOf("=");
    if (index <= 0) continue;
    const key = pair.slice(0, index).trim();
    const val = pair.slice(index + 1).trim();
    if (key) {
      headers[key] = decodeURIComponent(val);
    }
  }
  return headers;
}

/**
 * Load export settings from OTEL_* environment variables
 */
export function loadExportConfigFromEnv(): EnvExportConfig {
  return {
    exporter: getEnv("OTEL_TRACES_EXPORTER"),
    endpoint: getEnv("OTEL_EXPORTER_OTLP_ENDPOINT"),
    protocol: getEnv("OTEL_EXPORTER_OTLP_PROTOCOL"),
    headers: parseHeaderList(getEnv("OTEL_EXPORTER_OTLP_HEADERS")),
    timeoutMs: getEnvNumber("OTEL_EXPORTER_OTLP_TIMEOUT"),
    batch: {
      maxQueueSize: getEnvNumber("OTEL_BSP_MAX_QUEUE_SIZE"),
      maxExportBatchSize: getEnvNumber("OTEL_BSP_MAX_EXPORT_BATCH_SIZE"),
      scheduledDelayMs: getEnvNumber("OTEL_BSP_SCHEDULE_DELAY"),
    },
  };
}

// ============================================================================
// CONFIG UTILITIES
// ============================================================================

/**
 * Resolve the export configuration: defaults, then environment, then options.
 * Throws a ValidationError when the merged result is unusable.
 */
export function resolveExportConfig(
  options: ExportOptions = {},
  env: EnvExportConfig = loadExportConfigFromEnv()
): ExportConfig {
  const defaults = DEFAULT_EXPORT_CONFIG;

  const candidate = {
    exporter: options.exporter ?? env.exporter ?? defaults.exporter,
    endpoint: options.endpoint ?? env.endpoint ?? defaults.endpoint,
    protocol: options.protocol ?? env.protocol ?? defaults.protocol,
    headers: { ...defaults.headers, ...env.headers, ...options.headers },
    timeoutMs: options.timeoutMs ?? env.timeoutMs ?? defaults.timeoutMs,
    batch: {
      maxQueueSize:
        options.batch?.maxQueueSize ?? env.batch.maxQueueSize ?? defaults.batch.maxQueueSize,
      maxExportBatchSize:
        options.batch?.maxExportBatchSize ??
        env.batch.maxExportBatchSize ??
        defaults.batch.maxExportBatchSize,
      scheduledDelayMs:
        options.batch?.scheduledDelayMs ??
        env.batch.scheduledDelayMs ??
        defaults.batch.scheduledDelayMs,
      queueFullPolicy: options.batch?.queueFullPolicy ?? defaults.batch.queueFullPolicy,
    },
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? defaults.shutdownTimeoutMs,
  };

  const config = validateWithSchema(exportConfig, candidate);

  if (config.batch.maxExportBatchSize > config.batch.maxQueueSize) {
    throw new ValidationError("Validation failed: batch size exceeds queue size", [
      {
        field: "batch.maxExportBatchSize",
        message: `must be at most maxQueueSize (${config.batch.maxQueueSize})`,
      },
    ]);
  }

  return config;
}
