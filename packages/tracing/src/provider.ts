/**
 * @spanwise/tracing - Tracer Provider
 * Process-wide registration, initialization and shutdown
 */

import type { Logger } from "@spanwise/core";
import { createLogger } from "@spanwise/core";
import { resourceIdentity, validateWithSchema } from "@spanwise/types";
import { resolveExportConfig, type ExportOptions } from "./config.js";
import { TracingInitError } from "./errors.js";
import { createSink, type SpanSink } from "./exporters.js";
import { BatchSpanProcessor, type FlushOutcome } from "./processor.js";
import {
  NoopPropagator,
  W3CTraceContextPropagator,
  type TextMapPropagator,
} from "./propagation.js";
import { endSpan } from "./spans.js";
import type { Resource, Span } from "./types.js";

// ============================================================================
// TRACER PROVIDER
// ============================================================================

/**
 * Owns the resource and the batch processor of one tracing setup
 */
export class TracerProvider {
  constructor(
    readonly resource: Resource,
    readonly processor: BatchSpanProcessor
  ) {}

  /**
   * Hand a closed span to the export pipeline
   */
  onEnd(span: Span): void {
    this.processor.onEnd(span);
  }

  forceFlush(timeoutMs?: number): Promise<FlushOutcome> {
    return this.processor.forceFlush(timeoutMs);
  }

  shutdown(): Promise<FlushOutcome> {
    return this.processor.shutdown();
  }
}

// ============================================================================
// GLOBAL REGISTRATION
// ============================================================================

let registeredProvider: TracerProvider | undefined;
let globalPropagator: TextMapPropagator = new NoopPropagator();

/**
 * Get the registered provider
 */
export function getTracerProvider(): TracerProvider | undefined {
  return registeredProvider;
}

/**
 * Get the global propagator.
 * A no-op propagator until tracing is initialized.
 */
export function getPropagator(): TextMapPropagator {
  return globalPropagator;
}

/**
 * Replace the global propagator
 */
export function setGlobalPropagator(propagator: TextMapPropagator): void {
  globalPropagator = propagator;
}

/**
 * Clear global registration without flushing (for testing)
 */
export function resetTracing(): void {
  registeredProvider = undefined;
  globalPropagator = new NoopPropagator();
}

/**
 * Close a span and hand it to the registered provider.
 * Spans closed before tracing is initialized are discarded.
 *
 * @returns `false` when the span was already closed
 */
export function closeSpan(span: Span): boolean {
  if (!endSpan(span)) return false;
  registeredProvider?.onEnd(span);
  return true;
}

// ============================================================================
// INITIALIZATION
// ============================================================================

export interface TracingOptions {
  /** Service name reported as `service.name` */
  serviceName: string;
  /** Service version reported as `service.version` */
  serviceVersion: string;
  /** Export settings; override environment and defaults */
  export?: ExportOptions;
  /** Sink to use instead of the one named by the export settings */
  sink?: SpanSink | undefined;
  /** Logger */
  logger?: Logger;
}

/**
 * Scoped handle returned by `initTracing`.
 * Releasing it drains queued spans through the sink and unregisters the
 * provider.
 */
export class ShutdownGuard {
  private releasePromise: Promise<FlushOutcome> | undefined;

  constructor(
    readonly provider: TracerProvider,
    private readonly logger: Logger
  ) {}

  get released(): boolean {
    return this.releasePromise !== undefined;
  }

  /**
   * Flush and shut down. Bounded by `shutdownTimeoutMs`; never rejects.
   * Later calls return the first call's outcome.
   */
  release(): Promise<FlushOutcome> {
    this.releasePromise ??= this.runRelease();
    return this.releasePromise;
  }

  private async runRelease(): Promise<FlushOutcome> {
    const outcome = await this.provider.shutdown();

    if (registeredProvider === this.provider) {
      registeredProvider = undefined;
    }

    if (outcome === "completed") {
      this.logger.debug("Tracing shut down", { stats: this.provider.processor.getStats() });
    } else {
      this.logger.warn("Tracing shut down before all spans were exported", {
        outcome,
        stats: this.provider.processor.getStats(),
      });
    }

    return outcome;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Initialize tracing for the process.
 *
 * Validates identity and export settings, builds the sink and batch
 * processor, then registers the W3C propagator and the provider. When any
 * step fails a TracingInitError is thrown and nothing is registered.
 * Calling it again replaces the registered provider; the previous one is
 * not shut down.
 *
 * @example
 * ```typescript
 * const guard = initTracing({ serviceName: 'hello-api', serviceVersion: '0.1.0' });
 * try {
 *   await serve();
 * } finally {
 *   await guard.release();
 * }
 * ```
 */
export function initTracing(options: TracingOptions): ShutdownGuard {
  const logger = options.logger ?? createLogger({ name: "tracing" });

  let resource: Resource;
  let sink: SpanSink;
  let processor: BatchSpanProcessor;

  try {
    const identity = validateWithSchema(resourceIdentity, {
      serviceName: options.serviceName,
      serviceVersion: options.serviceVersion,
    });
    resource = Object.freeze({
      serviceName: identity.serviceName,
      serviceVersion: identity.serviceVersion,
    });

    const config = resolveExportConfig(options.export);
    sink = options.sink ?? createSink(config, resource, logger);
    processor = new BatchSpanProcessor({
      sink,
      batch: config.batch,
      exportTimeoutMs: config.timeoutMs,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      logger,
    });
  } catch (error) {
    if (error instanceof TracingInitError) {
      throw error;
    }
    throw new TracingInitError(
      `Failed to initialize tracing: ${describeError(error)}`,
      { serviceName: options.serviceName },
      { cause: error }
    );
  }

  setGlobalPropagator(new W3CTraceContextPropagator());

  const provider = new TracerProvider(resource, processor);
  if (registeredProvider) {
    logger.warn("Tracing initialized again, replacing the registered provider", {
      previous: registeredProvider.resource.serviceName,
      current: resource.serviceName,
    });
  }
  registeredProvider = provider;

  logger.info("Tracing initialized", {
    service: resource.serviceName,
    version: resource.serviceVersion,
    sink: sink.name,
  });

  return new ShutdownGuard(provider, logger);
}

/**
 * Run `main` with tracing initialized; the guard is released on every exit path
 */
export async function withTracing<T>(
  options: TracingOptions,
  main: (guard: ShutdownGuard) => Promise<T>
): Promise<T> {
  const guard = initTracing(options);
  try {
    return await main(guard);
  } finally {
    await guard.release();
  }
}

// ============================================================================
// PROCESS HOOKS
// ============================================================================

export interface ShutdownHookOptions {
  /** Signals to listen for (default: SIGINT, SIGTERM) */
  signals?: NodeJS.Signals[];
  /** Called after release (default: process.exit) */
  exit?: (code: number) => void;
  /** Logger */
  logger?: Logger;
}

/**
 * Release the guard when the process is asked to stop.
 * Exits with 1 only when the sink's flush failed.
 *
 * @returns a function that removes the listeners
 */
export function installShutdownHooks(
  guard: ShutdownGuard,
  options: ShutdownHookOptions = {}
): () => void {
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const logger = options.logger ?? createLogger({ name: "tracing" });

  const handler = (signal: NodeJS.Signals): void => {
    logger.info("Shutting down tracing", { signal });
    guard.release().then(
      // A timed-out flush has already been reported by the guard
      (outcome) => exit(outcome === "failed" ? 1 : 0),
      (error: unknown) => {
        logger.error("Tracing shutdown failed", error);
        exit(1);
      }
    );
  };

  for (const signal of signals) {
    process.once(signal, handler);
  }

  return () => {
    for (const signal of signals) {
      process.removeListener(signal, handler);
    }
  };
}
