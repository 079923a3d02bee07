/**
 * @spanwise/tracing - Batch Span Processor
 * Bounded queue between request handling and the span sink
 */

import type { Logger } from "@spanwise/core";
import { createLogger, logError } from "@spanwise/core";
import type { BatchConfig } from "@spanwise/types";
import { ExportError, TimeoutExceededError } from "./errors.js";
import type { SpanSink } from "./exporters.js";
import { executeWithTimeout } from "./timeout.js";
import type { Span } from "./types.js";

/**
 * How a flush ended.
 * - "completed": every queued span went through the sink
 * - "timed_out": the deadline passed first; remaining spans may be lost
 * - "failed": the sink's own flush rejected
 */
export type FlushOutcome = "completed" | "timed_out" | "failed";

export interface BatchSpanProcessorOptions {
  /** Destination for span batches */
  sink: SpanSink;
  /** Queue and batching settings */
  batch: BatchConfig;
  /** Upper bound for one `send` call in ms */
  exportTimeoutMs: number;
  /** Upper bound for a flush or shutdown in ms */
  shutdownTimeoutMs: number;
  /** Logger */
  logger?: Logger;
}

export interface BatchSpanProcessorStats {
  /** Spans waiting in the queue */
  queued: number;
  /** Spans handed to the sink successfully */
  exported: number;
  /** Spans discarded because the queue was full */
  dropped: number;
  /** Spans lost with a failed batch */
  failed: number;
}

/**
 * Collects finished spans and exports them in batches.
 *
 * `onEnd` only enqueues and never waits for the sink. Exports run one at a
 * time, either on the schedule or as soon as a full batch is queued. At most
 * one export waits behind the running one, however slow the sink. A full
 * queue discards spans according to `queueFullPolicy`.
 */
export class BatchSpanProcessor {
  private readonly sink: SpanSink;
  private readonly config: BatchConfig;
  private readonly exportTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly logger: Logger;
  private readonly queue: Span[] = [];
  private exportChain: Promise<void> = Promise.resolve();
  /** An export is chained but has not started yet */
  private exportPending = false;
  private timer: ReturnType<typeof setInterval> | undefined;
  private shutdownPromise: Promise<FlushOutcome> | undefined;
  private dropWarned = false;
  private stats = { exported: 0, dropped: 0, failed: 0 };

  constructor(options: BatchSpanProcessorOptions) {
    this.sink = options.sink;
    this.config = options.batch;
    this.exportTimeoutMs = options.exportTimeoutMs;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.logger = options.logger ?? createLogger({ name: "span-processor" });

    this.timer = setInterval(() => this.scheduleExport(), this.config.scheduledDelayMs);
    this.timer.unref();
  }

  /**
   * Hand a finished span to the processor
   */
  onEnd(span: Span): void {
    if (this.shutdownPromise) {
      this.logger.debug("Span ended after shutdown, discarding", { name: span.name });
      return;
    }

    if (this.queue.length >= this.config.maxQueueSize) {
      this.stats.dropped++;
      if (this.config.queueFullPolicy === "drop-oldest") {
        this.queue.shift();
        this.queue.push(span);
      }
      if (!this.dropWarned) {
        this.dropWarned = true;
        this.logger.warn("Span queue full, dropping spans", {
          policy: this.config.queueFullPolicy,
          maxQueueSize: this.config.maxQueueSize,
          droppedTotal: this.stats.dropped,
        });
      }
    } else {
      this.queue.push(span);
    }

    if (this.queue.length >= this.config.maxExportBatchSize) {
      this.scheduleExport();
    }
  }

  /**
   * Export everything queued and flush the sink, bounded by `timeoutMs`.
   * Never rejects.
   */
  async forceFlush(timeoutMs: number = this.shutdownTimeoutMs): Promise<FlushOutcome> {
    const deadline = Date.now() + timeoutMs;

    try {
      await executeWithTimeout(async () => {
        await this.drain();
        await this.sink.flush(Math.max(0, deadline - Date.now()));
      }, timeoutMs);
      return "completed";
    } catch (error) {
      if (error instanceof TimeoutExceededError) {
        this.logger.warn("Span flush timed out", {
          timeoutMs,
          queued: this.queue.length,
        });
        return "timed_out";
      }
      logError(this.logger, error, "Span sink flush failed", { sink: this.sink.name });
      return "failed";
    }
  }

  /**
   * Stop the schedule, drain the queue and shut the sink down.
   * Later calls return the first call's outcome.
   */
  shutdown(): Promise<FlushOutcome> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  getStats(): BatchSpanProcessorStats {
    return { queued: this.queue.length, ...this.stats };
  }

  private async runShutdown(): Promise<FlushOutcome> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    const outcome = await this.forceFlush(this.shutdownTimeoutMs);

    if (this.sink.shutdown) {
      try {
        await this.sink.shutdown();
      } catch (error) {
        logError(this.logger, error, "Span sink shutdown failed", { sink: this.sink.name });
      }
    }

    return outcome;
  }

  private scheduleExport(): void {
    if (this.exportPending) return;
    this.exportPending = true;
    this.exportChain = this.exportChain.then(() => {
      this.exportPending = false;
      return this.exportBatch();
    });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      this.scheduleExport();
      await this.exportChain;
    }
    await this.exportChain;
  }

  protected async exportBatch(): Promise<void> {
    if (this.queue.length === 0) return;

    const batch = this.queue.splice(0, this.config.maxExportBatchSize);
    this.dropWarned = false;

    try {
      await executeWithTimeout(() => this.sink.send(batch), this.exportTimeoutMs);
      this.stats.exported += batch.length;
    } catch (error) {
      this.stats.failed += batch.length;
      const exportError = new ExportError(
        `Failed to export ${batch.length} spans`,
        this.sink.name,
        batch.length,
        { cause: error }
      );
      this.logger.error("Span export failed, batch dropped", exportError, {
        sink: this.sink.name,
        spans: batch.length,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    // Spans that piled up behind a slow send
    if (this.queue.length >= this.config.maxExportBatchSize) {
      this.scheduleExport();
    }
  }
}
