/**
 * LogPipeline — buffered, periodic push of log records to one log target.
 *
 * Records that fail the target's filter are discarded on arrival. The rest
 * wait in a bounded buffer (oldest dropped on overflow) and are exported
 * every interval, or as soon as a full batch is waiting. A failed batch is
 * dropped and reported; records are delivered at most once.
 *
 * One flush runs under a single deadline of `timeoutMs`. Records still
 * buffered when it passes, or when the pipeline stops, wait for the next
 * flush.
 */

import type { Context } from "@opentelemetry/api";
import { ExportResultCode } from "@opentelemetry/core";
import type {
  LogRecord,
  LogRecordExporter,
  LogRecordProcessor,
  ReadableLogRecord,
} from "@opentelemetry/sdk-logs";
import { ExportFailedError, getErrorMessage, wrapError } from "@telex/errors";
import { defaultClock } from "./clock.js";
import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_MAX_QUEUE_SIZE, LIBRARY_MODULE } from "./constants.js";
import { createLogger, type Logger } from "./logger.js";
import { PeriodicTask } from "./periodic-task.js";
import { RingBuffer } from "./ring-buffer.js";
import { fromSeverityNumber } from "./severity-number.js";
import type { Clock, LogPipelineStatus, LogTargetFilter } from "./types.js";
import { withTimeout } from "./with-timeout.js";

export interface LogPipelineOptions {
  readonly target: string;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly exporter: LogRecordExporter;
  readonly filter: LogTargetFilter;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly maxQueueSize?: number;
  readonly maxBatchSize?: number;
}

export class LogPipeline implements LogRecordProcessor {
  readonly target: string;

  private readonly _timeoutMs: number;
  private readonly _exporter: LogRecordExporter;
  private readonly _filter: LogTargetFilter;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _maxBatchSize: number;
  private readonly _buffer: RingBuffer<ReadableLogRecord>;
  private readonly _task: PeriodicTask;
  private _abort = new AbortController();
  private _flushing: Promise<void> | undefined;
  private _detach: (() => void) | undefined;
  private _dropped = 0;
  private _exported = 0;
  private _failures = 0;
  private _lastError: string | undefined;

  constructor(options: LogPipelineOptions) {
    this.target = options.target;
    this._timeoutMs = options.timeoutMs;
    this._exporter = options.exporter;
    this._filter = options.filter;
    this._clock = options.clock ?? defaultClock;
    this._logger = options.logger ?? createLogger(LIBRARY_MODULE);
    this._maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this._buffer = new RingBuffer(options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE);
    this._task = new PeriodicTask({
      intervalMs: options.intervalMs,
      clock: this._clock,
      run: () => this.flush(),
      onError: (error) => {
        this._logger.error(`log pipeline for "${this.target}" failed a tick`, {
          error: getErrorMessage(error),
        });
      },
    });
  }

  onEmit(logRecord: LogRecord, _context?: Context): void {
    const severity = fromSeverityNumber(logRecord.severityNumber);
    if (!this._filter(severity, logRecord.instrumentationScope.name)) return;

    if (this._buffer.push(logRecord)) {
      this._dropped++;
    }
    if (this._task.running && this._buffer.size >= this._maxBatchSize) {
      void this.flush();
    }
  }

  /**
   * Start exporting every interval until `stop()` or until `signal` aborts.
   */
  start(signal?: AbortSignal): void {
    if (this._task.running || signal?.aborted) return;
    if (signal !== undefined) {
      const onAbort = (): void => {
        void this.stop();
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this._detach = () => signal.removeEventListener("abort", onAbort);
    }
    this._task.start();
  }

  /**
   * Stop the schedule. Buffered records are not exported; an in-flight
   * batch is abandoned and the flush it belongs to ends with it.
   */
  async stop(): Promise<void> {
    this._detach?.();
    this._detach = undefined;
    const abort = this._abort;
    this._abort = new AbortController();
    abort.abort(new Error(`log pipeline for "${this.target}" stopped`));
    await this._task.stop();
    await this._flushing;
  }

  /**
   * Export everything buffered, in batches. Never rejects.
   */
  flush(): Promise<void> {
    this._flushing ??= this._drain().finally(() => {
      this._flushing = undefined;
    });
    return this._flushing;
  }

  forceFlush(): Promise<void> {
    return this.flush();
  }

  async shutdown(): Promise<void> {
    await this.stop();
    await this._exporter.shutdown();
  }

  status(): LogPipelineStatus {
    return {
      target: this.target,
      running: this._task.running,
      buffered: this._buffer.size,
      dropped: this._dropped,
      exported: this._exported,
      failures: this._failures,
      ...(this._lastError !== undefined ? { lastError: this._lastError } : {}),
    };
  }

  private async _drain(): Promise<void> {
    const { signal } = this._abort;
    const deadline = this._clock.now() + this._timeoutMs;
    // Records that arrive while draining wait for the next flush.
    let remaining = this._buffer.size;
    while (remaining > 0 && !signal.aborted) {
      const budget = deadline - this._clock.now();
      if (budget <= 0) break;
      const batch = this._buffer.drain(Math.min(this._maxBatchSize, remaining));
      if (batch.length === 0) break;
      remaining -= batch.length;
      try {
        await withTimeout(this._push(batch), budget, this.target, {
          clock: this._clock,
          signal,
        });
        this._exported += batch.length;
      } catch (error: unknown) {
        const failure = wrapError(error);
        this._failures++;
        this._lastError = failure.message;
        this._logger.warn(`log export to "${this.target}" failed, dropped ${batch.length} records`, {
          error: failure.message,
          code: failure.code,
        });
      }
    }
  }

  private _push(batch: ReadableLogRecord[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._exporter.export(batch, (result) => {
        if (result.code === ExportResultCode.SUCCESS) {
          resolve();
        } else {
          reject(new ExportFailedError(this.target, result.error));
        }
      });
    });
  }
}
