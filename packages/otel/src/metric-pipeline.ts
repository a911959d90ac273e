/**
 * MetricPipeline — one periodic push to one metric target.
 *
 * The pipeline is its own MetricReader, so the SDK keeps a separate
 * aggregation state (and, for delta targets, a separate baseline) per
 * target. A tick collects a snapshot and pushes it through the target's
 * exporter under the target's timeout. Failed and timed-out pushes are
 * counted and logged; the schedule carries on.
 */

import type { Temporality } from "@telex/config";
import { ExportFailedError, getErrorMessage, wrapError } from "@telex/errors";
import { ExportResultCode } from "@opentelemetry/core";
import {
  MetricReader,
  type PushMetricExporter,
  type ResourceMetrics,
} from "@opentelemetry/sdk-metrics";
import { defaultClock } from "./clock.js";
import { LIBRARY_MODULE } from "./constants.js";
import { createLogger, type Logger } from "./logger.js";
import { PeriodicTask } from "./periodic-task.js";
import { temporalitySelectorFor } from "./targets.js";
import type { Clock, MetricPipelineStatus, TickResult } from "./types.js";
import { withTimeout } from "./with-timeout.js";

export interface MetricPipelineOptions {
  /** Label used in logs and status, usually the endpoint URL */
  readonly target: string;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly temporality: Temporality;
  readonly exporter: PushMetricExporter;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export class MetricPipeline extends MetricReader {
  readonly target: string;

  private readonly _timeoutMs: number;
  private readonly _exporter: PushMetricExporter;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _task: PeriodicTask;
  private _abort = new AbortController();
  private _detach: (() => void) | undefined;
  private _ticks = 0;
  private _failures = 0;
  private _lastError: string | undefined;

  constructor(options: MetricPipelineOptions) {
    super({ aggregationTemporalitySelector: temporalitySelectorFor(options.temporality) });
    this.target = options.target;
    this._timeoutMs = options.timeoutMs;
    this._exporter = options.exporter;
    this._clock = options.clock ?? defaultClock;
    this._logger = options.logger ?? createLogger(LIBRARY_MODULE);
    this._task = new PeriodicTask({
      intervalMs: options.intervalMs,
      clock: this._clock,
      run: async () => {
        await this.exportOnce();
      },
      onError: (error) => {
        this._logger.error(`metric pipeline for "${this.target}" failed a tick`, {
          error: getErrorMessage(error),
        });
      },
    });
  }

  /**
   * Start exporting every interval until `stop()` or until `signal` aborts.
   */
  start(signal?: AbortSignal): void {
    if (this._task.running || signal?.aborted) return;
    if (this._abort.signal.aborted) {
      this._abort = new AbortController();
    }
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
   * Stop the schedule. An in-flight push is abandoned.
   */
  async stop(): Promise<void> {
    this._detach?.();
    this._detach = undefined;
    this._abort.abort(new Error(`metric pipeline for "${this.target}" stopped`));
    await this._task.stop();
  }

  /**
   * Collect and push one snapshot. Never rejects; the outcome is returned.
   */
  async exportOnce(): Promise<TickResult> {
    const startedAt = this._clock.now();
    this._ticks++;

    try {
      const { resourceMetrics, errors } = await this.collect({ timeoutMillis: this._timeoutMs });
      for (const error of errors) {
        this._logger.warn(`partial metric collection for "${this.target}"`, {
          error: getErrorMessage(error),
        });
      }

      if (resourceMetrics.scopeMetrics.length === 0) {
        return this._result(startedAt, true, true);
      }

      const signal = this._abort.signal.aborted ? undefined : this._abort.signal;
      await withTimeout(this._push(resourceMetrics), this._timeoutMs, this.target, {
        clock: this._clock,
        ...(signal !== undefined ? { signal } : {}),
      });
      return this._result(startedAt, true, false);
    } catch (error: unknown) {
      const failure = wrapError(error);
      this._failures++;
      this._lastError = failure.message;
      this._logger.warn(`metric export to "${this.target}" failed`, {
        error: failure.message,
        code: failure.code,
      });
      return this._result(startedAt, false, false, failure.message);
    }
  }

  status(): MetricPipelineStatus {
    return {
      target: this.target,
      running: this._task.running,
      ticks: this._ticks,
      failures: this._failures,
      ...(this._lastError !== undefined ? { lastError: this._lastError } : {}),
    };
  }

  protected async onForceFlush(): Promise<void> {
    await this.exportOnce();
  }

  protected async onShutdown(): Promise<void> {
    await this.stop();
    await this._exporter.shutdown();
  }

  private _push(metrics: ResourceMetrics): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._exporter.export(metrics, (result) => {
        if (result.code === ExportResultCode.SUCCESS) {
          resolve();
        } else {
          reject(new ExportFailedError(this.target, result.error));
        }
      });
    });
  }

  private _result(startedAt: number, ok: boolean, skipped: boolean, error?: string): TickResult {
    return {
      target: this.target,
      startedAt,
      durationMs: this._clock.now() - startedAt,
      ok,
      skipped,
      ...(error !== undefined ? { error } : {}),
    };
  }
}
