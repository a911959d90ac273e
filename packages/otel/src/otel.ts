/**
 * Otel — the telemetry export orchestrator.
 *
 * `Otel.create()` performs every step that can fail (configuration, level
 * filter, exporters, scrape port) and leaves nothing running when one does.
 * `run()` then drives every pipeline until its signal aborts; steady-state
 * export failures are logged and never end the run.
 */

import { hostname } from "node:os";
import { LoggerProvider } from "@opentelemetry/sdk-logs";
import { MeterProvider, type MetricReader } from "@opentelemetry/sdk-metrics";
import {
  LevelFilter,
  resolveTelemetryConfig,
  type TelemetryConfig,
  type TelemetryConfigInput,
} from "@telex/config";
import { getErrorMessage, TelemetryLifecycleError } from "@telex/errors";
import { defaultClock } from "./clock.js";
import { DEFAULT_STDOUT_INTERVAL_MS, LIBRARY_MODULE, STDOUT_TARGET } from "./constants.js";
import { createOtlpLogExporter, createOtlpMetricExporter } from "./exporters.js";
import { LogBridge } from "./log-bridge.js";
import { LogPipeline } from "./log-pipeline.js";
import { createLogger } from "./logger.js";
import { MetricPipeline } from "./metric-pipeline.js";
import { InstrumentRegistry } from "./registry.js";
import { buildResource } from "./resource.js";
import { ScrapeReader, ScrapeServer } from "./scrape-server.js";
import { StdoutMetricExporter } from "./stdout-exporter.js";
import { createLogTargetFilter } from "./targets.js";
import type { OtelOptions, OtelState, OtelStatus } from "./types.js";

const logger = createLogger(LIBRARY_MODULE);

interface OtelParts {
  readonly config: TelemetryConfig;
  readonly meterProvider: MeterProvider;
  readonly loggerProvider: LoggerProvider;
  readonly registry: InstrumentRegistry;
  readonly metricPipelines: readonly MetricPipeline[];
  readonly logPipelines: readonly LogPipeline[];
  readonly bridge: LogBridge;
  readonly scrapeServer: ScrapeServer | undefined;
}

export class Otel {
  readonly config: TelemetryConfig;
  readonly registry: InstrumentRegistry;

  private readonly _meterProvider: MeterProvider;
  private readonly _loggerProvider: LoggerProvider;
  private readonly _metricPipelines: readonly MetricPipeline[];
  private readonly _logPipelines: readonly LogPipeline[];
  private readonly _bridge: LogBridge;
  private readonly _scrapeServer: ScrapeServer | undefined;
  private _state: OtelState = "created";
  private _stopRequested: (() => void) | undefined;
  private _teardown: Promise<void> | undefined;

  private constructor(parts: OtelParts) {
    this.config = parts.config;
    this.registry = parts.registry;
    this._meterProvider = parts.meterProvider;
    this._loggerProvider = parts.loggerProvider;
    this._metricPipelines = parts.metricPipelines;
    this._logPipelines = parts.logPipelines;
    this._bridge = parts.bridge;
    this._scrapeServer = parts.scrapeServer;
  }

  /**
   * Set up every pipeline, install the log bridge and bind the scrape port.
   *
   * @throws {TelemetryConfigurationError} on an invalid configuration
   * @throws {LevelFilterParseError} on a malformed level expression
   * @throws {ListenerBindError} when the scrape port is taken
   */
  static async create(input: TelemetryConfigInput = {}, options: OtelOptions = {}): Promise<Otel> {
    const config = resolveTelemetryConfig(input);
    const levelFilter = LevelFilter.parse(config.level);
    const clock = options.clock ?? defaultClock;
    const resource = buildResource(config);
    const metricExporterFactory = options.metricExporterFactory ?? createOtlpMetricExporter;
    const logExporterFactory = options.logExporterFactory ?? createOtlpLogExporter;

    const metricPipelines = config.metricsExportTargets.map(
      (target) =>
        new MetricPipeline({
          target: target.url,
          intervalMs: target.intervalSecs * 1000,
          timeoutMs: target.timeoutSecs * 1000,
          temporality: target.temporality,
          exporter: metricExporterFactory(target),
          clock,
        }),
    );

    if (config.emitMetricsToStdout) {
      const intervalMs =
        config.metricsExportTargets.length > 0
          ? Math.min(...config.metricsExportTargets.map((t) => t.intervalSecs)) * 1000
          : DEFAULT_STDOUT_INTERVAL_MS;
      metricPipelines.push(
        new MetricPipeline({
          target: STDOUT_TARGET,
          intervalMs,
          timeoutMs: intervalMs,
          temporality: "cumulative",
          exporter: new StdoutMetricExporter(
            options.writeStdout !== undefined ? { write: options.writeStdout } : {},
          ),
          clock,
        }),
      );
    }

    const scrapeReader = config.prometheusConfig !== undefined ? new ScrapeReader() : undefined;
    const readers: MetricReader[] = [...metricPipelines];
    if (scrapeReader !== undefined) readers.push(scrapeReader);

    const meterProvider = new MeterProvider({ resource, readers });
    const registry = new InstrumentRegistry(meterProvider, config.serviceName);

    const logPipelines = config.logExportTargets.map(
      (target) =>
        new LogPipeline({
          target: target.url,
          intervalMs: target.intervalSecs * 1000,
          timeoutMs: target.timeoutSecs * 1000,
          exporter: logExporterFactory(target),
          filter: createLogTargetFilter(target.exportSeverity, levelFilter),
          clock,
        }),
    );
    const loggerProvider = new LoggerProvider({ resource });
    for (const pipeline of logPipelines) {
      loggerProvider.addLogRecordProcessor(pipeline);
    }

    const writeStderr = options.writeStderr ?? ((text: string) => process.stderr.write(text));
    const bridge = new LogBridge({
      levelFilter,
      regexFilters: config.regexFilters,
      loggerProvider,
      ...(config.emitLogsToStderr
        ? {
            stderr: {
              write: writeStderr,
              identity: {
                serviceName: config.serviceName,
                hostName: options.hostName ?? hostname(),
                pid: process.pid,
                ...(config.enterpriseNumber !== undefined
                  ? { enterpriseNumber: config.enterpriseNumber }
                  : {}),
              },
            },
          }
        : {}),
    });

    if (!bridge.install()) {
      logger.warn(
        "a log bridge is already installed by another orchestrator; logs of this one are not installed",
      );
    }

    for (const target of [...config.metricsExportTargets, ...config.logExportTargets]) {
      if (target.timeoutSecs > target.intervalSecs) {
        logger.warn(
          `export target "${target.url}" has a timeout (${target.timeoutSecs}s) longer than its interval (${target.intervalSecs}s)`,
        );
      }
    }

    const scrapeServer =
      config.prometheusConfig !== undefined && scrapeReader !== undefined
        ? new ScrapeServer({
            reader: scrapeReader,
            port: config.prometheusConfig.port,
            ...(options.scrapeHost !== undefined ? { host: options.scrapeHost } : {}),
          })
        : undefined;

    try {
      await scrapeServer?.start();
    } catch (error: unknown) {
      bridge.uninstall();
      await Promise.allSettled([meterProvider.shutdown(), loggerProvider.shutdown()]);
      throw error;
    }

    return new Otel({
      config,
      meterProvider,
      loggerProvider,
      registry,
      metricPipelines,
      logPipelines,
      bridge,
      scrapeServer,
    });
  }

  get state(): OtelState {
    return this._state;
  }

  get scrapePort(): number | undefined {
    return this._scrapeServer?.port;
  }

  /**
   * Drive every pipeline until `signal` aborts or `shutdown()` is called,
   * then stop all timers, release the scrape port and shut the providers
   * down. In-flight exports are abandoned.
   *
   * @throws {TelemetryLifecycleError} when already running or stopped
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this._state !== "created") {
      throw new TelemetryLifecycleError("run", this._state);
    }
    this._state = "running";

    for (const pipeline of this._metricPipelines) pipeline.start();
    for (const pipeline of this._logPipelines) pipeline.start();

    const stopped = new Promise<void>((resolve) => {
      this._stopRequested = resolve;
    });
    const onAbort = (): void => this._stopRequested?.();
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    await stopped;
    signal?.removeEventListener("abort", onAbort);
    await this._tearDown();
  }

  /**
   * Export once on every pipeline, then stop as `run()` does on cancellation.
   */
  async shutdown(): Promise<void> {
    if (this._state !== "stopped") {
      await this.forceFlush();
    }
    this._stopRequested?.();
    await this._tearDown();
  }

  /**
   * Export once on every pipeline. Failures are logged, never thrown.
   */
  async forceFlush(): Promise<void> {
    if (this._state === "stopped") return;
    const results = await Promise.allSettled([
      this._meterProvider.forceFlush(),
      this._loggerProvider.forceFlush(),
    ]);
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("flush failed", { error: getErrorMessage(result.reason) });
      }
    }
  }

  status(): OtelStatus {
    const scrapePort = this.scrapePort;
    return {
      state: this._state,
      metricPipelines: this._metricPipelines.map((p) => p.status()),
      logPipelines: this._logPipelines.map((p) => p.status()),
      logsInstalled: this._bridge.installed,
      ...(scrapePort !== undefined ? { scrapePort } : {}),
    };
  }

  private _tearDown(): Promise<void> {
    this._teardown ??= this._doTearDown();
    return this._teardown;
  }

  private async _doTearDown(): Promise<void> {
    this._state = "stopped";

    await Promise.all([
      ...this._metricPipelines.map((p) => p.stop()),
      ...this._logPipelines.map((p) => p.stop()),
    ]);

    const results = await Promise.allSettled([
      this._scrapeServer?.stop(),
      this._meterProvider.shutdown(),
      this._loggerProvider.shutdown(),
    ]);
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("shutdown step failed", { error: getErrorMessage(result.reason) });
      }
    }

    this._bridge.uninstall();
  }
}
