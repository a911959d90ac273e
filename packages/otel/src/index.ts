/**
 * @telex/otel
 *
 * Telemetry export orchestrator.
 *
 * Provides:
 * - Otel: sets up and runs every pipeline from one configuration
 * - Periodic OTLP/gRPC metric pipelines, cumulative or delta per target
 * - Buffered OTLP/gRPC log pipelines with a per-target severity floor
 * - Prometheus scrape endpoint and stdout/stderr mirrors
 * - A log facade (createLogger) and an instrument registry
 */

export { defaultClock } from "./clock.js";
export {
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_SCRAPE_HOST,
  DEFAULT_STDOUT_INTERVAL_MS,
  LIBRARY_MODULE,
  PACKAGE_NAME,
  SCRAPE_PATH,
  STDOUT_TARGET,
} from "./constants.js";
export {
  createOtlpLogExporter,
  createOtlpMetricExporter,
  isTlsUrl,
  toExporterUrl,
} from "./exporters.js";
export type { LogBridgeOptions, StderrMirror } from "./log-bridge.js";
export { LogBridge } from "./log-bridge.js";
export type { LogPipelineOptions } from "./log-pipeline.js";
export { LogPipeline } from "./log-pipeline.js";
export type { LogMethod, Logger } from "./logger.js";
export { createLogger, installLogSink, uninstallLogSink } from "./logger.js";
export type { MetricPipelineOptions } from "./metric-pipeline.js";
export { MetricPipeline } from "./metric-pipeline.js";
export { Otel } from "./otel.js";
export type { PeriodicTaskOptions } from "./periodic-task.js";
export { PeriodicTask } from "./periodic-task.js";
export type { HistogramOptions, InstrumentInfo, InstrumentKind } from "./registry.js";
export { InstrumentRegistry } from "./registry.js";
export { buildResource } from "./resource.js";
export { RingBuffer } from "./ring-buffer.js";
export type { ScrapeServerOptions } from "./scrape-server.js";
export { ScrapeReader, ScrapeServer } from "./scrape-server.js";
export { fromSeverityNumber, toSeverityNumber, toSeverityText } from "./severity-number.js";
export type { MetricDocument, StdoutMetricExporterOptions } from "./stdout-exporter.js";
export { StdoutMetricExporter, toMetricDocument } from "./stdout-exporter.js";
export type { SyslogIdentity } from "./syslog.js";
export { formatSyslogLine, syslogPriority } from "./syslog.js";
export { createLogTargetFilter, temporalitySelectorFor } from "./targets.js";
export type {
  Clock,
  LogAttributes,
  LogEntry,
  LogExporterFactory,
  LogPipelineStatus,
  LogSink,
  LogTargetFilter,
  MetricExporterFactory,
  MetricPipelineStatus,
  OtelOptions,
  OtelState,
  OtelStatus,
  TickResult,
} from "./types.js";
export type { WithTimeoutOptions } from "./with-timeout.js";
export { withTimeout } from "./with-timeout.js";
