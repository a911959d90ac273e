/**
 * Shared types for @telex/otel.
 */

import type { LogExportTarget, MetricExportTarget, Severity } from "@telex/config";
import type { LogRecordExporter } from "@opentelemetry/sdk-logs";
import type { PushMetricExporter } from "@opentelemetry/sdk-metrics";

// ---------------------------------------------------------------------------
// Scheduling
// ---------------------------------------------------------------------------

/**
 * Time source and timer scheduler. Injected so tests can drive ticks.
 */
export interface Clock {
  now(): number;
  setTimeout(fn: () => void, ms: number): ReturnType<typeof globalThis.setTimeout>;
  clearTimeout(id: ReturnType<typeof globalThis.setTimeout>): void;
}

// ---------------------------------------------------------------------------
// Pipelines
// ---------------------------------------------------------------------------

/** Outcome of a single metric export */
export interface TickResult {
  readonly target: string;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly ok: boolean;
  /** True when the snapshot was empty and nothing was pushed */
  readonly skipped: boolean;
  readonly error?: string;
}

export interface MetricPipelineStatus {
  readonly target: string;
  readonly running: boolean;
  readonly ticks: number;
  readonly failures: number;
  readonly lastError?: string;
}

export interface LogPipelineStatus {
  readonly target: string;
  readonly running: boolean;
  readonly buffered: number;
  readonly dropped: number;
  readonly exported: number;
  readonly failures: number;
  readonly lastError?: string;
}

/** `(severity, module) => boolean` predicate for one log target */
export type LogTargetFilter = (severity: Severity, module: string) => boolean;

// ---------------------------------------------------------------------------
// Log facade
// ---------------------------------------------------------------------------

export type LogAttributes = Readonly<Record<string, string | number | boolean>>;

export interface LogEntry {
  readonly severity: Severity;
  readonly module: string;
  readonly message: string;
  /** Milliseconds since the epoch */
  readonly timestamp: number;
  readonly attributes?: LogAttributes;
}

export type LogSink = (entry: LogEntry) => void;

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export type OtelState = "created" | "running" | "stopped";

export interface OtelStatus {
  readonly state: OtelState;
  readonly metricPipelines: readonly MetricPipelineStatus[];
  readonly logPipelines: readonly LogPipelineStatus[];
  readonly logsInstalled: boolean;
  readonly scrapePort?: number;
}

export type MetricExporterFactory = (target: MetricExportTarget) => PushMetricExporter;
export type LogExporterFactory = (target: LogExportTarget) => LogRecordExporter;

export interface OtelOptions {
  readonly clock?: Clock;
  /** Defaults to an OTLP/gRPC exporter per target */
  readonly metricExporterFactory?: MetricExporterFactory;
  /** Defaults to an OTLP/gRPC exporter per target */
  readonly logExporterFactory?: LogExporterFactory;
  /** Defaults to process.stdout */
  readonly writeStdout?: (text: string) => void;
  /** Defaults to process.stderr */
  readonly writeStderr?: (text: string) => void;
  /** Defaults to os.hostname() */
  readonly hostName?: string;
  /** Interface the scrape listener binds; defaults to all interfaces */
  readonly scrapeHost?: string;
}
