/**
 * Telemetry configuration types.
 *
 * `TelemetryConfigInput` is what callers write; `TelemetryConfig` is the
 * resolved, frozen snapshot every pipeline derives its behavior from.
 */

import type { Severity } from "./severity.js";

export type Temporality = "cumulative" | "delta";

export type FilterAction = "disallow";

export interface MetricExportTarget {
  /** OTLP/gRPC endpoint, e.g. "http://collector:4317" */
  readonly url: string;
  /** How often to export */
  readonly intervalSecs: number;
  /** How long a single push may take before it is abandoned */
  readonly timeoutSecs: number;
  readonly temporality: Temporality;
  /** PEM CA bundle for TLS endpoints */
  readonly caCertPath?: string;
}

export interface LogExportTarget {
  readonly url: string;
  readonly intervalSecs: number;
  readonly timeoutSecs: number;
  /** Only records at or above this severity are exported to this target */
  readonly exportSeverity?: Severity;
  readonly caCertPath?: string;
}

export interface PrometheusConfig {
  readonly port: number;
}

export interface RegexFilter {
  readonly moduleRegex: string;
  readonly logTextRegex: string;
  readonly action: FilterAction;
}

export interface TelemetryConfig {
  readonly serviceName: string;
  readonly enterpriseNumber?: string;
  readonly emitMetricsToStdout: boolean;
  readonly emitLogsToStderr: boolean;
  readonly metricsExportTargets: readonly MetricExportTarget[];
  readonly logExportTargets: readonly LogExportTarget[];
  /** Level filter expression, e.g. "info,grpc=off" */
  readonly level: string;
  readonly resourceAttributes: Readonly<Record<string, string>>;
  readonly prometheusConfig?: PrometheusConfig;
  readonly regexFilters: readonly RegexFilter[];
}

export interface MetricExportTargetInput {
  readonly url: string;
  readonly intervalSecs: number;
  readonly timeoutSecs: number;
  /** Defaults to "cumulative" */
  readonly temporality?: Temporality;
  readonly caCertPath?: string;
}

export interface TelemetryConfigInput {
  /** Defaults to OTEL_SERVICE_NAME, then "App" */
  readonly serviceName?: string;
  readonly enterpriseNumber?: string;
  readonly emitMetricsToStdout?: boolean;
  /** Defaults to true */
  readonly emitLogsToStderr?: boolean;
  readonly metricsExportTargets?: readonly MetricExportTargetInput[];
  readonly logExportTargets?: readonly LogExportTarget[];
  /** Defaults to OTEL_LOG_LEVEL, then "info" */
  readonly level?: string;
  readonly resourceAttributes?: Readonly<Record<string, string>>;
  /** Port defaults to 9600 */
  readonly prometheusConfig?: { readonly port?: number };
  readonly regexFilters?: readonly RegexFilter[];
}
