/**
 * @telex/config
 *
 * Configuration model for the telemetry export orchestrator:
 * - resolveTelemetryConfig() — zod validation, defaults, frozen snapshot
 * - LevelFilter — "info,grpc=off" style level filter expressions
 * - Severity helpers
 */

export { resolveTelemetryConfig } from "./config.js";
export {
  DEFAULT_LEVEL,
  DEFAULT_PROMETHEUS_PORT,
  DEFAULT_SERVICE_NAME,
  ENTERPRISE_NUMBER_KEY,
  SERVICE_NAME_KEY,
} from "./constants.js";
export type { LevelDirective, LevelFilterValue } from "./level-filter.js";
export { LevelFilter } from "./level-filter.js";
export type { ParsedTelemetryConfig } from "./schema.js";
export { telemetryConfigSchema } from "./schema.js";
export type { Severity } from "./severity.js";
export { isAtLeast, parseSeverity, SEVERITIES, severityRank } from "./severity.js";
export type {
  FilterAction,
  LogExportTarget,
  MetricExportTarget,
  MetricExportTargetInput,
  PrometheusConfig,
  RegexFilter,
  TelemetryConfig,
  TelemetryConfigInput,
  Temporality,
} from "./types.js";
