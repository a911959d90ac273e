import { TelexError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Base class for all telemetry errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for telemetry errors.
 *
 * Enables generic catch: `if (e instanceof TelemetryError)`
 * while specific subclasses allow precise handling.
 */
export abstract class TelemetryError extends TelexError {}

// ---------------------------------------------------------------------------
// Setup errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the telemetry configuration fails validation.
 */
export class TelemetryConfigurationError extends TelemetryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TELEMETRY_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(`Invalid telemetry configuration: ${message}`);
    const entry = ERROR_CATALOG.TELEMETRY_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

/**
 * Thrown when a level filter expression such as `"info,grpc=off"` is malformed.
 */
export class LevelFilterParseError extends TelemetryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TELEMETRY_LEVEL_FILTER_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`Invalid level filter "${expression}": ${reason}`, { expression });
    const entry = ERROR_CATALOG.TELEMETRY_LEVEL_FILTER_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.expression = expression;
  }
}

/**
 * Thrown when the scrape endpoint cannot bind its port.
 */
export class ListenerBindError extends TelemetryError {
  readonly _tag = "ExternalError" as const;
  readonly code = "TELEMETRY_LISTENER_BIND_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly port: number;

  constructor(port: number, cause?: Error) {
    super(
      `Unable to bind scrape listener on port ${port}: ${cause?.message ?? "unknown error"}`,
      { port: String(port) },
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.TELEMETRY_LISTENER_BIND_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.port = port;
  }
}

// ---------------------------------------------------------------------------
// Transient export errors
// ---------------------------------------------------------------------------

/**
 * Raised when a push to an export target does not finish within its timeout.
 */
export class ExportTimeoutError extends TelemetryError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "TELEMETRY_EXPORT_TIMEOUT" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly target: string;
  readonly timeoutMs: number;

  constructor(target: string, timeoutMs: number) {
    super(`Export to "${target}" exceeded timeout of ${timeoutMs}ms`, { target });
    const entry = ERROR_CATALOG.TELEMETRY_EXPORT_TIMEOUT;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.target = target;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when an exporter reports a failed push.
 */
export class ExportFailedError extends TelemetryError {
  readonly _tag = "ExternalError" as const;
  readonly code = "TELEMETRY_EXPORT_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly target: string;

  constructor(target: string, cause?: Error) {
    super(
      `Export to "${target}" failed: ${cause?.message ?? "unknown error"}`,
      { target },
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.TELEMETRY_EXPORT_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.target = target;
  }
}

// ---------------------------------------------------------------------------
// Registry and lifecycle errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an instrument name is registered again with a different kind.
 */
export class InstrumentConflictError extends TelemetryError {
  readonly _tag = "ConflictError" as const;
  readonly code = "TELEMETRY_INSTRUMENT_CONFLICT" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly instrumentName: string;
  readonly existingKind: string;
  readonly requestedKind: string;

  constructor(instrumentName: string, existingKind: string, requestedKind: string) {
    super(
      `Instrument "${instrumentName}" is already registered as ${existingKind}, cannot register it as ${requestedKind}`,
      { instrument: instrumentName },
    );
    const entry = ERROR_CATALOG.TELEMETRY_INSTRUMENT_CONFLICT;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.instrumentName = instrumentName;
    this.existingKind = existingKind;
    this.requestedKind = requestedKind;
  }
}

/**
 * Thrown when an orchestrator operation is called in the wrong state,
 * e.g. `run()` twice.
 */
export class TelemetryLifecycleError extends TelemetryError {
  readonly _tag = "ConflictError" as const;
  readonly code = "TELEMETRY_LIFECYCLE_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly state: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while ${state}`, { operation, state });
    const entry = ERROR_CATALOG.TELEMETRY_LIFECYCLE_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.state = state;
  }
}

/**
 * Raised when the metric snapshot cannot be collected for a scrape request.
 */
export class ScrapeRenderError extends TelemetryError {
  readonly _tag = "InternalError" as const;
  readonly code = "TELEMETRY_SCRAPE_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(cause?: Error) {
    super(
      `Unable to render metrics: ${cause?.message ?? "unknown error"}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.TELEMETRY_SCRAPE_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
