/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the Telex monorepo.
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * base error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, TELEMETRY
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "ConflictError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // TELEMETRY ERRORS - Setup and steady-state export failures
  // ============================================================================
  TELEMETRY_CONFIGURATION_INVALID: {
    domain: "telemetry",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid telemetry configuration",
    description: "The telemetry configuration failed validation",
  },
  TELEMETRY_LEVEL_FILTER_INVALID: {
    domain: "telemetry",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid level filter",
    description: "The log level filter expression could not be parsed",
  },
  TELEMETRY_LISTENER_BIND_FAILED: {
    domain: "telemetry",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Scrape listener bind failed",
    description: "The scrape endpoint could not bind its port",
  },
  TELEMETRY_EXPORT_TIMEOUT: {
    domain: "telemetry",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: true,
    title: "Export timed out",
    description: "A push to an export target exceeded its timeout",
  },
  TELEMETRY_EXPORT_FAILED: {
    domain: "telemetry",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Export failed",
    description: "An export target rejected or could not receive a batch",
  },
  TELEMETRY_INSTRUMENT_CONFLICT: {
    domain: "telemetry",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Instrument conflict",
    description: "An instrument name is already registered with a different kind",
  },
  TELEMETRY_LIFECYCLE_INVALID: {
    domain: "telemetry",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Invalid lifecycle transition",
    description: "The orchestrator is not in a state that allows this operation",
  },
  TELEMETRY_SCRAPE_FAILED: {
    domain: "telemetry",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Scrape failed",
    description: "The metric snapshot could not be collected for a scrape",
  },
} as const;

/**
 * All valid error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * A single catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Codes whose catalog entry maps to the given base type
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
