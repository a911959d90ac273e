/**
 * @telex/errors
 *
 * Shared error taxonomy for the Telex telemetry export libraries.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof TelemetryError` for category matching.
 */

export { type ErrorJSON, isTelexError, TelexError } from "./base.js";
export { InternalError } from "./bases/internal-error.js";
export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
export {
  ExportFailedError,
  ExportTimeoutError,
  InstrumentConflictError,
  LevelFilterParseError,
  ListenerBindError,
  ScrapeRenderError,
  TelemetryConfigurationError,
  TelemetryError,
  TelemetryLifecycleError,
} from "./telemetry.js";
export type { TelexErrorOptions, ValidationIssue } from "./types.js";
export { getErrorMessage, toError, wrapError } from "./utils.js";
