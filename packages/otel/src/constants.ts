/**
 * Constants for @telex/otel.
 */

export const PACKAGE_NAME = "@telex/otel";
/** Module name the library's own diagnostics are logged under */
export const LIBRARY_MODULE = "telex.otel";
export const DEFAULT_STDOUT_INTERVAL_MS = 60_000;
export const DEFAULT_MAX_QUEUE_SIZE = 2048;
export const DEFAULT_MAX_BATCH_SIZE = 512;
export const STDOUT_TARGET = "stdout";
export const DEFAULT_SCRAPE_HOST = "0.0.0.0";
export const SCRAPE_PATH = "/metrics";
