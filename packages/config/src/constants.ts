/**
 * Constants for @telex/config.
 */

export const DEFAULT_SERVICE_NAME = "App";
export const DEFAULT_LEVEL = "info";
export const DEFAULT_PROMETHEUS_PORT = 9600;

/** Resource keys the configuration sets itself */
export const SERVICE_NAME_KEY = "service.name";
export const ENTERPRISE_NUMBER_KEY = "enterprise.number";

export const SUPPORTED_URL_SCHEMES: readonly string[] = ["http:", "https:", "grpc:", "grpcs:"];
