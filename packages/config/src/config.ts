/**
 * Configuration validation and resolution.
 */

import { TelemetryConfigurationError, type ValidationIssue } from "@telex/errors";
import { telemetryConfigSchema } from "./schema.js";
import type { TelemetryConfig, TelemetryConfigInput } from "./types.js";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a {@link TelemetryConfigInput} and resolves it into a frozen
 * {@link TelemetryConfig} with all defaults applied.
 *
 * @throws {TelemetryConfigurationError} on invalid input
 */
export function resolveTelemetryConfig(input: TelemetryConfigInput = {}): TelemetryConfig {
  const parsed = telemetryConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new TelemetryConfigurationError(
      issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join("; "),
      issues,
    );
  }

  const { enterpriseNumber, prometheusConfig, ...rest } = parsed.data;
  const config: TelemetryConfig = {
    ...rest,
    ...(enterpriseNumber !== undefined ? { enterpriseNumber } : {}),
    ...(prometheusConfig !== undefined ? { prometheusConfig } : {}),
  };
  return deepFreeze(config);
}
