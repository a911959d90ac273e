import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { ENTERPRISE_NUMBER_KEY, type TelemetryConfig } from "@telex/config";

/**
 * Build the resource attached to every exported batch.
 */
export function buildResource(config: TelemetryConfig): Resource {
  return new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.enterpriseNumber !== undefined
      ? { [ENTERPRISE_NUMBER_KEY]: config.enterpriseNumber }
      : {}),
    ...config.resourceAttributes,
  });
}
