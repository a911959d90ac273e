import { TelemetryConfigurationError } from "@telex/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveTelemetryConfig } from "../../config.js";
import { DEFAULT_PROMETHEUS_PORT } from "../../constants.js";

describe("resolveTelemetryConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.OTEL_SERVICE_NAME;
    delete process.env.OTEL_LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should resolve with all defaults when given no config", () => {
    const config = resolveTelemetryConfig();

    expect(config).toEqual({
      serviceName: "App",
      emitMetricsToStdout: false,
      emitLogsToStderr: true,
      metricsExportTargets: [],
      logExportTargets: [],
      level: "info",
      resourceAttributes: {},
      regexFilters: [],
    });
    expect("prometheusConfig" in config).toBe(false);
    expect("enterpriseNumber" in config).toBe(false);
  });

  it("should fall back to environment variables", () => {
    process.env.OTEL_SERVICE_NAME = "from-env";
    process.env.OTEL_LOG_LEVEL = "debug";

    const config = resolveTelemetryConfig();
    expect(config.serviceName).toBe("from-env");
    expect(config.level).toBe("debug");
  });

  it("should prefer explicit values over the environment", () => {
    process.env.OTEL_SERVICE_NAME = "from-env";

    expect(resolveTelemetryConfig({ serviceName: "explicit" }).serviceName).toBe("explicit");
  });

  it("should default metric temporality to cumulative", () => {
    const config = resolveTelemetryConfig({
      metricsExportTargets: [
        { url: "http://localhost:4317", intervalSecs: 10, timeoutSecs: 5 },
        { url: "http://localhost:4318", intervalSecs: 10, timeoutSecs: 5, temporality: "delta" },
      ],
    });

    expect(config.metricsExportTargets.map((t) => t.temporality)).toEqual(["cumulative", "delta"]);
  });

  it("should default the prometheus port", () => {
    const config = resolveTelemetryConfig({ prometheusConfig: {} });
    expect(config.prometheusConfig).toEqual({ port: DEFAULT_PROMETHEUS_PORT });
  });

  it("should deep-freeze the result", () => {
    const config = resolveTelemetryConfig({
      logExportTargets: [{ url: "http://localhost:4317", intervalSecs: 1, timeoutSecs: 1 }],
      resourceAttributes: { region: "eu" },
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.logExportTargets)).toBe(true);
    expect(Object.isFrozen(config.logExportTargets[0])).toBe(true);
    expect(Object.isFrozen(config.resourceAttributes)).toBe(true);
  });

  it("should not alias the caller's input", () => {
    const attributes: Record<string, string> = { region: "eu" };
    const config = resolveTelemetryConfig({ resourceAttributes: attributes });

    attributes.region = "us";
    expect(config.resourceAttributes.region).toBe("eu");
  });

  it("should reject an empty service name", () => {
    expect(() => resolveTelemetryConfig({ serviceName: "  " })).toThrow(
      TelemetryConfigurationError,
    );
  });

  it("should report every issue with its field path", () => {
    try {
      resolveTelemetryConfig({
        metricsExportTargets: [{ url: "http://localhost:4317", intervalSecs: 0, timeoutSecs: 5 }],
        enterpriseNumber: "12a",
      });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(TelemetryConfigurationError);
      const err = error as TelemetryConfigurationError;
      expect(err.issues.map((i) => i.field)).toEqual([
        "enterpriseNumber",
        "metricsExportTargets.0.intervalSecs",
      ]);
      expect(err.message).toBe(
        "Invalid telemetry configuration: enterpriseNumber: enterpriseNumber must be a decimal number; metricsExportTargets.0.intervalSecs: intervalSecs must be a positive integer",
      );
    }
  });

  it.each([
    ["not a url", "is not a valid URL"],
    ["ftp://localhost:21", "unsupported scheme"],
    ["http://localhost", "has no port"],
  ])("should reject endpoint %s", (url, reason) => {
    expect(() =>
      resolveTelemetryConfig({
        logExportTargets: [{ url, intervalSecs: 1, timeoutSecs: 1 }],
      }),
    ).toThrow(reason);
  });

  it("should accept an explicit default port and grpc schemes", () => {
    const config = resolveTelemetryConfig({
      metricsExportTargets: [
        { url: "http://collector:80", intervalSecs: 1, timeoutSecs: 1 },
        { url: "grpcs://collector:4317", intervalSecs: 1, timeoutSecs: 1 },
      ],
    });
    expect(config.metricsExportTargets).toHaveLength(2);
  });

  it("should reject reserved resource attribute keys", () => {
    expect(() =>
      resolveTelemetryConfig({ resourceAttributes: { "service.name": "shadow" } }),
    ).toThrow("cannot be a resource attribute");
  });

  it("should reject invalid regex filters", () => {
    expect(() =>
      resolveTelemetryConfig({
        regexFilters: [{ moduleRegex: "(", logTextRegex: ".*", action: "disallow" }],
      }),
    ).toThrow("is not a valid regular expression");
  });

  it("should reject out-of-range ports", () => {
    expect(() => resolveTelemetryConfig({ prometheusConfig: { port: 70_000 } })).toThrow(
      TelemetryConfigurationError,
    );
  });
});
