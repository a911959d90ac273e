import { describe, expect, it } from "vitest";
import {
  ExportFailedError,
  ExportTimeoutError,
  InstrumentConflictError,
  InternalError,
  isTelexError,
  LevelFilterParseError,
  ListenerBindError,
  ScrapeRenderError,
  TelemetryConfigurationError,
  TelemetryError,
  TelemetryLifecycleError,
  TelexError,
} from "../../index.js";

describe("TelexError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(TelexError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should support metadata and trace ID", () => {
    const error = new InternalError("With metadata", { target: "a" }, "trace-1");

    expect(error.metadata).toEqual({ target: "a" });
    expect(error.traceId).toBe("trace-1");
  });

  it("should serialize to JSON with the cause message", () => {
    const error = new ExportFailedError("http://localhost:4317", new Error("connection refused"));
    const json = error.toJSON();

    expect(json.code).toBe("TELEMETRY_EXPORT_FAILED");
    expect(json._tag).toBe("ExternalError");
    expect(json.cause).toBe("connection refused");
    expect(json.metadata).toEqual({ target: "http://localhost:4317" });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
    expect("traceId" in json).toBe(false);
  });

  it("should narrow with type guards", () => {
    expect(isTelexError(new ScrapeRenderError())).toBe(true);
    expect(isTelexError(new Error("plain"))).toBe(false);
  });
});

describe("telemetry errors", () => {
  it("TelemetryConfigurationError carries validation issues", () => {
    const issues = [{ field: "serviceName", message: "required", code: "too_small" }];
    const error = new TelemetryConfigurationError("serviceName: required", issues);

    expect(error).toBeInstanceOf(TelemetryError);
    expect(error.message).toBe("Invalid telemetry configuration: serviceName: required");
    expect(error.httpStatus).toBe(400);
    expect(error.issues).toEqual(issues);
  });

  it("LevelFilterParseError keeps the expression", () => {
    const error = new LevelFilterParseError("info,=debug", "empty module name");

    expect(error.message).toBe('Invalid level filter "info,=debug": empty module name');
    expect(error.expression).toBe("info,=debug");
    expect(error.code).toBe("TELEMETRY_LEVEL_FILTER_INVALID");
  });

  it("ListenerBindError keeps the port and cause", () => {
    const cause = new Error("listen EADDRINUSE");
    const error = new ListenerBindError(9600, cause);

    expect(error.port).toBe(9600);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Unable to bind scrape listener on port 9600: listen EADDRINUSE");
  });

  it("ExportTimeoutError reports target and timeout", () => {
    const error = new ExportTimeoutError("http://collector:4317", 5000);

    expect(error.message).toBe('Export to "http://collector:4317" exceeded timeout of 5000ms');
    expect(error.timeoutMs).toBe(5000);
    expect(error.grpcCode).toBe("DEADLINE_EXCEEDED");
    expect(error.isExpected).toBe(true);
  });

  it("ExportFailedError without a cause", () => {
    const error = new ExportFailedError("http://collector:4317");

    expect(error.message).toBe('Export to "http://collector:4317" failed: unknown error');
    expect(error.cause).toBeUndefined();
  });

  it("InstrumentConflictError names both kinds", () => {
    const error = new InstrumentConflictError("requests", "counter", "histogram");

    expect(error.message).toBe(
      'Instrument "requests" is already registered as counter, cannot register it as histogram',
    );
    expect(error.httpStatus).toBe(409);
  });

  it("TelemetryLifecycleError names the operation and state", () => {
    const error = new TelemetryLifecycleError("run", "running");

    expect(error.message).toBe("Cannot run while running");
    expect(error.state).toBe("running");
  });
});
