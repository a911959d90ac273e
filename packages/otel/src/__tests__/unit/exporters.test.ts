import { describe, expect, it } from "vitest";
import {
  createOtlpLogExporter,
  createOtlpMetricExporter,
  isTlsUrl,
  toExporterUrl,
} from "../../exporters.js";

describe("toExporterUrl", () => {
  it("should rewrite grpc schemes onto http schemes", () => {
    expect(toExporterUrl("grpc://collector:4317")).toBe("http://collector:4317");
    expect(toExporterUrl("grpcs://collector:4317")).toBe("https://collector:4317");
    expect(toExporterUrl("http://collector:4317")).toBe("http://collector:4317");
  });
});

describe("isTlsUrl", () => {
  it("should treat https and grpcs as TLS", () => {
    expect(isTlsUrl("https://collector:4317")).toBe(true);
    expect(isTlsUrl("grpcs://collector:4317")).toBe(true);
    expect(isTlsUrl("grpc://collector:4317")).toBe(false);
  });
});

describe("OTLP exporter factories", () => {
  it("should build exporters without connecting", async () => {
    const metrics = createOtlpMetricExporter({
      url: "grpc://127.0.0.1:4317",
      intervalSecs: 10,
      timeoutSecs: 5,
      temporality: "cumulative",
    });
    const logs = createOtlpLogExporter({
      url: "https://127.0.0.1:4317",
      intervalSecs: 10,
      timeoutSecs: 5,
    });

    expect(typeof metrics.export).toBe("function");
    expect(typeof logs.export).toBe("function");
    await Promise.all([metrics.shutdown(), logs.shutdown()]);
  });

  it("should fail when the CA bundle cannot be read", () => {
    expect(() =>
      createOtlpMetricExporter({
        url: "grpcs://127.0.0.1:4317",
        intervalSecs: 10,
        timeoutSecs: 5,
        temporality: "delta",
        caCertPath: "/nonexistent/ca.pem",
      }),
    ).toThrow("ENOENT");
  });
});
