import {
  InMemoryLogRecordExporter,
  LoggerProvider,
  SimpleLogRecordProcessor,
} from "@opentelemetry/sdk-logs";
import { LevelFilter } from "@telex/config";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LogBridge, type LogBridgeOptions } from "../../log-bridge.js";
import { createLogger } from "../../logger.js";
import type { LogEntry } from "../../types.js";
import { sinkIsFree } from "../fixtures/log-sink.js";

const TIMESTAMP = Date.UTC(2024, 0, 2, 3, 4, 5, 6);

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    severity: "info",
    module: "app",
    message: "hello",
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

describe("LogBridge", () => {
  let exporter: InMemoryLogRecordExporter;
  let loggerProvider: LoggerProvider;
  let stderr: string[];

  beforeEach(() => {
    exporter = new InMemoryLogRecordExporter();
    loggerProvider = new LoggerProvider();
    loggerProvider.addLogRecordProcessor(new SimpleLogRecordProcessor(exporter));
    stderr = [];
  });

  afterEach(async () => {
    await loggerProvider.shutdown();
  });

  function bridge(overrides: Partial<LogBridgeOptions> = {}): LogBridge {
    return new LogBridge({
      levelFilter: LevelFilter.parse("info"),
      regexFilters: [],
      loggerProvider,
      stderr: {
        write: (text) => stderr.push(text),
        identity: { serviceName: "svc", hostName: "host-a", pid: 99 },
      },
      ...overrides,
    });
  }

  it("should write a syslog line and emit an OTel record", () => {
    bridge().handle(entry({ severity: "warn", attributes: { attempt: 2 } }));

    expect(stderr).toEqual([
      '<4>2024-01-02T03:04:05.006Z svc [host-a pid="99" module="app"] - hello\n',
    ]);
    const records = exporter.getFinishedLogRecords();
    expect(records).toHaveLength(1);
    expect(records[0]?.body).toBe("hello");
    expect(records[0]?.severityNumber).toBe(13);
    expect(records[0]?.severityText).toBe("WARN");
    expect(records[0]?.instrumentationScope.name).toBe("app");
    expect(records[0]?.attributes).toEqual({ attempt: 2 });
  });

  it("should drop records the level filter disables", () => {
    bridge({ levelFilter: LevelFilter.parse("warn,db=debug") }).handle(entry());

    expect(stderr).toEqual([]);
    expect(exporter.getFinishedLogRecords()).toHaveLength(0);
  });

  it("should keep records a module override enables below the default", () => {
    bridge({ levelFilter: LevelFilter.parse("warn,db=debug") }).handle(
      entry({ severity: "debug", module: "db.pool" }),
    );

    expect(exporter.getFinishedLogRecords().map((r) => r.severityText)).toEqual(["DEBUG"]);
  });

  it("should drop every record when all directives are off", () => {
    const b = bridge({ levelFilter: LevelFilter.parse("off,db=off") });

    b.handle(entry({ severity: "error" }));
    b.handle(entry({ severity: "error", module: "db" }));

    expect(stderr).toEqual([]);
    expect(exporter.getFinishedLogRecords()).toHaveLength(0);
  });

  it("should drop records more verbose than any directive allows", () => {
    bridge({ levelFilter: LevelFilter.parse("warn,db=info") }).handle(
      entry({ severity: "trace", module: "db" }),
    );

    expect(exporter.getFinishedLogRecords()).toHaveLength(0);
  });

  it("should drop records matching a disallow filter", () => {
    const b = bridge({
      regexFilters: [{ moduleRegex: "^grpc", logTextRegex: "reconnect", action: "disallow" }],
    });

    b.handle(entry({ module: "grpc.channel", message: "reconnecting to peer" }));
    b.handle(entry({ module: "grpc.channel", message: "connected" }));
    b.handle(entry({ module: "app", message: "reconnecting to peer" }));

    expect(exporter.getFinishedLogRecords().map((r) => r.body)).toEqual([
      "connected",
      "reconnecting to peer",
    ]);
  });

  it("should skip stderr when no mirror is configured", () => {
    new LogBridge({
      levelFilter: LevelFilter.parse("info"),
      regexFilters: [],
      loggerProvider,
    }).handle(entry());

    expect(stderr).toEqual([]);
    expect(exporter.getFinishedLogRecords()).toHaveLength(1);
  });

  it("should receive facade records once installed", () => {
    const b = bridge();
    expect(b.install()).toBe(true);
    expect(b.installed).toBe(true);

    createLogger("app.jobs").error("job failed");
    b.uninstall();
    createLogger("app.jobs").error("after uninstall");

    expect(sinkIsFree()).toBe(true);
    expect(exporter.getFinishedLogRecords().map((r) => r.body)).toEqual(["job failed"]);
  });

  it("should not install over another bridge", () => {
    const first = bridge();
    const second = bridge();

    expect(first.install()).toBe(true);
    expect(second.install()).toBe(false);
    expect(second.installed).toBe(false);

    first.uninstall();
  });
});
