import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, installLogSink, uninstallLogSink } from "../../logger.js";
import type { LogSink } from "../../types.js";
import { sinkIsFree } from "../fixtures/log-sink.js";

describe("log facade", () => {
  const sinks: LogSink[] = [];

  afterEach(() => {
    for (const sink of sinks.splice(0)) uninstallLogSink(sink);
  });

  function install(sink: LogSink): boolean {
    sinks.push(sink);
    return installLogSink(sink);
  }

  it("should drop records when no sink is installed", () => {
    expect(sinkIsFree()).toBe(true);
    expect(() => createLogger("app").info("nobody listens")).not.toThrow();
  });

  it("should deliver records with module, severity and attributes", () => {
    const sink = vi.fn<LogSink>();
    install(sink);

    createLogger("app.http").warn("slow request", { route: "/orders", ms: 812 });

    expect(sink).toHaveBeenCalledOnce();
    expect(sink).toHaveBeenCalledWith({
      severity: "warn",
      module: "app.http",
      message: "slow request",
      timestamp: expect.any(Number),
      attributes: { route: "/orders", ms: 812 },
    });
  });

  it("should refuse a second sink while one is installed", () => {
    const first = vi.fn<LogSink>();
    const second = vi.fn<LogSink>();

    expect(install(first)).toBe(true);
    expect(install(first)).toBe(true);
    expect(install(second)).toBe(false);

    createLogger("app").error("boom");
    expect(first).toHaveBeenCalledOnce();
    expect(second).not.toHaveBeenCalled();
  });

  it("should only uninstall the installed sink", () => {
    const first = vi.fn<LogSink>();
    install(first);

    uninstallLogSink(vi.fn<LogSink>());
    expect(sinkIsFree()).toBe(false);

    uninstallLogSink(first);
    expect(sinkIsFree()).toBe(true);
  });
});
