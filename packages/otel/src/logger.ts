/**
 * Process-wide log facade.
 *
 * Application code and this library log through `createLogger(module)`.
 * Records go to the single installed sink (an orchestrator's log bridge);
 * with no sink installed they are dropped.
 */

import type { Severity } from "@telex/config";
import type { LogAttributes, LogEntry, LogSink } from "./types.js";

let installedSink: LogSink | undefined;

/**
 * Install `sink` as the destination of every logger.
 *
 * @returns false when another sink is already installed
 */
export function installLogSink(sink: LogSink): boolean {
  if (installedSink !== undefined && installedSink !== sink) return false;
  installedSink = sink;
  return true;
}

/**
 * Remove `sink` if it is the installed one.
 */
export function uninstallLogSink(sink: LogSink): void {
  if (installedSink === sink) {
    installedSink = undefined;
  }
}

export type LogMethod = (message: string, attributes?: LogAttributes) => void;

export interface Logger {
  readonly module: string;
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
}

function emit(
  severity: Severity,
  module: string,
  message: string,
  attributes: LogAttributes | undefined,
): void {
  const sink = installedSink;
  if (sink === undefined) return;
  const entry: LogEntry = {
    severity,
    module,
    message,
    timestamp: Date.now(),
    ...(attributes !== undefined ? { attributes } : {}),
  };
  sink(entry);
}

/**
 * Create a logger whose records carry `module` as their origin.
 */
export function createLogger(module: string): Logger {
  return {
    module,
    trace: (message, attributes) => emit("trace", module, message, attributes),
    debug: (message, attributes) => emit("debug", module, message, attributes),
    info: (message, attributes) => emit("info", module, message, attributes),
    warn: (message, attributes) => emit("warn", module, message, attributes),
    error: (message, attributes) => emit("error", module, message, attributes),
  };
}
