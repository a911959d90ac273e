/**
 * LogBridge — the log facade's sink.
 *
 * Each record passes the global level filter and the disallow filters, is
 * written to stderr as a syslog line (when enabled), then handed to the
 * OTel logger named after the record's module, where the log pipelines
 * pick it up.
 */

import type { LoggerProvider } from "@opentelemetry/sdk-logs";
import {
  isAtLeast,
  type LevelFilter,
  type LevelFilterValue,
  type RegexFilter,
} from "@telex/config";
import { installLogSink, uninstallLogSink } from "./logger.js";
import { toSeverityNumber, toSeverityText } from "./severity-number.js";
import { formatSyslogLine, type SyslogIdentity } from "./syslog.js";
import type { LogEntry, LogSink } from "./types.js";

export interface StderrMirror {
  readonly write: (text: string) => void;
  readonly identity: SyslogIdentity;
}

export interface LogBridgeOptions {
  readonly levelFilter: LevelFilter;
  readonly regexFilters: readonly RegexFilter[];
  readonly loggerProvider: LoggerProvider;
  readonly stderr?: StderrMirror;
}

interface CompiledFilter {
  readonly module: RegExp;
  readonly text: RegExp;
}

export class LogBridge {
  readonly sink: LogSink;

  private readonly _levelFilter: LevelFilter;
  private readonly _maxLevel: LevelFilterValue;
  private readonly _filters: readonly CompiledFilter[];
  private readonly _loggerProvider: LoggerProvider;
  private readonly _stderr: StderrMirror | undefined;
  private _installed = false;

  constructor(options: LogBridgeOptions) {
    this._levelFilter = options.levelFilter;
    this._maxLevel = options.levelFilter.maxLevel;
    this._filters = options.regexFilters.map((f) => ({
      module: new RegExp(f.moduleRegex),
      text: new RegExp(f.logTextRegex),
    }));
    this._loggerProvider = options.loggerProvider;
    this._stderr = options.stderr;
    this.sink = (entry) => this.handle(entry);
  }

  get installed(): boolean {
    return this._installed;
  }

  /**
   * Become the facade's sink.
   *
   * @returns false when another bridge is already installed
   */
  install(): boolean {
    this._installed = installLogSink(this.sink);
    return this._installed;
  }

  uninstall(): void {
    uninstallLogSink(this.sink);
    this._installed = false;
  }

  /**
   * Whether `entry` survives the level and disallow filters.
   */
  accepts(entry: LogEntry): boolean {
    if (this._maxLevel === "off" || !isAtLeast(entry.severity, this._maxLevel)) return false;
    if (!this._levelFilter.enabled(entry.severity, entry.module)) return false;
    return !this._filters.some((f) => f.module.test(entry.module) && f.text.test(entry.message));
  }

  handle(entry: LogEntry): void {
    if (!this.accepts(entry)) return;

    if (this._stderr !== undefined) {
      this._stderr.write(`${formatSyslogLine(entry, this._stderr.identity)}\n`);
    }

    this._loggerProvider.getLogger(entry.module).emit({
      timestamp: entry.timestamp,
      severityNumber: toSeverityNumber(entry.severity),
      severityText: toSeverityText(entry.severity),
      body: entry.message,
      ...(entry.attributes !== undefined ? { attributes: { ...entry.attributes } } : {}),
    });
  }
}
