/**
 * Syslog-style stderr lines:
 *
 *   <PRI>TIMESTAMP SERVICE [HOST[@EN] pid="PID" module="MODULE"] - MESSAGE
 *
 * PRI is the bare severity code, with no facility. The structured-data
 * ID carries the enterprise number when one is configured.
 */

import type { Severity } from "@telex/config";
import type { LogEntry } from "./types.js";

const SEVERITY_CODE: Readonly<Record<Severity, number>> = {
  error: 3,
  warn: 4,
  info: 6,
  debug: 7,
  trace: 7,
};

export interface SyslogIdentity {
  readonly serviceName: string;
  readonly hostName: string;
  readonly pid: number;
  readonly enterpriseNumber?: string;
}

export function syslogPriority(severity: Severity): number {
  return SEVERITY_CODE[severity];
}

export function formatSyslogLine(entry: LogEntry, identity: SyslogIdentity): string {
  const sdId =
    identity.enterpriseNumber !== undefined
      ? `${identity.hostName}@${identity.enterpriseNumber}`
      : identity.hostName;
  const timestamp = new Date(entry.timestamp).toISOString();
  return `<${syslogPriority(entry.severity)}>${timestamp} ${identity.serviceName} [${sdId} pid="${identity.pid}" module="${entry.module}"] - ${entry.message}`;
}
