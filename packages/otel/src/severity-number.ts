import { SeverityNumber } from "@opentelemetry/api-logs";
import type { Severity } from "@telex/config";

const TO_NUMBER: Readonly<Record<Severity, SeverityNumber>> = {
  trace: SeverityNumber.TRACE,
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

export function toSeverityNumber(severity: Severity): SeverityNumber {
  return TO_NUMBER[severity];
}

export function toSeverityText(severity: Severity): string {
  return severity.toUpperCase();
}

/**
 * Map an OTel severity number back onto a severity. Each OTel range
 * (e.g. WARN..WARN4) collapses to its base; FATAL counts as error and an
 * unset number as trace.
 */
export function fromSeverityNumber(severityNumber: SeverityNumber | undefined): Severity {
  if (severityNumber === undefined) return "trace";
  if (severityNumber >= SeverityNumber.ERROR) return "error";
  if (severityNumber >= SeverityNumber.WARN) return "warn";
  if (severityNumber >= SeverityNumber.INFO) return "info";
  if (severityNumber >= SeverityNumber.DEBUG) return "debug";
  return "trace";
}
