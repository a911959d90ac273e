/**
 * Log severities, ordered trace < debug < info < warn < error.
 */

export type Severity = "trace" | "debug" | "info" | "warn" | "error";

export const SEVERITIES: readonly Severity[] = ["trace", "debug", "info", "warn", "error"];

const RANK: Readonly<Record<Severity, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function severityRank(severity: Severity): number {
  return RANK[severity];
}

/**
 * True when `severity` is at least as severe as `minimum`.
 */
export function isAtLeast(severity: Severity, minimum: Severity): boolean {
  return RANK[severity] >= RANK[minimum];
}

/**
 * Parse a severity name, case-insensitively. `"warning"` is accepted as `warn`.
 */
export function parseSeverity(text: string): Severity | undefined {
  const normalized = text.trim().toLowerCase();
  if (normalized === "warning") return "warn";
  return SEVERITIES.find((s) => s === normalized);
}
