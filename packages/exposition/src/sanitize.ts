/**
 * Name and value escaping for the Prometheus text format.
 */

const INVALID_METRIC_CHARS = /[^a-zA-Z0-9_:]/g;
const INVALID_LABEL_CHARS = /[^a-zA-Z0-9_]/g;

/**
 * Map a metric name onto `[a-zA-Z_:][a-zA-Z0-9_:]*`.
 */
export function sanitizeMetricName(name: string): string {
  const replaced = name.replace(INVALID_METRIC_CHARS, "_");
  if (replaced.length === 0) return "_";
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

/**
 * Map a label name onto `[a-zA-Z_][a-zA-Z0-9_]*`.
 */
export function sanitizeLabelName(name: string): string {
  const replaced = name.replace(INVALID_LABEL_CHARS, "_");
  if (replaced.length === 0) return "_";
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

export function escapeHelp(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
}

/**
 * Render a sample value. Non-finite values use the Prometheus spellings.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "+Inf";
  if (value === Number.NEGATIVE_INFINITY) return "-Inf";
  return String(value);
}
