/**
 * Prometheus text exposition (format 0.0.4) for an OpenTelemetry
 * metric snapshot.
 *
 * Layout of the rendered document:
 * - `target_info` first, one sample labelled with the resource attributes
 * - one family per metric name, in first-seen order, with `# HELP` (when
 *   the instrument has a description) and `# TYPE` written once
 * - every sample carries the resource attributes, `otel_scope_name` and the
 *   data point's own attributes, in that order
 */

import type { AttributeValue, Attributes } from "@opentelemetry/api";
import {
  DataPointType,
  type Histogram,
  type MetricData,
  type ResourceMetrics,
} from "@opentelemetry/sdk-metrics";
import {
  escapeHelp,
  escapeLabelValue,
  formatValue,
  sanitizeLabelName,
  sanitizeMetricName,
} from "./sanitize.js";

export const EXPOSITION_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export const TARGET_INFO_NAME = "target_info";
export const SCOPE_NAME_LABEL = "otel_scope_name";

export type FamilyType = "counter" | "gauge" | "histogram";

/** Receives a description of every metric left out of the document */
export type ProblemHandler = (message: string) => void;

interface Family {
  readonly name: string;
  readonly type: FamilyType;
  help: string | undefined;
  readonly samples: string[];
}

type Labels = Map<string, string>;

function attributeToString(value: AttributeValue): string {
  return Array.isArray(value) ? JSON.stringify(value) : String(value);
}

function addAttributes(labels: Labels, attributes: Attributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined) continue;
    labels.set(sanitizeLabelName(key), attributeToString(value));
  }
}

function formatLabels(labels: Labels, extra?: readonly [string, string]): string {
  const parts: string[] = [];
  for (const [name, value] of labels) {
    parts.push(`${name}="${escapeLabelValue(value)}"`);
  }
  if (extra) {
    parts.push(`${extra[0]}="${escapeLabelValue(extra[1])}"`);
  }
  return parts.length > 0 ? `{${parts.join(",")}}` : "";
}

function familyName(metric: MetricData): string {
  const base = sanitizeMetricName(metric.descriptor.name);
  if (metric.dataPointType === DataPointType.SUM && metric.isMonotonic) {
    return base.endsWith("_total") ? base : `${base}_total`;
  }
  return base;
}

function familyType(metric: MetricData): FamilyType | undefined {
  switch (metric.dataPointType) {
    case DataPointType.SUM:
      return metric.isMonotonic ? "counter" : "gauge";
    case DataPointType.GAUGE:
      return "gauge";
    case DataPointType.HISTOGRAM:
      return "histogram";
    default:
      return undefined;
  }
}

function histogramSamples(name: string, labels: Labels, value: Histogram): string[] {
  const { boundaries, counts } = value.buckets;
  const buckets = boundaries
    .map((boundary, i) => ({ boundary, count: counts[i] ?? 0 }))
    .sort((a, b) => a.boundary - b.boundary);

  const lines: string[] = [];
  let cumulative = 0;
  for (const { boundary, count } of buckets) {
    cumulative += count;
    lines.push(`${name}_bucket${formatLabels(labels, ["le", formatValue(boundary)])} ${cumulative}`);
  }
  lines.push(`${name}_bucket${formatLabels(labels, ["le", "+Inf"])} ${value.count}`);
  lines.push(`${name}_sum${formatLabels(labels)} ${formatValue(value.sum ?? 0)}`);
  lines.push(`${name}_count${formatLabels(labels)} ${value.count}`);
  return lines;
}

function metricSamples(name: string, baseLabels: Labels, metric: MetricData): string[] {
  const lines: string[] = [];
  switch (metric.dataPointType) {
    case DataPointType.SUM:
    case DataPointType.GAUGE:
      for (const point of metric.dataPoints) {
        const labels = new Map(baseLabels);
        addAttributes(labels, point.attributes);
        lines.push(`${name}${formatLabels(labels)} ${formatValue(point.value)}`);
      }
      break;
    case DataPointType.HISTOGRAM:
      for (const point of metric.dataPoints) {
        const labels = new Map(baseLabels);
        addAttributes(labels, point.attributes);
        lines.push(...histogramSamples(name, labels, point.value));
      }
      break;
    default:
      break;
  }
  return lines;
}

/**
 * Render a snapshot as a Prometheus text document.
 *
 * Metrics that cannot be represented (exponential histograms, or a name
 * already used by a family of another type) are left out and reported
 * through `onProblem`.
 */
export function renderExposition(resourceMetrics: ResourceMetrics, onProblem?: ProblemHandler): string {
  const resourceLabels: Labels = new Map();
  addAttributes(resourceLabels, resourceMetrics.resource.attributes);

  const families = new Map<string, Family>();
  families.set(TARGET_INFO_NAME, {
    name: TARGET_INFO_NAME,
    type: "gauge",
    help: "Target metadata",
    samples: [`${TARGET_INFO_NAME}${formatLabels(resourceLabels)} 1`],
  });

  for (const scopeMetrics of resourceMetrics.scopeMetrics) {
    const scopeLabels = new Map(resourceLabels);
    scopeLabels.set(SCOPE_NAME_LABEL, scopeMetrics.scope.name);

    for (const metric of scopeMetrics.metrics) {
      const type = familyType(metric);
      if (type === undefined) {
        onProblem?.(
          `metric "${metric.descriptor.name}" is an exponential histogram, which the text format cannot represent`,
        );
        continue;
      }

      const name = familyName(metric);
      let family = families.get(name);
      if (family === undefined) {
        family = { name, type, help: undefined, samples: [] };
        families.set(name, family);
      } else if (family.type !== type) {
        onProblem?.(
          `metric "${metric.descriptor.name}" in scope "${scopeMetrics.scope.name}" is a ${type} but "${name}" is already a ${family.type}`,
        );
        continue;
      }

      if (family.help === undefined && metric.descriptor.description.length > 0) {
        family.help = metric.descriptor.description;
      }
      family.samples.push(...metricSamples(name, scopeLabels, metric));
    }
  }

  const lines: string[] = [];
  for (const family of families.values()) {
    if (family.help !== undefined) {
      lines.push(`# HELP ${family.name} ${escapeHelp(family.help)}`);
    }
    lines.push(`# TYPE ${family.name} ${family.type}`);
    lines.push(...family.samples);
  }
  return `${lines.join("\n")}\n`;
}
