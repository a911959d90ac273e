/**
 * StdoutMetricExporter — writes each instrument of a snapshot as a
 * pretty-printed JSON document.
 */

import type { HrTime } from "@opentelemetry/api";
import { type ExportResult, ExportResultCode, hrTimeToMilliseconds } from "@opentelemetry/core";
import {
  AggregationTemporality,
  DataPointType,
  type MetricData,
  type PushMetricExporter,
  type ResourceMetrics,
} from "@opentelemetry/sdk-metrics";
import { toError } from "@telex/errors";

export interface StdoutMetricExporterOptions {
  /** Defaults to process.stdout */
  readonly write?: (text: string) => void;
}

export interface MetricDocument {
  readonly resource: Readonly<Record<string, unknown>>;
  readonly scope: string;
  readonly name: string;
  readonly description: string;
  readonly unit: string;
  readonly kind: string;
  readonly temporality: string;
  readonly dataPoints: readonly {
    readonly attributes: Readonly<Record<string, unknown>>;
    readonly startTime: string;
    readonly endTime: string;
    readonly value: unknown;
  }[];
}

function isoTime(time: HrTime): string {
  return new Date(hrTimeToMilliseconds(time)).toISOString();
}

export function toMetricDocument(
  resource: ResourceMetrics["resource"],
  scope: string,
  metric: MetricData,
): MetricDocument {
  const dataPoints: MetricDocument["dataPoints"][number][] = [];
  for (const point of metric.dataPoints) {
    dataPoints.push({
      attributes: { ...point.attributes },
      startTime: isoTime(point.startTime),
      endTime: isoTime(point.endTime),
      value: point.value,
    });
  }
  return {
    resource: { ...resource.attributes },
    scope,
    name: metric.descriptor.name,
    description: metric.descriptor.description,
    unit: metric.descriptor.unit,
    kind: DataPointType[metric.dataPointType],
    temporality: AggregationTemporality[metric.aggregationTemporality],
    dataPoints,
  };
}

export class StdoutMetricExporter implements PushMetricExporter {
  private readonly _write: (text: string) => void;

  constructor(options: StdoutMetricExporterOptions = {}) {
    this._write = options.write ?? ((text) => process.stdout.write(text));
  }

  export(metrics: ResourceMetrics, resultCallback: (result: ExportResult) => void): void {
    try {
      for (const scopeMetrics of metrics.scopeMetrics) {
        for (const metric of scopeMetrics.metrics) {
          const document = toMetricDocument(metrics.resource, scopeMetrics.scope.name, metric);
          this._write(`${JSON.stringify(document, null, 2)}\n`);
        }
      }
      resultCallback({ code: ExportResultCode.SUCCESS });
    } catch (error: unknown) {
      resultCallback({ code: ExportResultCode.FAILED, error: toError(error) });
    }
  }

  async forceFlush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}
