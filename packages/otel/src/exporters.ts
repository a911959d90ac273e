/**
 * OTLP/gRPC exporters for configured targets.
 *
 * `grpc://` and `grpcs://` endpoints are rewritten to `http://` and
 * `https://`, which the gRPC exporters read as plaintext and TLS.
 */

import { readFileSync } from "node:fs";
import { type ChannelCredentials, credentials } from "@grpc/grpc-js";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-grpc";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import type { LogRecordExporter } from "@opentelemetry/sdk-logs";
import type { PushMetricExporter } from "@opentelemetry/sdk-metrics";
import type { LogExportTarget, MetricExportTarget } from "@telex/config";

export function toExporterUrl(url: string): string {
  if (url.startsWith("grpcs://")) return `https://${url.slice("grpcs://".length)}`;
  if (url.startsWith("grpc://")) return `http://${url.slice("grpc://".length)}`;
  return url;
}

export function isTlsUrl(url: string): boolean {
  return url.startsWith("https://") || url.startsWith("grpcs://");
}

function channelCredentials(url: string, caCertPath: string | undefined): ChannelCredentials {
  if (!isTlsUrl(url)) return credentials.createInsecure();
  return caCertPath !== undefined
    ? credentials.createSsl(readFileSync(caCertPath))
    : credentials.createSsl();
}

export function createOtlpMetricExporter(target: MetricExportTarget): PushMetricExporter {
  return new OTLPMetricExporter({
    url: toExporterUrl(target.url),
    credentials: channelCredentials(target.url, target.caCertPath),
    timeoutMillis: target.timeoutSecs * 1000,
  });
}

export function createOtlpLogExporter(target: LogExportTarget): LogRecordExporter {
  return new OTLPLogExporter({
    url: toExporterUrl(target.url),
    credentials: channelCredentials(target.url, target.caCertPath),
    timeoutMillis: target.timeoutSecs * 1000,
  });
}
