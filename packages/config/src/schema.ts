/**
 * Zod schema for the telemetry configuration.
 */

import { z } from "zod";
import {
  DEFAULT_LEVEL,
  DEFAULT_PROMETHEUS_PORT,
  DEFAULT_SERVICE_NAME,
  ENTERPRISE_NUMBER_KEY,
  SERVICE_NAME_KEY,
  SUPPORTED_URL_SCHEMES,
} from "./constants.js";

function hasExplicitPort(raw: string, url: URL): boolean {
  // WHATWG URL drops a port equal to the scheme default, so fall back to the raw text.
  return url.port !== "" || /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*:\d+(?:[/?#]|$)/i.test(raw);
}

const endpointSchema = z
  .string()
  .min(1, { message: "url must not be empty" })
  .superRefine((value, ctx) => {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid URL` });
      return;
    }
    if (!SUPPORTED_URL_SCHEMES.includes(url.protocol)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" uses unsupported scheme ${url.protocol}`,
      });
    }
    if (url.hostname === "") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" has no host` });
    }
    if (!hasExplicitPort(value, url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" has no port` });
    }
  });

const regexSchema = z.string().superRefine((value, ctx) => {
  try {
    new RegExp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${value}" is not a valid regular expression: ${
        error instanceof Error ? error.message : String(error)
      }`,
    });
  }
});

const severitySchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const metricExportTargetSchema = z.object({
  url: endpointSchema,
  intervalSecs: z.number().int().positive({ message: "intervalSecs must be a positive integer" }),
  timeoutSecs: z.number().int().positive({ message: "timeoutSecs must be a positive integer" }),
  temporality: z.enum(["cumulative", "delta"]).default("cumulative"),
  caCertPath: z.string().min(1).optional(),
});

const logExportTargetSchema = z.object({
  url: endpointSchema,
  intervalSecs: z.number().int().positive({ message: "intervalSecs must be a positive integer" }),
  timeoutSecs: z.number().int().positive({ message: "timeoutSecs must be a positive integer" }),
  exportSeverity: severitySchema.optional(),
  caCertPath: z.string().min(1).optional(),
});

const regexFilterSchema = z.object({
  moduleRegex: regexSchema,
  logTextRegex: regexSchema,
  action: z.literal("disallow"),
});

export const telemetryConfigSchema = z.object({
  serviceName: z
    .string()
    .trim()
    .min(1, { message: "serviceName must not be empty" })
    .default(() => process.env.OTEL_SERVICE_NAME ?? DEFAULT_SERVICE_NAME),
  enterpriseNumber: z
    .string()
    .regex(/^\d+$/, { message: "enterpriseNumber must be a decimal number" })
    .optional(),
  emitMetricsToStdout: z.boolean().default(false),
  emitLogsToStderr: z.boolean().default(true),
  metricsExportTargets: z.array(metricExportTargetSchema).default([]),
  logExportTargets: z.array(logExportTargetSchema).default([]),
  level: z.string().default(() => process.env.OTEL_LOG_LEVEL ?? DEFAULT_LEVEL),
  resourceAttributes: z
    .record(z.string().min(1), z.string())
    .default({})
    .superRefine((attributes, ctx) => {
      for (const key of [SERVICE_NAME_KEY, ENTERPRISE_NUMBER_KEY]) {
        if (key in attributes) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${key}" is set from the configuration and cannot be a resource attribute`,
            path: [key],
          });
        }
      }
    }),
  prometheusConfig: z
    .object({
      port: z.number().int().min(0).max(65_535).default(DEFAULT_PROMETHEUS_PORT),
    })
    .optional(),
  regexFilters: z.array(regexFilterSchema).default([]),
});

export type ParsedTelemetryConfig = z.infer<typeof telemetryConfigSchema>;
