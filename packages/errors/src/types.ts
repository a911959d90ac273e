/**
 * Type infrastructure for the error system.
 */

import type { ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

/**
 * Options for constructing a catalog-backed error.
 * The code determines httpStatus, grpcCode, domain, and isExpected via catalog lookup.
 */
export interface TelexErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: Error | undefined;
}
