import { TelexError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { TelexErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or unexpected runtime states.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends TelexError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: TelexErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | TelexErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: TelexErrorOptions<C> | undefined =
      typeof messageOrOptions === "string" ? undefined : messageOrOptions;
    super(
      typeof messageOrOptions === "string" ? messageOrOptions : messageOrOptions.message,
      opts ? opts.metadata : metadata,
      opts ? opts.traceId : traceId,
      opts?.cause ? { cause: opts.cause } : undefined,
    );
    this.code = opts ? opts.code : ("INTERNAL_ERROR" as C);
    const entry = ERROR_CATALOG[this.code];
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
