import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * Serialized form of a {@link TelexError}, safe to log or ship over the wire.
 */
export interface ErrorJSON {
  _tag: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string>;
  traceId?: string;
  cause?: string;
}

/**
 * Root of the Telex error hierarchy.
 *
 * Subclasses pin `_tag` and `code`; the remaining fields come from the
 * catalog entry for that code.
 */
export abstract class TelexError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Type guard for any error in the Telex hierarchy
 */
export function isTelexError(error: unknown): error is TelexError {
  return error instanceof TelexError;
}
