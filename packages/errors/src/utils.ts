import { isTelexError, type TelexError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";

/**
 * Wrap an unknown error into a TelexError.
 * If the error is already a TelexError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): TelexError {
  if (isTelexError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Normalize an unknown thrown value into an `Error`
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
