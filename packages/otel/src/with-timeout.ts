/**
 * Per-export timeout.
 *
 * Wraps a promise with a deadline on the injected clock. Rejects with
 * ExportTimeoutError when the deadline passes, or with the signal's reason
 * when the signal aborts first. The wrapped promise keeps running; its
 * result is ignored.
 */

import { ExportTimeoutError, toError } from "@telex/errors";
import { defaultClock } from "./clock.js";
import type { Clock } from "./types.js";

export interface WithTimeoutOptions {
  readonly clock?: Clock;
  readonly signal?: AbortSignal;
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  target: string,
  options: WithTimeoutOptions = {},
): Promise<T> {
  const clock = options.clock ?? defaultClock;
  const { signal } = options;

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clock.clearTimeout(timer);
      reject(toError(signal?.reason));
    };

    const timer = clock.setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      reject(new ExportTimeoutError(target, ms));
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        clock.clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clock.clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
