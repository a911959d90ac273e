/**
 * Recursive setTimeout loop with drift compensation.
 *
 * The next tick is scheduled `intervalMs` after the previous one started,
 * so a slow tick shortens the following wait instead of shifting the whole
 * schedule. Each task owns its own timer.
 */

import type { Clock } from "./types.js";

export interface PeriodicTaskOptions {
  readonly intervalMs: number;
  readonly clock: Clock;
  readonly run: () => Promise<void>;
  /** Receives a rejection from `run`; the schedule continues */
  readonly onError: (error: unknown) => void;
}

export class PeriodicTask {
  private readonly _intervalMs: number;
  private readonly _clock: Clock;
  private readonly _run: () => Promise<void>;
  private readonly _onError: (error: unknown) => void;
  private _running = false;
  private _timerId: ReturnType<typeof globalThis.setTimeout> | undefined;
  private _inFlight: Promise<void> | undefined;

  constructor(options: PeriodicTaskOptions) {
    this._intervalMs = options.intervalMs;
    this._clock = options.clock;
    this._run = options.run;
    this._onError = options.onError;
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Start ticking. The first tick fires one interval from now. Idempotent.
   */
  start(): void {
    if (this._running) return;
    this._running = true;
    this._scheduleNextTick(this._intervalMs);
  }

  /**
   * Stop ticking and wait for an in-progress tick to complete.
   */
  async stop(): Promise<void> {
    if (!this._running) return;
    this._running = false;

    if (this._timerId !== undefined) {
      this._clock.clearTimeout(this._timerId);
      this._timerId = undefined;
    }

    await this._inFlight;
  }

  private _scheduleNextTick(delayMs: number): void {
    if (!this._running) return;

    this._timerId = this._clock.setTimeout(() => {
      this._timerId = undefined;
      this._inFlight = this._executeTick();
    }, delayMs);
  }

  private async _executeTick(): Promise<void> {
    if (!this._running) return;

    const tickStart = this._clock.now();
    try {
      await this._run();
    } catch (error: unknown) {
      this._onError(error);
    }

    if (!this._running) return;

    const elapsed = this._clock.now() - tickStart;
    this._scheduleNextTick(Math.max(0, this._intervalMs - elapsed));
  }
}
