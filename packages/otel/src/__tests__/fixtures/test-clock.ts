import type { Clock } from "../../types.js";

export interface ScheduledTimer {
  fn: () => void;
  ms: number;
  id: number;
}

export type TestClock = Clock & {
  advance(ms: number): void;
  pending: ScheduledTimer[];
  readonly currentTime: number;
};

/**
 * Manually driven clock. `advance(ms)` moves time forward and fires every
 * pending timer whose delay is at most `ms`.
 */
export function createTestClock(start = 1000): TestClock {
  let time = start;
  let nextId = 1;
  const pending: ScheduledTimer[] = [];

  return {
    get currentTime() {
      return time;
    },
    now: () => time,
    setTimeout: (fn: () => void, ms: number) => {
      const id = nextId++;
      pending.push({ fn, ms, id });
      return id as unknown as ReturnType<typeof globalThis.setTimeout>;
    },
    clearTimeout: (id: ReturnType<typeof globalThis.setTimeout>) => {
      const idx = pending.findIndex((t) => t.id === (id as unknown as number));
      if (idx !== -1) pending.splice(idx, 1);
    },
    advance: (ms: number) => {
      time += ms;
      const ready = pending.filter((t) => t.ms <= ms);
      for (const timer of ready) {
        const idx = pending.indexOf(timer);
        if (idx !== -1) pending.splice(idx, 1);
        timer.fn();
      }
    },
    pending,
  };
}
