import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await sleep(ms);
  }
};
