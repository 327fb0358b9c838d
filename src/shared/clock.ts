import {setTimeout as delay} from "node:timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) {
      await delay(ms);
    }
  }
};

/** Uniform in [0, 1). */
export type RandomSource = () => number;
