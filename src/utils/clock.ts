import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source for the polling loops. Production code uses the system clock;
 * tests inject a fake that advances instantly on `sleep`.
 */
export interface Clock {
  /** Monotonic milliseconds. */
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms: number) => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
