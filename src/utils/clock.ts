// src/utils/clock.ts

/**
 * Time source for the request pipeline. Swapped in tests to run
 * rate-limit and backoff waits without real sleeping.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
