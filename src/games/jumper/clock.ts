/**
 * Time source for the frame scheduler. The manual clock advances on
 * sleep() so a whole level can run without waiting in real time.
 */

export interface Clock {
  /** Milliseconds, monotonic */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface ManualClock extends Clock {
  advance(ms: number): void;
  readonly sleeps: readonly number[];
}

export function createManualClock(start = 0): ManualClock {
  let now = start;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: (ms) => {
      sleeps.push(ms);
      now += Math.max(0, ms);
      return Promise.resolve();
    },
    advance: (ms) => {
      now += ms;
    },
    sleeps,
  };
}
