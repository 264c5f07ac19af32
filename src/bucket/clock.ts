/** A time source returning milliseconds. Readings may be fractional. */
export type Clock = () => number;

/**
 * Sub-millisecond clock aligned to the Unix epoch. Readings taken in different
 * worker threads are comparable, give or take the drift between their
 * `timeOrigin` values.
 */
export const monotonicClock: Clock = () => performance.timeOrigin + performance.now();

export interface ManualClock {
  now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

/** Settable clock for tests and simulations. May be moved backwards. */
export function createManualClock(start = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    set(ms: number) {
      current = ms;
    },
  };
}
