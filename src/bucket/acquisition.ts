/**
 * Outcome of an `acquire` call. Both arms carry `observedRate`, the rate implied
 * by the gap since the previous call (1 / elapsed seconds). It describes how
 * callers are spacing their calls and is unrelated to the configured rate.
 */
export type AcquisitionResult =
  | { readonly admitted: true; readonly observedRate: number }
  | { readonly admitted: false; readonly observedRate: number };

export interface BucketState {
  tokens: number;
  /** Clock reading (ms) of the most recent acquisition. */
  lastUpdate: number;
}

export interface BucketLimits {
  /** Tokens added per second. */
  rate: number;
  capacity: number;
}

export interface Transition {
  state: BucketState;
  result: AcquisitionResult;
  /** How far the clock went backwards (ms), or 0. */
  skewMs: number;
}

export function isAdmitted(
  result: AcquisitionResult,
): result is { readonly admitted: true; readonly observedRate: number } {
  return result.admitted;
}

/**
 * Single acquisition step. Replenishment is always committed and `lastUpdate`
 * always advances; `count` is only deducted when admitted.
 * A backwards clock counts as zero elapsed time and leaves `lastUpdate` where it was.
 */
export function transition(
  state: BucketState,
  limits: BucketLimits,
  now: number,
  count: number,
): Transition {
  const deltaMs = now - state.lastUpdate;
  const skewMs = deltaMs < 0 ? -deltaMs : 0;
  const elapsedS = Math.max(0, deltaMs) / 1000;

  let tokens = Math.min(limits.capacity, state.tokens + limits.rate * elapsedS);
  const admitted = tokens >= count;
  if (admitted) {
    tokens -= count;
  }

  const observedRate = elapsedS > 0 ? 1 / elapsedS : Number.POSITIVE_INFINITY;

  return {
    // Never rewind: time between the backwards reading and lastUpdate is already credited.
    state: { tokens, lastUpdate: Math.max(state.lastUpdate, now) },
    result: admitted ? { admitted: true, observedRate } : { admitted: false, observedRate },
    skewMs,
  };
}
