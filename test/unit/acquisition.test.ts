import { describe, it, expect } from 'vitest';
import { isAdmitted, transition, type BucketState } from '../../src/bucket/acquisition.js';

const limits = { rate: 2, capacity: 4 };

describe('transition()', () => {
  it('replenishes, admits and deducts', () => {
    const next = transition({ tokens: 1, lastUpdate: 0 }, limits, 1000, 2.5);
    expect(next).toEqual({
      state: { tokens: 0.5, lastUpdate: 1000 },
      result: { admitted: true, observedRate: 1 },
      skewMs: 0,
    });
  });

  it('commits replenishment and advances lastUpdate on denial', () => {
    const next = transition({ tokens: 0, lastUpdate: 0 }, limits, 250, 1);
    expect(next).toEqual({
      state: { tokens: 0.5, lastUpdate: 250 },
      result: { admitted: false, observedRate: 4 },
      skewMs: 0,
    });
  });

  it('clamps replenishment to capacity before the admission test', () => {
    const next = transition({ tokens: 3, lastUpdate: 0 }, limits, 10_000, 4);
    expect(next.result.admitted).toBe(true);
    expect(next.state.tokens).toBe(0);
  });

  it('admits when tokens exactly equal the count', () => {
    const next = transition({ tokens: 2, lastUpdate: 0 }, limits, 0, 2);
    expect(next.result).toEqual({ admitted: true, observedRate: Infinity });
    expect(next.state.tokens).toBe(0);
  });

  it('reports the backwards skew and keeps lastUpdate', () => {
    const next = transition({ tokens: 1, lastUpdate: 5000 }, limits, 4750, 1);
    expect(next).toEqual({
      state: { tokens: 0, lastUpdate: 5000 },
      result: { admitted: true, observedRate: Infinity },
      skewMs: 250,
    });
  });

  it('does not mutate the input state', () => {
    const state: BucketState = { tokens: 4, lastUpdate: 0 };
    transition(state, limits, 100, 1);
    expect(state).toEqual({ tokens: 4, lastUpdate: 0 });
  });
});

describe('isAdmitted()', () => {
  it('narrows on the admitted tag', () => {
    expect(isAdmitted({ admitted: true, observedRate: 3 })).toBe(true);
    expect(isAdmitted({ admitted: false, observedRate: 3 })).toBe(false);
  });
});
