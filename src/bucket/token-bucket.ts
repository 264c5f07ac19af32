import { transition, type AcquisitionResult, type BucketState } from './acquisition.js';
import { monotonicClock, type Clock } from './clock.js';
import { assertPositiveFinite, assertValidCount } from './errors.js';
import { logger } from '../monitoring/logger.js';
import { bucketClockSkew } from '../monitoring/metrics.js';

export interface TokenBucketOptions {
  clock?: Clock;
  /** Label for logs and metrics. */
  name?: string;
}

/** Anything that hands out tokens the way a {@link TokenBucket} does. */
export interface RateLimiter {
  acquire(count?: number): AcquisitionResult;
}

/**
 * Token bucket rate limiter.
 * Refills at `rate` tokens per second of elapsed time and allows bursts up to `capacity`.
 *
 * `acquire` runs to completion without yielding, so within one thread calls
 * never interleave. To share a bucket between worker threads use
 * `SharedTokenBucket`.
 */
export class TokenBucket implements RateLimiter {
  readonly rate: number;
  readonly capacity: number;
  readonly name: string;
  private readonly clock: Clock;
  private state: BucketState;

  constructor(rate: number, capacity: number, options: TokenBucketOptions = {}) {
    assertPositiveFinite('rate', rate);
    assertPositiveFinite('capacity', capacity);
    this.rate = rate;
    this.capacity = capacity;
    this.name = options.name ?? 'default';
    this.clock = options.clock ?? monotonicClock;
    this.state = { tokens: capacity, lastUpdate: this.clock() };
  }

  /**
   * Take `count` tokens if that many are available.
   * A denied request is a normal result, not an error.
   *
   * @throws InvalidTokenCountError when `count` is negative or not finite
   */
  acquire(count = 1): AcquisitionResult {
    assertValidCount(count);
    const next = transition(this.state, this, this.clock(), count);
    this.state = next.state;

    if (next.skewMs > 0) {
      bucketClockSkew.inc({ bucket: this.name });
      logger.warn({ bucket: this.name, skewMs: next.skewMs }, 'Clock moved backwards, treating elapsed time as zero');
    }
    return next.result;
  }
}
