// Token bucket whose state lives in a SharedArrayBuffer so every worker thread
// holding a handle to the same buffer draws from one bucket.
//
// Layout:
//   bytes  0..32  Float64 x4: rate, capacity, tokens, lastUpdate (ms)
//   bytes 32..36  Int32 lock word (0 = free, 1 = held)
//
// The float slots are only read or written while the lock word is held.

import { transition, type AcquisitionResult, type Transition } from './acquisition.js';
import { monotonicClock, type Clock } from './clock.js';
import { InvalidBucketConfigError, assertPositiveFinite, assertValidCount } from './errors.js';
import type { RateLimiter } from './token-bucket.js';
import { logger } from '../monitoring/logger.js';
import { bucketClockSkew } from '../monitoring/metrics.js';

export const SHARED_BUCKET_BYTE_LEN = 36;

const SlotIndex = {
  RATE: 0,
  CAPACITY: 1,
  TOKENS: 2,
  LAST_UPDATE: 3,
} as const;

const LOCK_BYTE_OFFSET = 32;
const UNLOCKED = 0;
const LOCKED = 1;
const LOCK_WAIT_MS = 1;

export interface SharedTokenBucketOptions {
  /** Must give comparable readings in every thread that shares the buffer. */
  clock?: Clock;
  name?: string;
}

export class SharedTokenBucket implements RateLimiter {
  readonly name: string;
  private readonly sab: SharedArrayBuffer;
  private readonly slots: Float64Array;
  private readonly lockWord: Int32Array;
  private readonly clock: Clock;

  private constructor(sab: SharedArrayBuffer, options: SharedTokenBucketOptions) {
    this.sab = sab;
    this.slots = new Float64Array(sab, 0, 4);
    this.lockWord = new Int32Array(sab, LOCK_BYTE_OFFSET, 1);
    this.clock = options.clock ?? monotonicClock;
    this.name = options.name ?? 'shared';
  }

  /** Allocate a new, full bucket. */
  static create(rate: number, capacity: number, options: SharedTokenBucketOptions = {}): SharedTokenBucket {
    assertPositiveFinite('rate', rate);
    assertPositiveFinite('capacity', capacity);

    const bucket = new SharedTokenBucket(new SharedArrayBuffer(SHARED_BUCKET_BYTE_LEN), options);
    bucket.slots[SlotIndex.RATE] = rate;
    bucket.slots[SlotIndex.CAPACITY] = capacity;
    bucket.slots[SlotIndex.TOKENS] = capacity;
    bucket.slots[SlotIndex.LAST_UPDATE] = bucket.clock();
    return bucket;
  }

  /** Wrap a buffer created by {@link SharedTokenBucket.create}, typically in another worker. */
  static attach(buffer: unknown, options: SharedTokenBucketOptions = {}): SharedTokenBucket {
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new InvalidBucketConfigError('buffer', buffer, 'must be a SharedArrayBuffer');
    }
    if (buffer.byteLength < SHARED_BUCKET_BYTE_LEN) {
      throw new InvalidBucketConfigError(
        'buffer',
        `${buffer.byteLength} bytes`,
        `is too small, need ${SHARED_BUCKET_BYTE_LEN}`,
      );
    }

    const bucket = new SharedTokenBucket(buffer, options);
    assertPositiveFinite('rate', bucket.rate);
    assertPositiveFinite('capacity', bucket.capacity);
    return bucket;
  }

  get buffer(): SharedArrayBuffer {
    return this.sab;
  }

  get rate(): number {
    return this.slots[SlotIndex.RATE];
  }

  get capacity(): number {
    return this.slots[SlotIndex.CAPACITY];
  }

  /**
   * Same semantics as `TokenBucket.acquire`, serialized across every handle of
   * the buffer.
   *
   * @throws InvalidTokenCountError when `count` is negative or not finite
   */
  acquire(count = 1): AcquisitionResult {
    assertValidCount(count);

    const { skewMs, result } = this.step(count);
    if (skewMs > 0) {
      bucketClockSkew.inc({ bucket: this.name });
      logger.warn({ bucket: this.name, skewMs }, 'Clock moved backwards, treating elapsed time as zero');
    }
    return result;
  }

  private step(count: number): Transition {
    this.lock();
    try {
      const next = transition(
        { tokens: this.slots[SlotIndex.TOKENS], lastUpdate: this.slots[SlotIndex.LAST_UPDATE] },
        { rate: this.slots[SlotIndex.RATE], capacity: this.slots[SlotIndex.CAPACITY] },
        this.clock(),
        count,
      );
      this.slots[SlotIndex.TOKENS] = next.state.tokens;
      this.slots[SlotIndex.LAST_UPDATE] = next.state.lastUpdate;
      return next;
    } finally {
      this.unlock();
    }
  }

  private lock(): void {
    while (Atomics.compareExchange(this.lockWord, 0, UNLOCKED, LOCKED) !== UNLOCKED) {
      Atomics.wait(this.lockWord, 0, LOCKED, LOCK_WAIT_MS);
    }
  }

  private unlock(): void {
    Atomics.store(this.lockWord, 0, UNLOCKED);
    Atomics.notify(this.lockWord, 0, 1);
  }
}
