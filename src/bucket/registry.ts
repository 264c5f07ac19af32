import type { AcquisitionResult } from './acquisition.js';
import type { Clock } from './clock.js';
import { TokenBucket } from './token-bucket.js';
import {
  RegistryConfigSchema,
  type BucketConfig,
  type RegistryConfig,
  type RegistryConfigInput,
} from '../config/schema.js';
import { logger } from '../monitoring/logger.js';
import { bucketAcquisitions } from '../monitoring/metrics.js';

export interface BucketRegistryOptions {
  /** Clock handed to every bucket the registry creates. */
  clock?: Clock;
}

/**
 * One bucket per rate-limited resource, created on first use.
 * Keys listed under `buckets` get their own limits, all others the `defaults`.
 *
 * The key is also the `bucket` label on the acquisition counter, so every
 * distinct key becomes a metric series. Keep keys to a bounded set (client or
 * route ids, not request ids); `delete` drops the key's series with its bucket.
 */
export class BucketRegistry {
  private readonly defaults: BucketConfig;
  private readonly overrides: Map<string, BucketConfig>;
  private readonly clock: Clock | undefined;
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(config: RegistryConfigInput, options: BucketRegistryOptions = {}) {
    const parsed: RegistryConfig = RegistryConfigSchema.parse(config);
    this.defaults = parsed.defaults;
    this.overrides = new Map(Object.entries(parsed.buckets));
    this.clock = options.clock;
  }

  get size(): number {
    return this.buckets.size;
  }

  has(key: string): boolean {
    return this.buckets.has(key);
  }

  get(key: string): TokenBucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      const { rate, capacity } = this.limitsFor(key);
      bucket = new TokenBucket(rate, capacity, { name: key, clock: this.clock });
      this.buckets.set(key, bucket);
      logger.debug({ bucket: key, rate, capacity }, 'Token bucket created');
    }
    return bucket;
  }

  acquire(key: string, count = 1): AcquisitionResult {
    const result = this.get(key).acquire(count);
    bucketAcquisitions.inc({ bucket: key, outcome: result.admitted ? 'admitted' : 'denied' });
    if (!result.admitted) {
      logger.debug({ bucket: key, count, observedRate: result.observedRate }, 'Acquisition denied');
    }
    return result;
  }

  /** Drop a key's bucket and its metric series; the next use starts a fresh, full one. */
  delete(key: string): boolean {
    if (!this.buckets.delete(key)) return false;
    bucketAcquisitions.remove({ bucket: key, outcome: 'admitted' });
    bucketAcquisitions.remove({ bucket: key, outcome: 'denied' });
    return true;
  }

  private limitsFor(key: string): BucketConfig {
    return this.overrides.get(key) ?? this.defaults;
  }
}
