export { TokenBucket, type RateLimiter, type TokenBucketOptions } from './bucket/token-bucket.js';
export {
  SharedTokenBucket,
  SHARED_BUCKET_BYTE_LEN,
  type SharedTokenBucketOptions,
} from './bucket/shared-token-bucket.js';
export {
  isAdmitted,
  transition,
  type AcquisitionResult,
  type BucketLimits,
  type BucketState,
  type Transition,
} from './bucket/acquisition.js';
export { monotonicClock, createManualClock, type Clock, type ManualClock } from './bucket/clock.js';
export {
  TokenBucketError,
  InvalidBucketConfigError,
  InvalidTokenCountError,
  type TokenBucketErrorCode,
} from './bucket/errors.js';
export { BucketRegistry, type BucketRegistryOptions } from './bucket/registry.js';
export { loadConfig } from './config/index.js';
export {
  ConfigSchema,
  BucketConfigSchema,
  RegistryConfigSchema,
  type AppConfig,
  type BucketConfig,
  type RegistryConfig,
  type RegistryConfigInput,
} from './config/schema.js';
export { logger } from './monitoring/logger.js';
export { metricsRegistry, bucketAcquisitions, bucketClockSkew } from './monitoring/metrics.js';
