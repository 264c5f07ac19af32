import client from 'prom-client';

// Own registry: importing the library must not touch the process-wide default one.
export const metricsRegistry = new client.Registry();

export const bucketAcquisitions = new client.Counter({
  name: 'token_bucket_acquisitions_total',
  help: 'Token bucket acquisitions by outcome',
  labelNames: ['bucket', 'outcome'] as const,
  registers: [metricsRegistry],
});

export const bucketClockSkew = new client.Counter({
  name: 'token_bucket_clock_skew_total',
  help: 'Clock readings earlier than the bucket\'s last update',
  labelNames: ['bucket'] as const,
  registers: [metricsRegistry],
});
