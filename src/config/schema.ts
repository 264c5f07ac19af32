import { z } from 'zod';

const positive = z.number().finite().positive();

const BucketConfigSchema = z.object({
  rate: positive,
  capacity: positive,
});

export type BucketConfig = z.infer<typeof BucketConfigSchema>;

const RegistryConfigSchema = z.object({
  defaults: BucketConfigSchema,
  buckets: z.record(z.string().min(1), BucketConfigSchema).default({}),
});

export type RegistryConfig = z.output<typeof RegistryConfigSchema>;
export type RegistryConfigInput = z.input<typeof RegistryConfigSchema>;

const ConfigSchema = z.object({
  registry: RegistryConfigSchema,
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type AppConfig = z.output<typeof ConfigSchema>;

export { ConfigSchema, BucketConfigSchema, RegistryConfigSchema };
