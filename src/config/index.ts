import fs from 'node:fs';
import dotenv from 'dotenv';
import { ConfigSchema, type AppConfig } from './schema.js';
import { logger } from '../monitoring/logger.js';

/**
 * Build the configuration from the environment. Per-key buckets come from the
 * JSON file named by BUCKET_CONFIG_PATH, when set. Applies the log level to
 * the shared logger.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  let buckets: unknown = {};
  const bucketConfigPath = env.BUCKET_CONFIG_PATH;
  if (bucketConfigPath) {
    try {
      const raw = fs.readFileSync(bucketConfigPath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      buckets = isRecord(parsed) && 'buckets' in parsed ? parsed.buckets : parsed;
    } catch (err) {
      throw new Error(`Failed to load bucket config from ${bucketConfigPath}: ${err}`);
    }
  }

  const rawConfig = {
    registry: {
      defaults: {
        rate: num(env.TOKEN_BUCKET_RATE, 10),
        capacity: num(env.TOKEN_BUCKET_CAPACITY, 10),
      },
      buckets,
    },
    logLevel: env.LOG_LEVEL || 'info',
  };

  const config = ConfigSchema.parse(rawConfig);
  logger.level = config.logLevel;
  return config;
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return isNaN(n) ? fallback : n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
