/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the service reads goes through here; nothing else touches
 * process.env. dotenv loads .env, a Zod schema validates and coerces it once
 * at startup, and any missing or invalid value exits the process with the
 * offending keys printed. The capture settings come from captureConfig.ts
 * and are required; the rest have defaults for local runs.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

import { captureEnvShape, toCaptureConfig } from './captureConfig';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Largest body the host's parsers will buffer (body-parser size string). */
  BODY_LIMIT: z.string().min(1).default('1mb'),

  ...captureEnvShape,

  /** Largest size class the buffer pool keeps; bigger leases are one-off allocations. */
  BUFFER_POOL_MAX_CLASS_BYTES: z.coerce.number().int().min(16).default(1024 * 1024),
  /** Free buffers retained per size class. */
  BUFFER_POOL_MAX_PER_CLASS: z.coerce.number().int().min(1).default(32),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  http: {
    bodyLimit: env.BODY_LIMIT,
  },

  capture: toCaptureConfig(env),

  bufferPool: {
    maxClassBytes: env.BUFFER_POOL_MAX_CLASS_BYTES,
    maxPerClass: env.BUFFER_POOL_MAX_PER_CLASS,
  },
} as const;

export type AppConfig = typeof config;
