/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union, so an unknown value ('prod', 'staging') fails at startup
 *   instead of silently falling through to the wrong branch in di.ts.
 * - Booleans are parsed from 'true' | 'false'; z.coerce.boolean() would read "false" as true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('hallpass-backend'),

  // Session
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

  // Pass engine
  EXPIRY_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().min(0).max(3600).default(60),
  ANALYTICS_MIN_SAMPLE: z.coerce.number().int().min(1).default(1),
  PASS_REQUEST_LIMIT_PER_STUDENT: z.coerce.number().int().min(1).default(10),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlag,
  SEED_SCHOOL_KEY: z.string().min(1).default('edison'),
  SEED_SCHOOL_NAME: z.string().min(1).default('Edison Elementary School'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/** Student self-requests per student, per this many seconds. */
export const PASS_REQUEST_WINDOW_SECONDS = 15 * 60;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  sessionTtlSeconds: number;

  passes: {
    expirySweepIntervalMs: number;
    requestLimit: { limit: number; windowSeconds: number };
  };

  analytics: {
    minSample: number;
  };

  seed: {
    enabled: boolean;
    schoolKey: string;
    schoolName: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    passes: {
      expirySweepIntervalMs: parsed.EXPIRY_SWEEP_INTERVAL_SECONDS * 1000,
      requestLimit: {
        limit: parsed.PASS_REQUEST_LIMIT_PER_STUDENT,
        windowSeconds: PASS_REQUEST_WINDOW_SECONDS,
      },
    },

    analytics: {
      minSample: parsed.ANALYTICS_MIN_SAMPLE,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      schoolKey: parsed.SEED_SCHOOL_KEY,
      schoolName: parsed.SEED_SCHOOL_NAME,
    },
  };
}
