/**
 * Application config, read once from the environment (.env via dotenv).
 * Select the sample store via TRACK_STORE: postgres (default) | memory
 */

import { z } from 'zod';
import { DEFAULT_EPSILON_M } from '@trackfold/domain';
import type { PoolSettings } from '@trackfold/adapters';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  JSON_BODY_LIMIT: z.string().default('10mb'),
  TRACK_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  PG_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  COMPRESSION_DEFAULT_EPSILON: z.coerce.number().positive().default(DEFAULT_EPSILON_M),
  COMPRESSION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  COMPRESSION_MIN_EPSILON: z.coerce.number().positive().default(0.5),
  COMPRESSION_MIN_SAMPLES: z.coerce.number().int().min(0).default(100),
});

export type TrackStore = 'postgres' | 'memory';

export interface CompressionSettings {
  defaultEpsilon: number;
  maxAttempts: number;
  minEpsilon: number;
  /** Tracks with this many samples or fewer are left alone. */
  minSamples: number;
}

export interface AppConfig {
  port: number;
  corsOrigin: string;
  jsonBodyLimit: string;
  trackStore: TrackStore;
  database: PoolSettings;
  compression: CompressionSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    jsonBodyLimit: parsed.JSON_BODY_LIMIT,
    trackStore: parsed.TRACK_STORE,
    database: {
      connectionString: parsed.DATABASE_URL,
      maxConnections: parsed.PG_POOL_MAX,
      statementTimeoutMs: parsed.PG_STATEMENT_TIMEOUT_MS,
    },
    compression: {
      defaultEpsilon: parsed.COMPRESSION_DEFAULT_EPSILON,
      maxAttempts: parsed.COMPRESSION_MAX_ATTEMPTS,
      minEpsilon: parsed.COMPRESSION_MIN_EPSILON,
      minSamples: parsed.COMPRESSION_MIN_SAMPLES,
    },
  };
}
