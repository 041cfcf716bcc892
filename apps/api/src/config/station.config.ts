import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    PORT: positiveInt.default(3001),
    DATABASE_URL: z.string().min(1).optional(),
    CORS_ORIGIN: z.string().default('*'),
    CACHE_CAPACITY: positiveInt.default(100),
    POOL_MIN: positiveInt.default(2),
    POOL_MAX: positiveInt.default(5),
    ACQUIRE_TIMEOUT_MS: positiveInt.default(5_000),
    WINDOW_DEFAULT_MINUTES: positiveInt.default(60),
    CACHE_SUFFICIENCY_THRESHOLD: positiveInt.default(30),
  })
  .refine((env) => env.POOL_MIN <= env.POOL_MAX, {
    message: 'POOL_MIN must not exceed POOL_MAX',
    path: ['POOL_MIN'],
  });

export interface StationConfig {
  port: number;
  databaseUrl?: string;
  corsOrigin: string;
  cacheCapacity: number;
  poolMin: number;
  poolMax: number;
  acquireTimeoutMs: number;
  windowDefaultMs: number;
  /** Minimum cached samples in a window before storage is skipped. */
  cacheSufficiencyThreshold: number;
}

/** Reads station settings from the environment; throws a ZodError on bad values. */
export function loadStationConfig(env: NodeJS.ProcessEnv = process.env): StationConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    corsOrigin: parsed.CORS_ORIGIN,
    cacheCapacity: parsed.CACHE_CAPACITY,
    poolMin: parsed.POOL_MIN,
    poolMax: parsed.POOL_MAX,
    acquireTimeoutMs: parsed.ACQUIRE_TIMEOUT_MS,
    windowDefaultMs: parsed.WINDOW_DEFAULT_MINUTES * 60_000,
    cacheSufficiencyThreshold: parsed.CACHE_SUFFICIENCY_THRESHOLD,
  };
}
