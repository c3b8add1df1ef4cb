/**
 * Engine configuration
 *
 * Read from environment variables and validated with zod.
 */

import { z } from 'zod';
import { assertTimeZone } from '../time.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const timeZoneSchema = z
  .string()
  .default('UTC')
  .refine(
    (timeZone) => {
      try {
        assertTimeZone(timeZone);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Unknown IANA time zone' }
  );

const envSchema = z.object({
  REFRESH_INTERVAL_SECONDS: positiveInt(60),
  MAX_CONCURRENT_REFRESHES: positiveInt(4),
  REFRESH_TIMEOUT_MS: positiveInt(15_000),
  STORE_TIMEOUT_MS: positiveInt(5_000),
  DISPATCH_TIMEOUT_MS: positiveInt(10_000),
  FETCH_DAYS: z.coerce.number().int().min(1).max(31).default(8),
  ENGINE_TIMEZONE: timeZoneSchema,
  STALE_AFTER_SECONDS: z.coerce.number().int().positive().optional(),
  SHUTDOWN_DEADLINE_MS: positiveInt(10_000),
  CYCLE_LOCK_ENABLED: booleanFlag(false),
  CYCLE_LOCK_TTL_SECONDS: positiveInt(120),
  METRICS_ENABLED: booleanFlag(true),
  DEMO_SOURCES: booleanFlag(false),
});

export interface EngineConfig {
  refreshIntervalMs: number;
  maxConcurrentRefreshes: number;
  refreshTimeoutMs: number;
  storeTimeoutMs: number;
  dispatchTimeoutMs: number;
  fetchDays: number;
  timeZone: string;
  staleAfterMs: number;
  shutdownDeadlineMs: number;
  cycleLockEnabled: boolean;
  cycleLockTtlSeconds: number;
  metricsEnabled: boolean;
  demoSources: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  refreshIntervalMs: 60_000,
  maxConcurrentRefreshes: 4,
  refreshTimeoutMs: 15_000,
  storeTimeoutMs: 5_000,
  dispatchTimeoutMs: 10_000,
  fetchDays: 8,
  timeZone: 'UTC',
  staleAfterMs: 180_000,
  shutdownDeadlineMs: 10_000,
  cycleLockEnabled: false,
  cycleLockTtlSeconds: 120,
  metricsEnabled: true,
  demoSources: false,
};

/**
 * Parse engine settings from an environment map.
 * Throws with every invalid variable listed when validation fails.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid engine configuration: ${details}`);
  }

  const values = parsed.data;
  const refreshIntervalMs = values.REFRESH_INTERVAL_SECONDS * 1000;

  return {
    refreshIntervalMs,
    maxConcurrentRefreshes: values.MAX_CONCURRENT_REFRESHES,
    refreshTimeoutMs: values.REFRESH_TIMEOUT_MS,
    storeTimeoutMs: values.STORE_TIMEOUT_MS,
    dispatchTimeoutMs: values.DISPATCH_TIMEOUT_MS,
    fetchDays: values.FETCH_DAYS,
    timeZone: values.ENGINE_TIMEZONE,
    staleAfterMs: (values.STALE_AFTER_SECONDS ?? (refreshIntervalMs / 1000) * 3) * 1000,
    shutdownDeadlineMs: values.SHUTDOWN_DEADLINE_MS,
    cycleLockEnabled: values.CYCLE_LOCK_ENABLED,
    cycleLockTtlSeconds: values.CYCLE_LOCK_TTL_SECONDS,
    metricsEnabled: values.METRICS_ENABLED,
    demoSources: values.DEMO_SOURCES,
  };
}
