import { ConnectionPool, RecencyCache, SystemClock } from '@weather-station/adapters';
import type { ClockPort, ConnectionFactory, ReadingConnection } from '@weather-station/domain';
import type { StationConfig } from './config/station.config.js';
import { CacheFirstAverageStrategy } from './services/analytics/average.strategy.js';
import { StationService } from './services/readings/station.service.js';

/**
 * Process-wide station state. Built once by initStationContext, handed to
 * the HTTP layer explicitly, and torn down by shutdownStationContext.
 */
export interface StationContext {
  config: StationConfig;
  clock: ClockPort;
  cache: RecencyCache;
  pool: ConnectionPool<ReadingConnection>;
  averages: CacheFirstAverageStrategy;
  service: StationService;
}

export async function initStationContext(
  config: StationConfig,
  factory: ConnectionFactory<ReadingConnection>,
  clock: ClockPort = new SystemClock(),
): Promise<StationContext> {
  const pool = await ConnectionPool.open(factory, {
    min: config.poolMin,
    max: config.poolMax,
    acquireTimeoutMs: config.acquireTimeoutMs,
    name: 'reading-pool',
  });
  try {
    await pool.withConnection((conn) => conn.ensureSchema());
  } catch (err) {
    await pool.close();
    throw err;
  }
  console.log('[station] storage schema ready');

  const cache = new RecencyCache(config.cacheCapacity);
  const averages = new CacheFirstAverageStrategy(cache, pool, clock, {
    sufficiencyThreshold: config.cacheSufficiencyThreshold,
    defaultWindowMs: config.windowDefaultMs,
  });
  const service = new StationService({ cache, pool, averages, clock });

  return { config, clock, cache, pool, averages, service };
}

export async function shutdownStationContext(ctx: StationContext): Promise<void> {
  await ctx.pool.close();
  ctx.cache.clear();
  console.log('[station] shut down');
}
