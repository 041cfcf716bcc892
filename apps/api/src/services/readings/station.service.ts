import type { RecencyCache } from '@weather-station/adapters';
import type {
  AverageQuery,
  AverageResult,
  ClockPort,
  ConnectionPoolPort,
  QueryOptions,
  Reading,
  ReadingConnection,
  ReadingInput,
  StationHealth,
  StationServicePort,
  StationStatus,
} from '@weather-station/domain';
import type { CacheFirstAverageStrategy } from '../analytics/average.strategy.js';
import { checkRecentLimit, toNewReading } from './reading.schema.js';

export interface StationServiceDeps {
  cache: RecencyCache;
  pool: ConnectionPoolPort<ReadingConnection>;
  averages: CacheFirstAverageStrategy;
  clock: ClockPort;
}

export class StationService implements StationServicePort {
  constructor(private readonly deps: StationServiceDeps) {}

  /**
   * Storage first, cache second: the cache only ever holds readings whose
   * write was confirmed, so a failed insert leaves it untouched.
   */
  async ingest(input: ReadingInput): Promise<Reading> {
    const reading = toNewReading(input, this.deps.clock.now());
    const stored = await this.deps.pool.withConnection((conn) => conn.append(reading));
    this.deps.cache.record(stored);
    return stored;
  }

  queryAverage(query: AverageQuery = {}, options: QueryOptions = {}): Promise<AverageResult> {
    return this.deps.averages.average(query, options);
  }

  recent(limit: number): Reading[] {
    return this.deps.cache.mostRecent(checkRecentLimit(limit));
  }

  health(): StationHealth {
    return {
      cache: { size: this.deps.cache.size(), capacity: this.deps.cache.capacity() },
      pool: this.deps.pool.stats(),
    };
  }

  async status(): Promise<StationStatus> {
    const window = this.deps.averages.resolveWindow();
    const storage = await this.deps.pool.withConnection(async (conn) => {
      const totalReadings = await conn.countAll();
      const { count } = await conn.summarizeRange(window);
      return { totalReadings, readingsInDefaultWindow: count };
    });
    return { ...this.health(), storage, ts: this.deps.clock.now() };
  }
}
