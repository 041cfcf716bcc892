import type { RecencyCache } from '@weather-station/adapters';
import { StationError, StorageError, ValidationError } from '@weather-station/domain';
import type {
  AverageQuery,
  AverageResult,
  ClockPort,
  ConnectionPoolPort,
  DataSource,
  QueryOptions,
  Reading,
  ReadingConnection,
  TimeWindow,
} from '@weather-station/domain';

export interface AverageStrategyOptions {
  /** Minimum cached readings in the window before storage is skipped. */
  sufficiencyThreshold: number;
  /** Window length used when the query gives no start. */
  defaultWindowMs: number;
}

/**
 * Cache-first average over a time window.
 *
 * When the recency cache holds at least `sufficiencyThreshold` readings in
 * the window, the answer comes from memory. That answer is an approximation:
 * the cache keeps the most recently handled readings, so readings evicted
 * before the window closed are not counted. Otherwise the window is
 * summarized in storage through a pooled connection, and any failure on that
 * path reaches the caller and is never replaced by a partial cache answer.
 */
export class CacheFirstAverageStrategy {
  constructor(
    private readonly cache: RecencyCache,
    private readonly pool: ConnectionPoolPort<ReadingConnection>,
    private readonly clock: ClockPort,
    private readonly options: AverageStrategyOptions,
  ) {
    if (!Number.isInteger(options.sufficiencyThreshold) || options.sufficiencyThreshold < 1) {
      throw new RangeError(
        `cache sufficiency threshold must be a positive integer, got ${options.sufficiencyThreshold}`,
      );
    }
  }

  resolveWindow(query: AverageQuery = {}): TimeWindow {
    const end = query.end ?? this.clock.now();
    const windowMs = query.windowMs ?? this.options.defaultWindowMs;
    const start = query.start ?? new Date(end.getTime() - windowMs);
    if (start.getTime() > end.getTime()) {
      throw new ValidationError('window start must not be after its end', [
        { field: 'from', message: `${start.toISOString()} is after ${end.toISOString()}` },
      ]);
    }
    return query.sensorId === undefined ? { start, end } : { start, end, sensorId: query.sensorId };
  }

  async average(query: AverageQuery = {}, options: QueryOptions = {}): Promise<AverageResult> {
    const window = this.resolveWindow(query);

    const cached = this.cache.snapshotSince(window.start).filter((r) => inWindow(r, window));
    if (cached.length >= this.options.sufficiencyThreshold) {
      const sum = cached.reduce((acc, r) => acc + r.temperature, 0);
      return toResult(window, cached.length, sum / cached.length, 'cache');
    }

    try {
      const summary = await this.pool.withConnection(
        (conn) => conn.summarizeRange(window),
        { signal: options.signal },
      );
      return toResult(window, summary.count, summary.count > 0 ? summary.average : null, 'storage');
    } catch (err) {
      if (options.signal?.aborted) throw err;
      throw tagStorageFailure(err);
    }
  }
}

function inWindow(reading: Reading, window: TimeWindow): boolean {
  if (reading.ts.getTime() > window.end.getTime()) return false;
  return window.sensorId === undefined || reading.sensorId === window.sensorId;
}

function toResult(
  window: TimeWindow,
  count: number,
  average: number | null,
  source: DataSource,
): AverageResult {
  const result: AverageResult = {
    average: count > 0 ? average : null,
    count,
    windowStart: window.start,
    windowEnd: window.end,
    source,
  };
  if (window.sensorId !== undefined) result.sensorId = window.sensorId;
  return result;
}

/** Station errors keep their type; anything else becomes a StorageError. */
function tagStorageFailure(err: unknown): StationError {
  if (err instanceof StationError) {
    err.source = 'storage';
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(`storage aggregation failed: ${message}`, { cause: err, source: 'storage' });
}
