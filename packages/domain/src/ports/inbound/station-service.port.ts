import type { Reading, ReadingInput } from '../../entities/reading.js';
import type { AverageQuery, AverageResult } from '../../entities/aggregate.js';
import type { StationHealth, StationStatus } from '../../entities/station-health.js';

export interface QueryOptions {
  signal?: AbortSignal;
}

export interface StationServicePort {
  /** Persists the reading, then records it in the recency cache. */
  ingest(input: ReadingInput): Promise<Reading>;
  queryAverage(query?: AverageQuery, options?: QueryOptions): Promise<AverageResult>;
  /**
   * Most recent first, served from the recency cache: only readings this
   * process has ingested, and none after a restart even while storage holds
   * older rows.
   */
  recent(limit: number): Reading[];
  health(): StationHealth;
  status(): Promise<StationStatus>;
}
