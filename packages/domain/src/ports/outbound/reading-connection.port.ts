import type { NewReading, Reading } from '../../entities/reading.js';
import type { TimeWindow } from '../../entities/aggregate.js';

export interface RangeSummary {
  count: number;
  average: number | null;
}

/**
 * One logical connection to the reading store: an append-only table of
 * (ts, temperature, sensor_id) rows, range-queryable on `ts`.
 * Implementations wrap every driver failure in a StorageError.
 */
export interface ReadingConnection {
  ensureSchema(): Promise<void>;
  append(reading: NewReading): Promise<Reading>;
  /** Inclusive on both bounds. */
  summarizeRange(window: TimeWindow): Promise<RangeSummary>;
  countAll(): Promise<number>;
  close(): Promise<void>;
}
