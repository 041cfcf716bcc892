export type DataSource = 'cache' | 'storage';

/** Closed interval [start, end], optionally narrowed to one sensor. */
export interface TimeWindow {
  start: Date;
  end: Date;
  sensorId?: string;
}

export interface AverageQuery {
  start?: Date;
  /** Defaults to now. */
  end?: Date;
  /** Window length back from `end`, used when `start` is absent. */
  windowMs?: number;
  sensorId?: string;
}

export interface AverageResult {
  /** `null` when the window holds no readings. */
  average: number | null;
  count: number;
  windowStart: Date;
  windowEnd: Date;
  source: DataSource;
  sensorId?: string;
}
