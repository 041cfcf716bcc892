export interface CacheHealth {
  size: number;
  capacity: number;
}

export interface PoolHealth {
  idle: number;
  active: number;
  total: number;
  waiting: number;
  min: number;
  max: number;
}

export interface StationHealth {
  cache: CacheHealth;
  pool: PoolHealth;
}

export interface StationStatus extends StationHealth {
  storage: {
    totalReadings: number;
    readingsInDefaultWindow: number;
  };
  ts: Date;
}
