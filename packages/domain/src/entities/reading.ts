/** Accepted temperature range, in °C. */
export const TEMPERATURE_MIN_C = -50;
export const TEMPERATURE_MAX_C = 60;

export const SENSOR_ID_MAX_LENGTH = 64;

export interface Reading {
  readonly id: number;
  readonly ts: Date;
  readonly temperature: number;
  readonly sensorId: string;
}

/** A reading before storage has assigned its id. */
export type NewReading = Omit<Reading, 'id'>;

/** What a sensor (or the HTTP layer on its behalf) submits. */
export interface ReadingInput {
  temperature: number;
  sensorId: string;
  /** Defaults to the station clock's "now". */
  ts?: Date | string;
}
