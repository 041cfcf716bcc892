/**
 * Domain Entity and Error Tests
 *
 * The domain package is mostly interfaces; what carries runtime behaviour is
 * the error hierarchy and the reading bounds the validators read.
 */

import { describe, it, expect } from '@jest/globals';

import {
  HandleMisuseError,
  PoolClosedError,
  PoolExhaustedError,
  SENSOR_ID_MAX_LENGTH,
  StationError,
  StorageError,
  TEMPERATURE_MAX_C,
  TEMPERATURE_MIN_C,
  ValidationError,
} from '../index.js';
import type { AverageResult, NewReading, Reading, StationStatus } from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function makeReading(overrides: Partial<Reading> = {}): Reading {
  return {
    id: 1,
    ts: new Date('2026-03-01T12:00:00.000Z'),
    temperature: 21.5,
    sensorId: 'outdoor-01',
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reading
// ═══════════════════════════════════════════════════════════════════════════════

describe('Reading', () => {
  it('accepts readings at both ends of the temperature range', () => {
    const cold = makeReading({ temperature: TEMPERATURE_MIN_C });
    const hot = makeReading({ temperature: TEMPERATURE_MAX_C });
    expect(cold.temperature).toBe(-50);
    expect(hot.temperature).toBe(60);
  });

  it('limits sensor ids to 64 characters', () => {
    expect(SENSOR_ID_MAX_LENGTH).toBe(64);
  });

  it('NewReading is a reading without its storage id', () => {
    const { id: _id, ...pending } = makeReading();
    const draft: NewReading = pending;
    expect(Object.keys(draft).sort()).toEqual(['sensorId', 'temperature', 'ts']);
  });
});

describe('AverageResult', () => {
  it('carries a null average for an empty window', () => {
    const result: AverageResult = {
      average: null,
      count: 0,
      windowStart: new Date('2026-03-01T11:00:00.000Z'),
      windowEnd: new Date('2026-03-01T12:00:00.000Z'),
      source: 'storage',
    };
    expect(result.average).toBeNull();
    expect(result.sensorId).toBeUndefined();
  });
});

describe('StationStatus', () => {
  it('extends health with storage counts', () => {
    const status: StationStatus = {
      cache: { size: 3, capacity: 100 },
      pool: { idle: 2, active: 0, total: 2, waiting: 0, min: 2, max: 5 },
      storage: { totalReadings: 40, readingsInDefaultWindow: 3 },
      ts: new Date('2026-03-01T12:00:00.000Z'),
    };
    expect(status.pool.idle + status.pool.active).toBe(status.pool.total);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

describe('station errors', () => {
  it('maps each error to its code and HTTP status', () => {
    const cases: Array<[StationError, string, number]> = [
      [new ValidationError('bad input'), 'validation_error', 400],
      [new PoolExhaustedError(5000, 5), 'pool_exhausted', 503],
      [new PoolClosedError(), 'pool_closed', 503],
      [new StorageError('query failed'), 'storage_error', 503],
      [new HandleMisuseError('double release'), 'handle_misuse', 500],
    ];
    for (const [err, code, status] of cases) {
      expect(err).toBeInstanceOf(StationError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.status).toBe(status);
    }
  });

  it('names each error after its class', () => {
    expect(new StorageError('x').name).toBe('StorageError');
    expect(new PoolClosedError().name).toBe('PoolClosedError');
  });

  it('keeps the cause and source of a storage failure', () => {
    const cause = new Error('connection reset');
    const err = new StorageError('storage query failed: connection reset', { cause, source: 'storage' });

    expect(err.cause).toBe(cause);
    expect(err.source).toBe('storage');
    expect(err.message).toBe('storage query failed: connection reset');
  });

  it('leaves source unset unless given', () => {
    expect(new StorageError('x').source).toBeUndefined();
  });

  it('describes how long an exhausted acquire waited', () => {
    const err = new PoolExhaustedError(250, 3);
    expect(err.message).toBe('no storage connection available after 250ms (max 3)');
    expect(err.waitedMs).toBe(250);
    expect(err.maxConnections).toBe(3);
  });

  it('carries validation issues', () => {
    const err = new ValidationError('invalid reading', [
      { field: 'temperature', message: 'temperature must be between -50°C and 60°C' },
    ]);
    expect(err.issues).toEqual([
      { field: 'temperature', message: 'temperature must be between -50°C and 60°C' },
    ]);
    expect(new ValidationError('empty').issues).toEqual([]);
  });
});
