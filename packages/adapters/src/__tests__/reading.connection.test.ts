import { describe, it, expect, beforeEach } from '@jest/globals';
import { StorageError } from '@weather-station/domain';
import {
  PgReadingConnection,
  READINGS_SCHEMA_SQL,
  readingClientConfig,
} from '../postgres/reading.connection.js';
import type { SqlClient } from '../postgres/reading.connection.js';

interface Call {
  text: string;
  values?: unknown[];
}

/** Answers queries from a queue of canned row sets and records what it was sent. */
class ScriptedClient implements SqlClient {
  readonly calls: Call[] = [];
  readonly replies: Array<unknown[] | Error> = [];
  ended = false;

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push({ text, values });
    const reply = this.replies.shift() ?? [];
    if (reply instanceof Error) throw reply;
    return { rows: reply };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

const squash = (sql: string) => sql.replace(/\s+/g, ' ').trim();

describe('PgReadingConnection', () => {
  let client: ScriptedClient;
  let conn: PgReadingConnection;

  beforeEach(() => {
    client = new ScriptedClient();
    conn = new PgReadingConnection(client);
  });

  it('applies every schema statement in order', async () => {
    await conn.ensureSchema();

    expect(client.calls.map((c) => c.text)).toEqual(READINGS_SCHEMA_SQL);
  });

  it('appends a reading and maps the returned row', async () => {
    const ts = new Date('2026-03-01T12:00:00.000Z');
    client.replies.push([{ id: 7, ts, temperature: 21.5, sensor_id: 'greenhouse' }]);

    const stored = await conn.append({ ts, temperature: 21.5, sensorId: 'greenhouse' });

    expect(stored).toEqual({ id: 7, ts, temperature: 21.5, sensorId: 'greenhouse' });
    expect(squash(client.calls[0].text)).toBe(
      'INSERT INTO station.temperature_readings (ts, temperature, sensor_id) VALUES ($1, $2, $3) RETURNING id, ts, temperature, sensor_id',
    );
    expect(client.calls[0].values).toEqual([ts, 21.5, 'greenhouse']);
  });

  it('summarizes an inclusive range', async () => {
    const start = new Date('2026-03-01T11:00:00.000Z');
    const end = new Date('2026-03-01T12:00:00.000Z');
    client.replies.push([{ count: 3, average: 20.25 }]);

    const summary = await conn.summarizeRange({ start, end });

    expect(summary).toEqual({ count: 3, average: 20.25 });
    expect(squash(client.calls[0].text)).toBe(
      'SELECT COUNT(*)::int AS count, AVG(temperature) AS average FROM station.temperature_readings WHERE ts >= $1 AND ts <= $2',
    );
    expect(client.calls[0].values).toEqual([start, end]);
  });

  it('narrows the summary to one sensor', async () => {
    const start = new Date('2026-03-01T11:00:00.000Z');
    const end = new Date('2026-03-01T12:00:00.000Z');
    client.replies.push([{ count: 1, average: '19.5' }]);

    const summary = await conn.summarizeRange({ start, end, sensorId: 'indoor' });

    expect(summary).toEqual({ count: 1, average: 19.5 });
    expect(squash(client.calls[0].text)).toMatch(/AND ts <= \$2 AND sensor_id = \$3$/);
    expect(client.calls[0].values).toEqual([start, end, 'indoor']);
  });

  it('reports a null average for an empty range', async () => {
    client.replies.push([{ count: 0, average: null }]);

    const summary = await conn.summarizeRange({ start: new Date(0), end: new Date(1) });

    expect(summary).toEqual({ count: 0, average: null });
  });

  it('counts all rows', async () => {
    client.replies.push([{ count: 42 }]);

    await expect(conn.countAll()).resolves.toBe(42);
  });

  it('wraps driver failures in StorageError', async () => {
    client.replies.push(new Error('terminating connection due to administrator command'));

    const failure = conn.countAll();

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toThrow(
      'storage query failed: terminating connection due to administrator command',
    );
  });

  it('rejects rows of an unexpected shape', async () => {
    client.replies.push([{ id: 'seven', ts: 'not a date', temperature: 1, sensor_id: 'x' }]);

    await expect(
      conn.append({ ts: new Date(0), temperature: 1, sensorId: 'x' }),
    ).rejects.toThrow('unexpected row shape from storage');
  });

  it('ends the client on close', async () => {
    await conn.close();

    expect(client.ended).toBe(true);
  });
});

describe('readingClientConfig', () => {
  it('bounds how long opening a client may take', () => {
    expect(readingClientConfig()).toEqual({
      application_name: 'weather-station-api',
      connectionTimeoutMillis: 5_000,
    });
  });

  it('lets the caller override the connect timeout and add a connection string', () => {
    expect(
      readingClientConfig({ connectionTimeoutMillis: 250, connectionString: 'postgres://localhost/station' }),
    ).toEqual({
      application_name: 'weather-station-api',
      connectionTimeoutMillis: 250,
      connectionString: 'postgres://localhost/station',
    });
  });
});
