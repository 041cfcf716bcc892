import { Client } from 'pg';
import type { ClientConfig } from 'pg';
import { z } from 'zod';
import { StorageError } from '@weather-station/domain';
import type {
  ConnectionFactory,
  NewReading,
  RangeSummary,
  Reading,
  ReadingConnection,
  TimeWindow,
} from '@weather-station/domain';

/** The slice of a pg client this adapter talks to. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const TABLE = 'station.temperature_readings';

export const READINGS_SCHEMA_SQL = [
  `CREATE SCHEMA IF NOT EXISTS station`,
  `CREATE TABLE IF NOT EXISTS ${TABLE} (
     id          SERIAL PRIMARY KEY,
     ts          TIMESTAMPTZ NOT NULL,
     temperature DOUBLE PRECISION NOT NULL,
     sensor_id   TEXT NOT NULL,
     created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,
  `CREATE INDEX IF NOT EXISTS idx_temperature_readings_ts ON ${TABLE} (ts)`,
  `CREATE INDEX IF NOT EXISTS idx_temperature_readings_sensor_ts ON ${TABLE} (sensor_id, ts)`,
];

const readingRowSchema = z.object({
  id: z.number().int(),
  ts: z.coerce.date(),
  temperature: z.coerce.number(),
  sensor_id: z.string(),
});

const summaryRowSchema = z.object({
  count: z.coerce.number().int(),
  average: z.coerce.number().nullable(),
});

const countRowSchema = z.object({ count: z.coerce.number().int() });

export class PgReadingConnection implements ReadingConnection {
  constructor(private readonly client: SqlClient) {}

  async ensureSchema(): Promise<void> {
    for (const statement of READINGS_SCHEMA_SQL) {
      await this.run(statement);
    }
  }

  async append(reading: NewReading): Promise<Reading> {
    const rows = await this.run(
      `INSERT INTO ${TABLE} (ts, temperature, sensor_id)
       VALUES ($1, $2, $3)
       RETURNING id, ts, temperature, sensor_id`,
      [reading.ts, reading.temperature, reading.sensorId],
    );
    return mapReadingRow(firstRow(rows, 'INSERT'));
  }

  async summarizeRange(window: TimeWindow): Promise<RangeSummary> {
    const params: unknown[] = [window.start, window.end];
    let sql = `
      SELECT COUNT(*)::int AS count, AVG(temperature) AS average
      FROM ${TABLE}
      WHERE ts >= $1
        AND ts <= $2
    `;
    if (window.sensorId !== undefined) {
      params.push(window.sensorId);
      sql += ` AND sensor_id = $${params.length}`;
    }
    const rows = await this.run(sql, params);
    const summary = parseRow(summaryRowSchema, firstRow(rows, 'summary'));
    return { count: summary.count, average: summary.count > 0 ? summary.average : null };
  }

  async countAll(): Promise<number> {
    const rows = await this.run(`SELECT COUNT(*)::int AS count FROM ${TABLE}`);
    return parseRow(countRowSchema, firstRow(rows, 'count')).count;
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private async run(sql: string, params?: unknown[]): Promise<unknown[]> {
    try {
      const { rows } = await this.client.query(sql, params);
      return rows;
    } catch (err) {
      throw new StorageError(`storage query failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }
}

/** Client settings every pooled connection starts from; `overrides` win. */
export function readingClientConfig(overrides: ClientConfig = {}): ClientConfig {
  return {
    application_name: 'weather-station-api',
    connectionTimeoutMillis: 5_000,
    ...overrides,
  };
}

/** Opens one pg client per pooled connection. */
export class PgReadingConnectionFactory implements ConnectionFactory<ReadingConnection> {
  private readonly config: ClientConfig;

  constructor(config: ClientConfig = {}) {
    this.config = readingClientConfig(config);
  }

  async create(): Promise<ReadingConnection> {
    const client = new Client(this.config);
    client.on('error', (err) => {
      console.error('[pg] unexpected error on pooled client', err);
    });
    await client.connect();
    return new PgReadingConnection({
      query: (text, values) => client.query(text, values),
      end: () => client.end(),
    });
  }

  async destroy(conn: ReadingConnection): Promise<void> {
    await conn.close();
  }
}

function firstRow(rows: unknown[], what: string): unknown {
  if (rows.length === 0) {
    throw new StorageError(`${what} query returned no rows`);
  }
  return rows[0];
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError('unexpected row shape from storage', { cause: parsed.error });
  }
  return parsed.data;
}

function mapReadingRow(row: unknown): Reading {
  const r = parseRow(readingRowSchema, row);
  return { id: r.id, ts: r.ts, temperature: r.temperature, sensorId: r.sensor_id };
}
