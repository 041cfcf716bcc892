// ─── Connection Pool ──────────────────────────────────────────────────────────
export { ConnectionPool } from './pool/connection-pool.js';
export type { ConnectionPoolOptions } from './pool/connection-pool.js';

// ─── Recency Cache ────────────────────────────────────────────────────────────
export { RecencyCache } from './cache/recency-cache.js';

// ─── PostgreSQL Adapters ──────────────────────────────────────────────────────
export {
  PgReadingConnection,
  PgReadingConnectionFactory,
  READINGS_SCHEMA_SQL,
  readingClientConfig,
} from './postgres/reading.connection.js';
export type { SqlClient } from './postgres/reading.connection.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, ManualClock } from './clock/clock.js';
