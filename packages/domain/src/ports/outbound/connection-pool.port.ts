import type { PoolHealth } from '../../entities/station-health.js';

export interface ConnectionFactory<TConn> {
  create(): Promise<TConn>;
  destroy(conn: TConn): Promise<void>;
}

export interface AcquireOptions {
  /** Overrides the pool's default acquire timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type PoolStats = PoolHealth;

export interface ConnectionPoolPort<TConn> {
  acquire(options?: AcquireOptions): Promise<TConn>;
  release(conn: TConn): void;
  discard(conn: TConn): Promise<void>;
  /** Scoped acquisition: the connection goes back to the pool on every exit path. */
  withConnection<T>(fn: (conn: TConn) => Promise<T>, options?: AcquireOptions): Promise<T>;
  activeCount(): number;
  idleCount(): number;
  totalCount(): number;
  stats(): PoolStats;
  close(): Promise<void>;
}
