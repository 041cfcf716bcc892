import {
  HandleMisuseError,
  PoolClosedError,
  PoolExhaustedError,
  StorageError,
} from '@weather-station/domain';
import type {
  AcquireOptions,
  ConnectionFactory,
  ConnectionPoolPort,
  PoolStats,
} from '@weather-station/domain';

export interface ConnectionPoolOptions {
  /** Connections opened eagerly and kept as a floor. */
  min: number;
  max: number;
  acquireTimeoutMs: number;
  /** Used as the log tag. */
  name?: string;
}

interface Waiter<TConn> {
  resolve(conn: TConn): void;
  reject(err: unknown): void;
}

/**
 * Bounded pool of storage connections.
 *
 * Every connection is in exactly one of `idle` or `checkedOut`, so
 * `idle + active == total` holds after each synchronous step. Connections
 * still being opened are counted against `max` through `creating` but are
 * not part of `total` until they exist.
 *
 * `acquire` is the only call that waits, whether on a queued hand-off or on
 * a connection being opened for it, and both are bounded by the same timeout
 * and abort signal. Waiters are served FIFO and a released connection is
 * handed straight to the oldest one.
 */
export class ConnectionPool<TConn extends object> implements ConnectionPoolPort<TConn> {
  private readonly idle: TConn[] = [];
  private readonly checkedOut = new Set<TConn>();
  /** Checked-out connections that close() destroyed under their holder. */
  private readonly retired = new WeakSet<TConn>();
  private readonly waiters: Waiter<TConn>[] = [];
  /** Rejectors of acquires waiting on a connection being opened for them. */
  private readonly growing = new Set<(err: unknown) => void>();
  private creating = 0;
  private closed = false;
  private readonly tag: string;

  private constructor(
    private readonly factory: ConnectionFactory<TConn>,
    private readonly options: ConnectionPoolOptions,
  ) {
    this.tag = `[${options.name ?? 'connection-pool'}]`;
  }

  /** Validates the bounds and opens `min` connections before resolving. */
  static async open<TConn extends object>(
    factory: ConnectionFactory<TConn>,
    options: ConnectionPoolOptions,
  ): Promise<ConnectionPool<TConn>> {
    const { min, max, acquireTimeoutMs } = options;
    if (!Number.isInteger(min) || min < 1) {
      throw new RangeError(`pool min must be a positive integer, got ${min}`);
    }
    if (!Number.isInteger(max) || max < min) {
      throw new RangeError(`pool max must be an integer >= min (${min}), got ${max}`);
    }
    if (!Number.isFinite(acquireTimeoutMs) || acquireTimeoutMs < 0) {
      throw new RangeError(`acquire timeout must be a non-negative number, got ${acquireTimeoutMs}`);
    }

    const pool = new ConnectionPool(factory, options);
    try {
      for (let i = 0; i < min; i++) {
        pool.idle.push(await pool.createConnection());
      }
    } catch (err) {
      await pool.close();
      throw err;
    }
    console.log(`${pool.tag} opened with ${min} connection(s), max ${max}`);
    return pool;
  }

  async acquire(options: AcquireOptions = {}): Promise<TConn> {
    if (this.closed) throw new PoolClosedError();
    options.signal?.throwIfAborted();

    const conn = this.idle.pop();
    if (conn) {
      this.checkedOut.add(conn);
      this.maintain();
      return conn;
    }
    if (this.reserved() < this.options.max) {
      return this.grow(options);
    }
    return this.enqueue(options);
  }

  release(conn: TConn): void {
    if (this.retired.has(conn)) {
      this.retired.delete(conn);
      return;
    }
    if (!this.checkedOut.has(conn)) {
      throw new HandleMisuseError('release() called on a connection that is not checked out');
    }
    this.checkedOut.delete(conn);
    this.offer(conn);
  }

  async discard(conn: TConn): Promise<void> {
    if (this.retired.has(conn)) {
      this.retired.delete(conn);
      return;
    }
    if (!this.checkedOut.has(conn)) {
      throw new HandleMisuseError('discard() called on a connection that is not checked out');
    }
    this.checkedOut.delete(conn);
    this.maintain();
    await this.destroyQuietly(conn);
  }

  async withConnection<T>(fn: (conn: TConn) => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const conn = await this.acquire(options);
    let broken = false;
    try {
      return await fn(conn);
    } catch (err) {
      broken = err instanceof StorageError;
      throw err;
    } finally {
      if (broken) {
        await this.discard(conn);
      } else {
        this.release(conn);
      }
    }
  }

  activeCount(): number {
    return this.checkedOut.size;
  }

  idleCount(): number {
    return this.idle.length;
  }

  totalCount(): number {
    return this.idle.length + this.checkedOut.size;
  }

  stats(): PoolStats {
    return {
      idle: this.idleCount(),
      active: this.activeCount(),
      total: this.totalCount(),
      waiting: this.waiters.length,
      min: this.options.min,
      max: this.options.max,
    };
  }

  /** Destroys every connection, idle or checked out, and fails all waiters. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new PoolClosedError());
    }
    for (const rejectGrow of Array.from(this.growing)) {
      rejectGrow(new PoolClosedError());
    }
    const doomed = this.idle.splice(0);
    for (const conn of this.checkedOut) {
      this.retired.add(conn);
      doomed.push(conn);
    }
    this.checkedOut.clear();

    await Promise.all(doomed.map((conn) => this.destroyQuietly(conn)));
    console.log(`${this.tag} closed (${doomed.length} connection(s))`);
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  /** Existing connections plus those being opened. */
  private reserved(): number {
    return this.totalCount() + this.creating;
  }

  private async createConnection(): Promise<TConn> {
    try {
      return await this.factory.create();
    } catch (err) {
      throw new StorageError('failed to open storage connection', { cause: err });
    }
  }

  /**
   * Opens a connection for one caller. If the caller times out or aborts
   * first, the connection still counts against `max` until it arrives and is
   * then offered to the pool like any other free connection.
   */
  private grow(options: AcquireOptions): Promise<TConn> {
    this.creating++;
    return new Promise<TConn>((resolve, reject) => {
      let pending = true;
      const fail = (err: unknown): void => {
        if (!pending) return;
        pending = false;
        disarm();
        this.growing.delete(fail);
        reject(err);
      };
      const disarm = this.armDeadline(options, fail);
      this.growing.add(fail);

      const open = async (): Promise<void> => {
        let conn: TConn;
        try {
          conn = await this.createConnection();
        } catch (err) {
          if (!pending) console.error(`${this.tag} connection for an abandoned acquire failed to open`, err);
          fail(err);
          return;
        } finally {
          this.creating--;
        }
        if (this.closed) {
          fail(new PoolClosedError());
          await this.destroyQuietly(conn);
          return;
        }
        if (!pending) {
          this.offer(conn);
          return;
        }
        pending = false;
        disarm();
        this.growing.delete(fail);
        this.checkedOut.add(conn);
        resolve(conn);
      };
      open().catch(fail);
    });
  }

  private enqueue(options: AcquireOptions): Promise<TConn> {
    return new Promise<TConn>((resolve, reject) => {
      const settle = (): void => {
        disarm();
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
      };
      const waiter: Waiter<TConn> = {
        resolve: (conn) => {
          settle();
          resolve(conn);
        },
        reject: (err) => {
          settle();
          reject(err);
        },
      };
      const disarm = this.armDeadline(options, (err) => waiter.reject(err));
      this.waiters.push(waiter);
    });
  }

  /**
   * Starts the acquire timeout and listens for abort; `expire` receives
   * PoolExhaustedError or the abort reason. Returns the function that
   * stops both.
   */
  private armDeadline(options: AcquireOptions, expire: (err: unknown) => void): () => void {
    const timeoutMs = options.timeoutMs ?? this.options.acquireTimeoutMs;
    const { signal } = options;
    const startedAt = Date.now();

    const onAbort = (): void => {
      expire(signal?.reason);
    };
    const timer = setTimeout(() => {
      expire(new PoolExhaustedError(Date.now() - startedAt, this.options.max));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    return () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
  }

  /** Gives a free connection to the oldest waiter, or parks it as idle. */
  private offer(conn: TConn): void {
    const waiter = this.waiters[0];
    if (waiter) {
      this.checkedOut.add(conn);
      waiter.resolve(conn);
      return;
    }
    this.idle.push(conn);
  }

  /**
   * Opens connections in the background until the floor is met and every
   * waiter has a connection on its way, never exceeding `max`.
   */
  private maintain(): void {
    while (
      !this.closed &&
      this.reserved() < this.options.max &&
      (this.reserved() < this.options.min || this.waiters.length > this.creating)
    ) {
      // Only a creation opened on a waiter's behalf may fail that waiter;
      // one opened to restore the floor leaves queued callers to their timers.
      const forWaiter = this.waiters.length > this.creating;
      this.replenish().catch((err: unknown) => {
        console.error(`${this.tag} failed to replenish connection`, err);
        if (forWaiter) this.waiters[0]?.reject(err);
      });
    }
  }

  private async replenish(): Promise<void> {
    this.creating++;
    let conn: TConn;
    try {
      conn = await this.createConnection();
    } finally {
      this.creating--;
    }
    if (this.closed) {
      await this.destroyQuietly(conn);
      return;
    }
    this.offer(conn);
  }

  private async destroyQuietly(conn: TConn): Promise<void> {
    try {
      await this.factory.destroy(conn);
    } catch (err) {
      console.warn(`${this.tag} error while closing connection`, err);
    }
  }
}
