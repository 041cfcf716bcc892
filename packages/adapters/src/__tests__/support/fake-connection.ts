import type { ConnectionFactory } from '@weather-station/domain';

export interface FakeConnection {
  readonly id: number;
  closed: boolean;
}

/** Hands out numbered in-memory connections and records their lifecycle. */
export class FakeConnectionFactory implements ConnectionFactory<FakeConnection> {
  readonly created: FakeConnection[] = [];
  readonly destroyed: FakeConnection[] = [];
  /** Creations beyond this count fail. */
  maxCreates = Number.POSITIVE_INFINITY;
  private stalled: Array<() => void> | null = null;

  /** Holds every later creation until `resume()`. */
  stall(): void {
    this.stalled = [];
  }

  resume(): void {
    const held = this.stalled ?? [];
    this.stalled = null;
    held.forEach((proceed) => proceed());
  }

  async create(): Promise<FakeConnection> {
    const queue = this.stalled;
    if (queue) {
      await new Promise<void>((resolve) => queue.push(resolve));
    }
    if (this.created.length >= this.maxCreates) {
      throw new Error('connection refused');
    }
    const conn: FakeConnection = { id: this.created.length + 1, closed: false };
    this.created.push(conn);
    return conn;
  }

  async destroy(conn: FakeConnection): Promise<void> {
    conn.closed = true;
    this.destroyed.push(conn);
  }
}

/** Lets background promise chains settle. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
