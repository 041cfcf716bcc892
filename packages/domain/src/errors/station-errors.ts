import type { DataSource } from '../entities/aggregate.js';

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base class for every error the station surfaces to its callers.
 * `status` is the HTTP status the transport layer answers with.
 */
export abstract class StationError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;
  /** Which side of the cache-first decision the failure came from, when known. */
  source?: DataSource;

  constructor(message: string, options?: { cause?: unknown; source?: DataSource }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.source = options?.source;
  }
}

/** Malformed or out-of-range input, rejected before it reaches the cache or the pool. */
export class ValidationError extends StationError {
  readonly code = 'validation_error';
  readonly status = 400;

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
  }
}

/** No connection became available within the acquire timeout. */
export class PoolExhaustedError extends StationError {
  readonly code = 'pool_exhausted';
  readonly status = 503;

  constructor(
    readonly waitedMs: number,
    readonly maxConnections: number,
  ) {
    super(`no storage connection available after ${waitedMs}ms (max ${maxConnections})`);
  }
}

export class PoolClosedError extends StationError {
  readonly code = 'pool_closed';
  readonly status = 503;

  constructor() {
    super('connection pool is closed');
  }
}

/** Underlying read/write failure. The connection that raised it is discarded. */
export class StorageError extends StationError {
  readonly code = 'storage_error';
  readonly status = 503;
}

/** Double release, or release of a connection that was never acquired. */
export class HandleMisuseError extends StationError {
  readonly code = 'handle_misuse';
  readonly status = 500;
}
