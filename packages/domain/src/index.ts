// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/reading.js';
export * from './entities/aggregate.js';
export * from './entities/station-health.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/station-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/station-service.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/reading-connection.port.js';
export * from './ports/outbound/connection-pool.port.js';
export * from './ports/outbound/clock.port.js';
