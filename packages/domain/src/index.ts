// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-point.js';
export * from './entities/session.js';
export * from './entities/ingest-event.js';
export * from './entities/session-summary.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/session-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/session-store.port.js';
export * from './ports/outbound/stream-publisher.port.js';
export * from './ports/outbound/ingest-log.port.js';
export * from './ports/outbound/clock.port.js';
