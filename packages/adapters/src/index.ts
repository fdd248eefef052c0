// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withClient, withTransaction } from './postgres/pool.js';
export type { DbPool, DbClient } from './postgres/pool.js';
export { applySchema } from './postgres/schema.js';
export { PgSessionStore } from './postgres/session-store.js';

// ─── In-memory Adapter ────────────────────────────────────────────────────────
export { InMemorySessionStore } from './memory/session-store.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, ManualClock } from './clock/clock.js';
