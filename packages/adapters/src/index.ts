// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction } from './postgres/pool.js';
export type { PoolSettings, SqlClient, SqlPool } from './postgres/pool.js';
export { PgTrackSampleRepository } from './postgres/track-sample.repository.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryTrackSampleRepository } from './memory/track-sample.repository.js';
export type { NewSessionInput } from './memory/track-sample.repository.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/clock.js';
