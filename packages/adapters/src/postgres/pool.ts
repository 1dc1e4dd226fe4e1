import pg from 'pg';

/** The slice of `pg` the repositories use; lets tests hand in a fake. */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export interface PoolSettings {
  /** Falls back to DATABASE_URL. */
  connectionString?: string;
  maxConnections?: number;
  /** Upper bound for one statement, including a chunked bulk INSERT. */
  statementTimeoutMs?: number;
}

let sharedPool: pg.Pool | null = null;

/** Process-wide pool. Settings take effect on the first call only. */
export function getPool(settings: PoolSettings = {}): pg.Pool {
  if (!sharedPool) sharedPool = createPool(settings);
  return sharedPool;
}

function createPool(settings: PoolSettings): pg.Pool {
  const pool = new pg.Pool({
    connectionString: settings.connectionString ?? process.env['DATABASE_URL'],
    max: settings.maxConnections ?? 10,
    statement_timeout: settings.statementTimeoutMs ?? 30_000,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'trackfold-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] idle client failed', err);
  });
  return pool;
}

export async function closePool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = null;
  if (pool) await pool.end();
}

/** Runs `fn` on one checked-out client between BEGIN and COMMIT; ROLLBACK on error. */
export async function withTransaction<T>(
  pool: SqlPool,
  fn: (client: SqlClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
