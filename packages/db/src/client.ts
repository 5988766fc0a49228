import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';
import { createLogger } from '@emerald/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

/** The slice of `pg`'s client API the repositories use. */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

function isSqlClient(value: unknown): value is SqlClient {
  return typeof value === 'object' && value !== null && 'query' in value && typeof value.query === 'function';
}

/** Narrows the domain's opaque transaction handle back to a database client. */
export function sqlClient(tx: unknown): SqlClient {
  if (!isSqlClient(tx)) {
    throw new Error('Repository called without a database transaction');
  }
  return tx;
}

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

export async function withTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Rollback failed',
      );
    });
    throw err;
  } finally {
    client.release();
  }
}
