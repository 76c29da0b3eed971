import pg from 'pg';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';

const { Pool, types } = pg;

const DATE_OID = 1082;
const TIMESTAMPTZ_OID = 1184;

// DATE stays a calendar string and TIMESTAMPTZ becomes ISO 8601, matching the wire types.
types.setTypeParser(DATE_OID, (value: string) => value);
types.setTypeParser(TIMESTAMPTZ_OID, (value: string) => new Date(value).toISOString());

export type Queryable = Pick<pg.PoolClient, 'query'>;

let pool: pg.Pool | null = null;

export function get_pool(): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.database_url,
    });

    pool.on('error', (err) => {
      logger.error('database pool error', { error: err.message });
    });
  }
  return pool;
}

export async function close_pool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  const result = await get_pool().query<T>(text, params);
  const duration_ms = Date.now() - start;

  logger.debug('query executed', {
    query: text.substring(0, 100),
    rows: result.rowCount,
    duration_ms,
  });

  return result;
}

export async function with_transaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await get_pool().connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
