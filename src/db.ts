import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { loadConfig, type DatabaseConfig } from './config.js';

export function createPool(config: DatabaseConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionTimeoutMillis: config.connectTimeoutMs,
  });
}

let sharedPool: Pool | null = null;

export function getPool(): Pool {
  if (!sharedPool) {
    sharedPool = createPool(loadConfig().database);
  }
  return sharedPool;
}

export async function closePool(): Promise<void> {
  if (!sharedPool) return;
  const pool = sharedPool;
  sharedPool = null;
  await pool.end();
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return getPool().query<T>(text, params);
}

/**
 * Runs `fn` inside begin/commit. With a `client` the caller keeps ownership of
 * the connection; otherwise one is checked out of the shared pool and released.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>, client?: PoolClient): Promise<T> {
  const conn = client ?? (await getPool().connect());
  try {
    await conn.query('begin');
    const result = await fn(conn);
    await conn.query('commit');
    return result;
  } catch (error) {
    await conn.query('rollback');
    throw error;
  } finally {
    if (!client) {
      conn.release();
    }
  }
}
