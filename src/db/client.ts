import { Pool } from 'pg';
import { Config } from '../config';
import { Logger } from '../utils/logger';

/**
 * The slice of a pg client the repositories use
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PooledConnection extends Queryable {
  release(): void;
}

export interface ConnectionSource {
  connect(): Promise<PooledConnection>;
}

/**
 * Drops SSL query parameters so the explicit `ssl` option takes precedence.
 * Managed databases often ship `sslmode=require`, which conflicts with it.
 */
export function cleanConnectionString(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings are passed through untouched
    return databaseUrl;
  }
}

export function createPool(config: Config['database'], logger: Logger): Pool {
  const pool = new Pool({
    connectionString: cleanConnectionString(config.url),
    // rejectUnauthorized: false allows the self-signed certificates of managed DBs
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle database client', err);
  });

  return pool;
}

/**
 * Runs `callback` with one connection, released afterwards
 */
export async function withClient<T>(
  source: ConnectionSource,
  callback: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  try {
    return await callback(client);
  } finally {
    client.release();
  }
}
