import { Pool, PoolClient } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

function isProductionEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'production' ||
    process.env.VERCEL === '1' ||
    process.env.VERCEL_ENV === 'production' ||
    !!process.env.VERCEL_URL ||
    !!process.env.AWS_LAMBDA_FUNCTION_NAME
  );
}

/**
 * Drops SSL query parameters so the explicit ssl option below wins
 */
export function stripSslParams(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings are passed through; the ssl option still applies
    return databaseUrl;
  }
}

export function getPool(databaseUrl: string | undefined = process.env.DATABASE_URL): Pool {
  if (!pool) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    // Managed databases require SSL and often use self-signed certificates
    const sslDisabled = !isProductionEnvironment() && process.env.DATABASE_SSL === 'false';

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      ssl: sslDisabled ? false : { rejectUnauthorized: false },
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

/**
 * Runs callback inside BEGIN/COMMIT, rolling back when it throws
 */
export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  targetPool: Pool = getPool()
): Promise<T> {
  const client = await targetPool.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
