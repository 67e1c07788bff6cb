import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { Pool, type PoolClient } from 'pg';
import pino, { type Logger } from 'pino';

let pool: Pool | undefined;

export function getPool(connectionString: string) {
  if (!pool) {
    pool = new Pool({ connectionString, max: 5, idleTimeoutMillis: 30_000 });
  }

  return pool;
}

export async function connectDatabase(connectionString: string, logger: Logger = pino({ name: 'database' })) {
  const client = getPool(connectionString);
  client.on('error', (error) => {
    logger.error({ err: error }, 'unexpected error on idle postgres client');
  });

  await client.query('SELECT 1');
  return client;
}

export async function closeDatabase(): Promise<void> {
  if (!pool) {
    return;
  }

  await pool.end();
  pool = undefined;
}

/**
 * Runs `callback` inside BEGIN/COMMIT on a dedicated client. Any throw rolls
 * the transaction back and is rethrown unchanged.
 */
export async function transaction<T>(target: Pool, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await target.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error: unknown) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

// Resolves from both src/data and dist/data.
const SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'schema.sql');

export async function migrate(target: Pool, schemaPath = SCHEMA_PATH): Promise<void> {
  const ddl = await readFile(schemaPath, 'utf8');
  await target.query(ddl);
}
