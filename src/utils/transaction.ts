import { Pool, PoolClient } from 'pg';
import { logger } from './logger';

/**
 * Anything that can run a query: the pool itself or a client
 * checked out for a transaction.
 */
export type Queryable = Pool | PoolClient;

/**
 * Execute a function within a database transaction
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    logger.debug('Transaction started');

    const result = await fn(client);

    await client.query('COMMIT');
    logger.debug('Transaction committed');

    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error({ err: rollbackError }, 'Transaction rollback failed');
    }
    logger.debug({ err: error }, 'Transaction rolled back');
    throw error;
  } finally {
    client.release();
  }
}
