import { Pool, types } from 'pg';
import { logger } from '../utils/logger';

// NUMERIC/DECIMAL (type id 1700) as numbers; discount percentages are NUMERIC(5,2)
types.setTypeParser(1700, (val: string) => parseFloat(val));

let pool: Pool | null = null;

export async function initializeDatabase(): Promise<Pool> {
  if (pool) {
    return pool;
  }

  const MAX_RETRIES = 5;
  const RETRY_DELAY = 2000; // Base delay in milliseconds

  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    try {
      logger.info(`Database connection attempt ${attempt}/${MAX_RETRIES}...`);

      pool = new Pool({
        connectionString: process.env.DATABASE_URL,
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '5432', 10),
        database: process.env.DB_NAME || 'campaign_engine',
        user: process.env.DB_USER || 'postgres',
        password: process.env.DB_PASSWORD || 'postgres',
        max: parseInt(process.env.DB_POOL_MAX || '10', 10),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        statement_timeout: parseInt(process.env.DB_STATEMENT_TIMEOUT || '30000', 10),
        idle_in_transaction_session_timeout: parseInt(process.env.DB_IDLE_TRANSACTION_TIMEOUT || '60000', 10),
      });

      pool.on('error', (err) => {
        logger.error({ err }, 'Unexpected database error');
      });

      await pool.query('SELECT 1');

      logger.info('Database connection pool initialized successfully');
      return pool;
    } catch (error) {
      logger.error({ err: error, attempt }, 'Database connection attempt failed');

      if (pool) {
        const failedPool = pool;
        pool = null;
        await failedPool.end().catch((endError: unknown) => {
          logger.warn({ err: endError }, 'Failed to close pool after connection failure');
        });
      }

      if (attempt === MAX_RETRIES) {
        logger.error('Failed to connect to database after all retries');
        throw error;
      }

      const delayMs = RETRY_DELAY * attempt;
      logger.info(`Waiting ${delayMs}ms before retry...`);
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }

  throw new Error('Failed to initialize database');
}

export function getDatabase(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return pool;
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
