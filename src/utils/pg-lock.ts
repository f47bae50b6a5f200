import { Pool, PoolClient } from 'pg';
import { logger } from './logger';

function hashPair(name: string): [number, number] {
  // two 32-bit rolling hashes give the two-int advisory lock key
  let a = 5381;
  let b = 52711;
  for (let i = 0; i < name.length; i++) {
    const c = name.charCodeAt(i);
    a = ((a << 5) + a + c) | 0;
    b = ((b << 5) + b + c) | 0;
  }
  return [a | 0, b | 0];
}

/**
 * Run fn while holding a session-level Postgres advisory lock.
 * Returns undefined without running fn when another session holds the lock.
 */
export async function withAdvisoryLock<T>(
  pool: Pool,
  name: string,
  fn: () => Promise<T>
): Promise<T | undefined> {
  const [k1, k2] = hashPair(name);
  const client: PoolClient = await pool.connect();

  try {
    const result = await client.query<{ ok: boolean }>(
      'SELECT pg_try_advisory_lock($1::int, $2::int) AS ok',
      [k1, k2]
    );

    if (!result.rows[0]?.ok) {
      logger.debug({ lock: name }, 'Advisory lock held elsewhere, skipping');
      return undefined;
    }

    try {
      return await fn();
    } finally {
      await client.query('SELECT pg_advisory_unlock($1::int, $2::int)', [k1, k2]);
    }
  } finally {
    client.release();
  }
}
