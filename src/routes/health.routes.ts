import { FastifyInstance } from 'fastify';
import { Pool } from 'pg';
import { isRabbitMQConnected } from '../config/rabbitmq';
import { logger } from '../utils/logger';

export async function healthRoutes(fastify: FastifyInstance, opts: { pool: Pool }) {
  // Liveness: the process is up
  fastify.get('/health/live', async (_request, reply) => {
    reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Readiness: the database is required, the broker is reported
  fastify.get('/health/ready', async (_request, reply) => {
    const checks = {
      database: false,
      rabbitmq: isRabbitMQConnected(),
    };

    try {
      await opts.pool.query('SELECT 1');
      checks.database = true;
    } catch (error) {
      logger.error({ err: error }, 'Database health check failed');
    }

    reply.status(checks.database ? 200 : 503).send({
      status: checks.database ? 'ready' : 'not ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
