import 'dotenv/config';
import { createApp } from './app';
import { closeDatabase, initializeDatabase } from './config/database';
import { validateEnvironment } from './config/env.validator';
import { closeRabbitMQ, connectRabbitMQ } from './config/rabbitmq';
import { startJobs, stopJobs } from './jobs';
import { logger } from './utils/logger';

const SERVICE_NAME = process.env.SERVICE_NAME || 'campaign-engine';
const PORT = parseInt(process.env.PORT || '3020', 10);
const HOST = process.env.HOST || '0.0.0.0';

async function startService() {
  logger.info(`Starting ${SERVICE_NAME}...`);

  validateEnvironment();

  const pool = await initializeDatabase();
  logger.info('Database connection established');

  try {
    await connectRabbitMQ();
  } catch (error) {
    // Events are best-effort; the engine runs without the broker
    logger.error({ err: error }, 'Failed to connect to RabbitMQ, continuing without event publishing');
  }

  const app = await createApp({ pool });
  await app.listen({ port: PORT, host: HOST });
  logger.info({ host: HOST, port: PORT }, `${SERVICE_NAME} listening`);

  startJobs();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down ${SERVICE_NAME}...`);

    try {
      await stopJobs();
      await app.close();
      await closeRabbitMQ();
      await closeDatabase();
      logger.info(`${SERVICE_NAME} shut down successfully`);
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

startService().catch((error: unknown) => {
  logger.fatal({ err: error }, `Failed to start ${SERVICE_NAME}`);
  process.exit(1);
});
