import pino, { Logger } from 'pino';
import type { FastifyRequest } from 'fastify';

const SERVICE_NAME = process.env.SERVICE_NAME || 'campaign-engine';

const pinoLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true
    }
  } : undefined,
  base: {
    service: SERVICE_NAME,
    environment: process.env.NODE_ENV || 'development'
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

/**
 * Create a child logger with correlation context from request
 * Attaches requestId, restaurant and actor to all log entries
 */
export function createRequestLogger(request: FastifyRequest): Logger {
  const correlationContext: Record<string, unknown> = {
    requestId: request.id,
    method: request.method,
    url: request.url,
    ip: request.ip,
  };

  if (request.tenant) {
    correlationContext.restaurantId = request.tenant.restaurantId;
    correlationContext.actorId = request.tenant.actorId;
  }

  return pinoLogger.child(correlationContext);
}

/**
 * Create a child logger with custom correlation context
 * Useful for background jobs and event handlers
 */
export function createContextLogger(context: Record<string, unknown>): Logger {
  return pinoLogger.child(context);
}

export const logger: Logger = pinoLogger;
