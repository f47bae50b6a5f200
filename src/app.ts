import fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import cors from '@fastify/cors';
import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { getDatabase } from './config/database';
import { errorHandler } from './middleware/error-handler.middleware';
import {
  audienceRoutes,
  campaignRoutes,
  campaignSendRoutes,
  healthRoutes,
  metricsRoutes,
  promoCodeRoutes,
} from './routes';
import { AppServices, createServices } from './services';
import { createRequestLogger } from './utils/logger';

const API_PREFIX = '/api/v1';

export interface CreateAppOptions {
  pool?: Pool;
  services?: AppServices;
}

function requestIdFrom(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.length <= 128 ? value : uuidv4();
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const pool = options.pool ?? getDatabase();
  const services = options.services ?? createServices(pool);

  const app = fastify({
    logger: false,
    trustProxy: true,
    genReqId: (req) => requestIdFrom(req.headers['x-request-id']),
    bodyLimit: 1048576, // 1MB limit
  });

  // Register security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  await app.register(cors, {
    origin: (origin, callback) => {
      const allowedOrigins = process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000'];
      // Allow requests with no origin (server-to-server, curl)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowedOrigins.includes(origin) || process.env.NODE_ENV === 'development') {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'), false);
      }
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Restaurant-ID', 'X-Actor-ID'],
    exposedHeaders: ['X-Request-ID', 'Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
    maxAge: 86400, // 24 hours
  });

  // Register rate limiting (in-memory)
  await app.register(rateLimit, {
    max: parseInt(process.env.RATE_LIMIT_MAX || '300', 10),
    timeWindow: '1 minute',
  });

  app.decorateRequest('tenant', null);

  app.addHook('onSend', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.addHook('onResponse', async (request, reply) => {
    createRequestLogger(request).info({ statusCode: reply.statusCode }, 'Request completed');
  });

  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes, { pool });
  await app.register(metricsRoutes);
  await app.register(campaignRoutes, { prefix: API_PREFIX, services });
  await app.register(audienceRoutes, { prefix: API_PREFIX, services });
  await app.register(promoCodeRoutes, { prefix: API_PREFIX, services });
  await app.register(campaignSendRoutes, { prefix: API_PREFIX, services });

  return app;
}
