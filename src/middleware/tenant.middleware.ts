import { FastifyRequest, FastifyReply } from 'fastify';
import Joi from 'joi';
import { MissingTenantContextError } from '../errors/domain-errors';
import type { TenantContext } from '../types/tenant.types';
import { logger } from '../utils/logger';

export const ANONYMOUS_ACTOR = 'anonymous';

const tenantHeadersSchema = Joi.object({
  'x-restaurant-id': Joi.string().uuid().required(),
  'x-actor-id': Joi.string().trim().min(1).max(100),
}).unknown(true);

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve the restaurant a request acts for, and who is acting.
 * Authentication happens upstream; these headers are trusted.
 */
export async function tenantMiddleware(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  const headers = {
    'x-restaurant-id': headerValue(request.headers['x-restaurant-id']),
    'x-actor-id': headerValue(request.headers['x-actor-id']),
  };

  const { error } = tenantHeadersSchema.validate(headers);
  const restaurantId = headers['x-restaurant-id'];
  if (error || !restaurantId) {
    logger.warn({ path: request.url, requestId: request.id }, 'Missing or invalid restaurant context');
    reply.status(400).send({
      error: 'Bad Request',
      message: 'x-restaurant-id header must be a valid UUID',
      requestId: request.id,
    });
    return;
  }

  request.tenant = {
    restaurantId,
    actorId: headers['x-actor-id']?.trim() || ANONYMOUS_ACTOR,
  };
}

export function tenantOf(request: FastifyRequest): TenantContext {
  if (!request.tenant) {
    throw new MissingTenantContextError();
  }
  return request.tenant;
}
