import { FastifyInstance } from 'fastify';
import { AudienceController } from '../controllers/audience.controller';
import { tenantMiddleware } from '../middleware/tenant.middleware';
import { validate } from '../middleware/validation.middleware';
import { AppServices } from '../services';
import { AudienceSpec } from '../types/audience.types';
import { audienceMembersSchema, previewAudienceSchema } from '../validators/audience.schemas';

export async function audienceRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const controller = new AudienceController(opts.services.campaignService);

  fastify.post<{ Body: { audience: AudienceSpec } }>(
    '/audiences/preview',
    { preHandler: [tenantMiddleware, validate({ body: previewAudienceSchema })] },
    async (request, reply) => controller.preview(request, reply)
  );

  fastify.post<{ Body: { audience: AudienceSpec; limit?: number; afterCustomerId?: string } }>(
    '/audiences/members',
    { preHandler: [tenantMiddleware, validate({ body: audienceMembersSchema })] },
    async (request, reply) => controller.members(request, reply)
  );
}
