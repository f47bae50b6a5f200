import { FastifyInstance } from 'fastify';
import { CampaignController } from '../controllers/campaign.controller';
import { tenantMiddleware } from '../middleware/tenant.middleware';
import { validate } from '../middleware/validation.middleware';
import { AppServices } from '../services';
import {
  CreateCampaignRequest,
  ListCampaignsFilters,
  UpdateCampaignRequest,
} from '../types/campaign.types';
import {
  campaignIdParamSchema,
  cancelCampaignSchema,
  createCampaignSchema,
  listCampaignsQuerySchema,
  paginationQuerySchema,
  scheduleCampaignSchema,
  updateCampaignSchema,
} from '../validators/campaign.schemas';

type IdParams = { Params: { id: string } };

export async function campaignRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const controller = new CampaignController(opts.services.campaignService, opts.services.metricsService);
  const withId = validate({ params: campaignIdParamSchema });

  fastify.post<{ Body: CreateCampaignRequest }>(
    '/campaigns',
    { preHandler: [tenantMiddleware, validate({ body: createCampaignSchema })] },
    async (request, reply) => controller.createCampaign(request, reply)
  );

  fastify.get<{ Querystring: ListCampaignsFilters }>(
    '/campaigns',
    { preHandler: [tenantMiddleware, validate({ query: listCampaignsQuerySchema })] },
    async (request, reply) => controller.listCampaigns(request, reply)
  );

  fastify.get<IdParams>(
    '/campaigns/:id',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.getCampaign(request, reply)
  );

  fastify.patch<IdParams & { Body: UpdateCampaignRequest }>(
    '/campaigns/:id',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, body: updateCampaignSchema })] },
    async (request, reply) => controller.updateCampaign(request, reply)
  );

  fastify.delete<IdParams>(
    '/campaigns/:id',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.deleteCampaign(request, reply)
  );

  // Lifecycle
  fastify.post<IdParams & { Body: { scheduledAt: Date } }>(
    '/campaigns/:id/schedule',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, body: scheduleCampaignSchema })] },
    async (request, reply) => controller.scheduleCampaign(request, reply)
  );

  fastify.post<IdParams>(
    '/campaigns/:id/send-now',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.sendNow(request, reply)
  );

  fastify.post<IdParams>(
    '/campaigns/:id/dispatch',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.dispatchCampaign(request, reply)
  );

  fastify.post<IdParams>(
    '/campaigns/:id/pause',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.pauseCampaign(request, reply)
  );

  fastify.post<IdParams>(
    '/campaigns/:id/resume',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.resumeCampaign(request, reply)
  );

  fastify.post<IdParams & { Body: { reason?: string } }>(
    '/campaigns/:id/cancel',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, body: cancelCampaignSchema })] },
    async (request, reply) => controller.cancelCampaign(request, reply)
  );

  fastify.get<IdParams & { Querystring: { limit?: number; offset?: number } }>(
    '/campaigns/:id/audit-log',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, query: paginationQuerySchema })] },
    async (request, reply) => controller.getAuditLog(request, reply)
  );

  // Metrics
  fastify.get<IdParams>(
    '/campaigns/:id/metrics',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.getMetrics(request, reply)
  );

  fastify.post<IdParams>(
    '/campaigns/:id/metrics/recompute',
    { preHandler: [tenantMiddleware, withId] },
    async (request, reply) => controller.recomputeMetrics(request, reply)
  );
}
