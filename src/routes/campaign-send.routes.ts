import { FastifyInstance } from 'fastify';
import { CampaignSendController } from '../controllers/campaign-send.controller';
import { tenantMiddleware } from '../middleware/tenant.middleware';
import { validate } from '../middleware/validation.middleware';
import { AppServices } from '../services';
import { AbVariant, Channel } from '../types/campaign.types';
import { EngagementEvent, ListSendsFilters, UpdateSendStatusRequest } from '../types/campaign-send.types';
import { campaignIdParamSchema } from '../validators/campaign.schemas';
import {
  createSendSchema,
  listSendsQuerySchema,
  recordEngagementSchema,
  sendIdParamSchema,
  updateSendStatusSchema,
} from '../validators/campaign-send.schemas';

type CampaignParams = { Params: { id: string } };
type SendParams = { Params: { sendId: string } };

/**
 * Ledger endpoints called by the delivery collaborator.
 */
export async function campaignSendRoutes(fastify: FastifyInstance, opts: { services: AppServices }) {
  const controller = new CampaignSendController(opts.services.sendService);

  fastify.post<
    CampaignParams & {
      Body: { customerId: string; channel: Channel; promoCodeAssigned?: string | null; abVariant?: AbVariant | null };
    }
  >(
    '/campaigns/:id/sends',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, body: createSendSchema })] },
    async (request, reply) => controller.createSend(request, reply)
  );

  fastify.get<CampaignParams & { Querystring: ListSendsFilters }>(
    '/campaigns/:id/sends',
    { preHandler: [tenantMiddleware, validate({ params: campaignIdParamSchema, query: listSendsQuerySchema })] },
    async (request, reply) => controller.listSends(request, reply)
  );

  fastify.patch<SendParams & { Body: UpdateSendStatusRequest }>(
    '/sends/:sendId/status',
    { preHandler: [tenantMiddleware, validate({ params: sendIdParamSchema, body: updateSendStatusSchema })] },
    async (request, reply) => controller.updateStatus(request, reply)
  );

  fastify.post<SendParams & { Body: { event: EngagementEvent; occurredAt: Date } }>(
    '/sends/:sendId/engagement',
    { preHandler: [tenantMiddleware, validate({ params: sendIdParamSchema, body: recordEngagementSchema })] },
    async (request, reply) => controller.recordEngagement(request, reply)
  );
}
