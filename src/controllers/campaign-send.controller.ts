import { FastifyReply, FastifyRequest } from 'fastify';
import { CampaignSendService } from '../services/campaign-send.service';
import { tenantOf } from '../middleware/tenant.middleware';
import { AbVariant, Channel } from '../types/campaign.types';
import {
  EngagementEvent,
  ListSendsFilters,
  UpdateSendStatusRequest,
} from '../types/campaign-send.types';

type CreateSendBody = {
  customerId: string;
  channel: Channel;
  promoCodeAssigned?: string | null;
  abVariant?: AbVariant | null;
};

type SendParams = { Params: { sendId: string } };

export class CampaignSendController {
  constructor(private sendService: CampaignSendService) {}

  async createSend(
    request: FastifyRequest<{ Params: { id: string }; Body: CreateSendBody }>,
    reply: FastifyReply
  ) {
    const { restaurantId } = tenantOf(request);
    const { send, created } = await this.sendService.createSendRow(restaurantId, {
      ...request.body,
      campaignId: request.params.id,
    });
    reply.status(created ? 201 : 200).send(send);
  }

  async listSends(
    request: FastifyRequest<{ Params: { id: string }; Querystring: ListSendsFilters }>,
    reply: FastifyReply
  ) {
    const { restaurantId } = tenantOf(request);
    const sends = await this.sendService.listSends(restaurantId, request.params.id, request.query);
    reply.send({ data: sends });
  }

  async updateStatus(
    request: FastifyRequest<SendParams & { Body: UpdateSendStatusRequest }>,
    reply: FastifyReply
  ) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.sendService.updateSendStatus(restaurantId, request.params.sendId, request.body));
  }

  async recordEngagement(
    request: FastifyRequest<SendParams & { Body: { event: EngagementEvent; occurredAt: Date } }>,
    reply: FastifyReply
  ) {
    const { restaurantId } = tenantOf(request);
    const { event, occurredAt } = request.body;
    reply.send(await this.sendService.recordEngagement(restaurantId, request.params.sendId, event, occurredAt));
  }
}
