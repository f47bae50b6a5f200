import { FastifyReply, FastifyRequest } from 'fastify';
import { CampaignService } from '../services/campaign.service';
import { CampaignMetricsService } from '../services/campaign-metrics.service';
import { tenantOf } from '../middleware/tenant.middleware';
import {
  CreateCampaignRequest,
  ListCampaignsFilters,
  UpdateCampaignRequest,
} from '../types/campaign.types';

type CampaignParams = { Params: { id: string } };
type PageQuery = { limit?: number; offset?: number };

export class CampaignController {
  constructor(
    private campaignService: CampaignService,
    private metricsService: CampaignMetricsService
  ) {}

  async createCampaign(request: FastifyRequest<{ Body: CreateCampaignRequest }>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    const campaign = await this.campaignService.createCampaign(restaurantId, actorId, request.body);
    reply.status(201).send(campaign);
  }

  async listCampaigns(request: FastifyRequest<{ Querystring: ListCampaignsFilters }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const campaigns = await this.campaignService.listCampaigns(restaurantId, request.query);
    reply.send({ data: campaigns });
  }

  async getCampaign(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.campaignService.getCampaign(restaurantId, request.params.id));
  }

  async updateCampaign(
    request: FastifyRequest<CampaignParams & { Body: UpdateCampaignRequest }>,
    reply: FastifyReply
  ) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(await this.campaignService.updateCampaign(restaurantId, request.params.id, actorId, request.body));
  }

  async deleteCampaign(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    await this.campaignService.deleteCampaign(restaurantId, request.params.id, actorId);
    reply.status(204).send();
  }

  async scheduleCampaign(
    request: FastifyRequest<CampaignParams & { Body: { scheduledAt: Date } }>,
    reply: FastifyReply
  ) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(
      await this.campaignService.scheduleCampaign(restaurantId, request.params.id, request.body.scheduledAt, actorId)
    );
  }

  async sendNow(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(await this.campaignService.sendNow(restaurantId, request.params.id, actorId));
  }

  async dispatchCampaign(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(await this.campaignService.dispatchCampaign(restaurantId, request.params.id, actorId));
  }

  async pauseCampaign(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(await this.campaignService.pauseCampaign(restaurantId, request.params.id, actorId));
  }

  async resumeCampaign(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(await this.campaignService.resumeCampaign(restaurantId, request.params.id, actorId));
  }

  async cancelCampaign(
    request: FastifyRequest<CampaignParams & { Body: { reason?: string } }>,
    reply: FastifyReply
  ) {
    const { restaurantId, actorId } = tenantOf(request);
    reply.send(
      await this.campaignService.cancelCampaign(restaurantId, request.params.id, actorId, request.body.reason)
    );
  }

  async getAuditLog(request: FastifyRequest<CampaignParams & { Querystring: PageQuery }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const entries = await this.campaignService.getAuditLog(
      restaurantId,
      request.params.id,
      request.query.limit,
      request.query.offset
    );
    reply.send({ data: entries });
  }

  async getMetrics(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.metricsService.getMetrics(restaurantId, request.params.id));
  }

  async recomputeMetrics(request: FastifyRequest<CampaignParams>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.metricsService.recomputeForRestaurant(restaurantId, request.params.id));
  }
}
