import { FastifyReply, FastifyRequest } from 'fastify';
import { CampaignService } from '../services/campaign.service';
import { tenantOf } from '../middleware/tenant.middleware';
import { AudienceSpec } from '../types/audience.types';

type MembersBody = { audience: AudienceSpec; limit?: number; afterCustomerId?: string };

export class AudienceController {
  constructor(private campaignService: CampaignService) {}

  async preview(request: FastifyRequest<{ Body: { audience: AudienceSpec } }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    reply.send(await this.campaignService.previewAudience(restaurantId, request.body.audience));
  }

  async members(request: FastifyRequest<{ Body: MembersBody }>, reply: FastifyReply) {
    const { restaurantId } = tenantOf(request);
    const { audience, limit, afterCustomerId } = request.body;
    const members = await this.campaignService.previewAudienceMembers(restaurantId, audience, {
      limit,
      afterCustomerId,
    });

    // keyset cursor for the next page
    const last = members[members.length - 1];
    reply.send({
      data: members,
      nextCursor: last && limit !== undefined && members.length === limit ? last.customerId : null,
    });
  }
}
