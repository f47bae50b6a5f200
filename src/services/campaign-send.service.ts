import { Pool, PoolClient } from 'pg';
import {
  CampaignNotDispatchableError,
  CampaignNotFoundError,
  CampaignSendNotFoundError,
} from '../errors/domain-errors';
import { CampaignModel } from '../models/campaign.model';
import { CampaignSendModel, SendStatusUpdate } from '../models/campaign-send.model';
import {
  CampaignSend,
  CampaignStatus,
  CreateSendRequest,
  EngagementEvent,
  ListSendsFilters,
  SendStatus,
  UpdateSendStatusRequest,
} from '../types';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';
import { resolvePagination } from '../utils/pagination';
import { validateSendTransition } from '../utils/send-state-machine';
import { withTransaction } from '../utils/transaction';

export interface CreateSendResult {
  send: CampaignSend;
  created: boolean;
}

export interface CreateSendOptions {
  /**
   * Runs in the send row's transaction, only when a new row is about to be
   * written. Returns the promo code to attach.
   */
  grantPromoCode?: (client: PoolClient) => Promise<string>;
}

export function applySendStatus(send: CampaignSend, request: UpdateSendStatusRequest): SendStatusUpdate {
  const update: SendStatusUpdate = {
    status: request.status,
    sentAt: send.sentAt,
    deliveredAt: send.deliveredAt,
    errorMessage: send.errorMessage,
  };

  switch (request.status) {
    case SendStatus.SENT:
      update.sentAt = send.sentAt ?? request.occurredAt;
      break;
    case SendStatus.DELIVERED:
      update.sentAt = send.sentAt ?? request.occurredAt;
      update.deliveredAt = request.occurredAt;
      break;
    case SendStatus.FAILED:
    case SendStatus.BOUNCED:
      update.errorMessage = request.errorMessage ?? null;
      break;
    case SendStatus.PENDING:
      break;
  }

  return update;
}

/**
 * The per-recipient ledger. Rows are only written while their campaign is
 * sending; status and engagement updates come from the delivery collaborator.
 */
export class CampaignSendService {
  private campaignModel: CampaignModel;
  private sendModel: CampaignSendModel;

  constructor(private pool: Pool) {
    this.campaignModel = new CampaignModel(pool);
    this.sendModel = new CampaignSendModel(pool);
  }

  async createSendRow(
    restaurantId: string,
    request: CreateSendRequest,
    options: CreateSendOptions = {}
  ): Promise<CreateSendResult> {
    return withTransaction(this.pool, async (client) => {
      const campaigns = new CampaignModel(client);
      const sends = new CampaignSendModel(client);

      const status = await campaigns.findStatusForShare(request.campaignId, restaurantId);
      if (status === null) {
        throw new CampaignNotFoundError(request.campaignId);
      }
      if (status !== CampaignStatus.SENDING) {
        throw new CampaignNotDispatchableError(request.campaignId, status);
      }

      const existing = await sends.findByCampaignAndCustomer(request.campaignId, request.customerId);
      if (existing) {
        return { send: existing, created: false };
      }

      const promoCodeAssigned = options.grantPromoCode
        ? await options.grantPromoCode(client)
        : request.promoCodeAssigned ?? null;

      const inserted = await sends.insertIfAbsent({ ...request, promoCodeAssigned });
      if (!inserted) {
        // lost a race with another writer for the same recipient
        const winner = await sends.findByCampaignAndCustomer(request.campaignId, request.customerId);
        if (!winner) {
          throw new CampaignSendNotFoundError(`${request.campaignId}/${request.customerId}`);
        }
        return { send: winner, created: false };
      }

      campaignMetrics.sendRowsCreated.inc({ channel: inserted.channelUsed });
      return { send: inserted, created: true };
    });
  }

  async updateSendStatus(
    restaurantId: string,
    sendId: string,
    request: UpdateSendStatusRequest
  ): Promise<CampaignSend> {
    return withTransaction(this.pool, async (client) => {
      const sends = new CampaignSendModel(client);
      const send = await sends.findByIdForUpdate(sendId, restaurantId);
      if (!send) {
        throw new CampaignSendNotFoundError(sendId);
      }

      if (send.status === request.status) {
        return send;
      }

      validateSendTransition(send.status, request.status);
      const updated = await sends.updateStatus(sendId, applySendStatus(send, request));

      logger.info(
        { sendId, campaignId: send.campaignId, from: send.status, to: request.status },
        'Campaign send status updated'
      );
      return updated;
    });
  }

  async recordEngagement(
    restaurantId: string,
    sendId: string,
    event: EngagementEvent,
    occurredAt: Date
  ): Promise<CampaignSend> {
    return withTransaction(this.pool, async (client) => {
      const sends = new CampaignSendModel(client);
      const send = await sends.findByIdForUpdate(sendId, restaurantId);
      if (!send) {
        throw new CampaignSendNotFoundError(sendId);
      }

      return event === 'clicked'
        ? sends.recordClick(sendId, occurredAt)
        : sends.recordOpen(sendId, occurredAt);
    });
  }

  async listSends(restaurantId: string, campaignId: string, filters: ListSendsFilters): Promise<CampaignSend[]> {
    const campaign = await this.campaignModel.findById(campaignId, restaurantId);
    if (!campaign) {
      throw new CampaignNotFoundError(campaignId);
    }
    const { limit, offset } = resolvePagination(filters.limit, filters.offset);
    return this.sendModel.listByCampaign(campaignId, { ...filters, limit, offset });
  }

  async countNonTerminal(campaignId: string): Promise<number> {
    return this.sendModel.countNonTerminal(campaignId);
  }
}
