import { Pool, PoolClient } from 'pg';
import { campaignConfig } from '../config/campaign.config';
import {
  CampaignNotDispatchableError,
  CampaignNotEditableError,
  CampaignNotFoundError,
  InvalidScheduleError,
  InvalidStatusTransitionError,
} from '../errors/domain-errors';
import { EventPublisher } from '../events/event-publisher';
import { CampaignEvents } from '../events/event-types';
import { CampaignAuditLogModel } from '../models/campaign-audit-log.model';
import { CampaignModel, UpdateCampaignData } from '../models/campaign.model';
import { CampaignSendModel } from '../models/campaign-send.model';
import {
  AbVariant,
  AudienceMember,
  AudienceSpec,
  Campaign,
  CampaignAuditAction,
  CampaignAuditEntry,
  CampaignStatus,
  CampaignType,
  Channel,
  ChannelConsent,
  CreateCampaignRequest,
  DispatchSummary,
  ListCampaignsFilters,
  ResolveMembersOptions,
  SYSTEM_ACTOR,
  UpdateCampaignRequest,
} from '../types';
import { CampaignStateMachine } from '../utils/campaign-state-machine';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';
import { resolvePagination } from '../utils/pagination';
import { withTransaction } from '../utils/transaction';
import { AudienceResolverService } from './audience-resolver.service';
import { CampaignMetricsService } from './campaign-metrics.service';
import { CampaignSendService } from './campaign-send.service';
import { PromoCodeService } from './promo-code.service';

const DEFAULT_AB_SPLIT_PERCENT = 50;

export interface CampaignServiceDeps {
  audienceResolver?: AudienceResolverService;
  sendService?: CampaignSendService;
  metricsService?: CampaignMetricsService;
  promoCodeService?: PromoCodeService;
  eventPublisher?: EventPublisher;
  clock?: () => Date;
}

interface TransitionOptions {
  timestamps?: { scheduledAt?: Date; sentAt?: Date };
  changes?: Record<string, unknown>;
  /** Runs in the transition's transaction once the row is locked and the move is legal */
  beforeUpdate?: (campaigns: CampaignModel, campaign: Campaign, client: PoolClient) => Promise<void>;
}

interface FanOutResult {
  sendsCreated: number;
  skippedNoConsent: number;
  halted: boolean;
}

export interface DueDispatchResult {
  dispatched: number;
  failed: number;
}

export interface StalledDispatchResult {
  resumed: number;
  failed: number;
}

export interface ActiveRefreshResult {
  refreshed: number;
  completed: number;
  failed: number;
}

export function hasConsent(consent: ChannelConsent, channel: Channel): boolean {
  switch (channel) {
    case Channel.PUSH:
      return consent.push;
    case Channel.EMAIL:
      return consent.email;
    case Channel.SMS:
      return consent.sms;
    case Channel.WHATSAPP:
      return consent.whatsapp;
  }
}

/**
 * Primary channel when the customer accepts it, otherwise the fallback,
 * otherwise nothing.
 */
export function selectChannel(campaign: Campaign, member: AudienceMember): Channel | null {
  if (hasConsent(member.consent, campaign.primaryChannel)) {
    return campaign.primaryChannel;
  }
  if (campaign.fallbackChannel && hasConsent(member.consent, campaign.fallbackChannel)) {
    return campaign.fallbackChannel;
  }
  return null;
}

/**
 * The first splitPercent % of the expected recipients receive variant A.
 */
export function assignAbVariant(campaign: Campaign, recipientIndex: number, expectedRecipients: number): AbVariant | null {
  if (campaign.type !== CampaignType.AB_TEST) {
    return null;
  }
  const splitPercent = campaign.abTestConfig?.splitPercent ?? DEFAULT_AB_SPLIT_PERCENT;
  const variantACount = Math.round((expectedRecipients * splitPercent) / 100);
  return recipientIndex < variantACount ? 'A' : 'B';
}

/**
 * Owns the campaign lifecycle. Every status change locks the campaign row,
 * checks the state machine and writes its audit entry in one transaction;
 * events go out after commit.
 */
export class CampaignService {
  private campaignModel: CampaignModel;
  private auditLogModel: CampaignAuditLogModel;
  private audienceResolver: AudienceResolverService;
  private sendService: CampaignSendService;
  private metricsService: CampaignMetricsService;
  private promoCodeService: PromoCodeService;
  private eventPublisher: EventPublisher;
  private clock: () => Date;

  constructor(private pool: Pool, deps: CampaignServiceDeps = {}) {
    this.clock = deps.clock ?? (() => new Date());
    this.campaignModel = new CampaignModel(pool);
    this.auditLogModel = new CampaignAuditLogModel(pool);
    this.audienceResolver = deps.audienceResolver ?? new AudienceResolverService(pool, this.clock);
    this.sendService = deps.sendService ?? new CampaignSendService(pool);
    this.metricsService = deps.metricsService ?? new CampaignMetricsService(pool);
    this.promoCodeService = deps.promoCodeService ?? new PromoCodeService(pool, this.clock);
    this.eventPublisher = deps.eventPublisher ?? new EventPublisher();
  }

  async createCampaign(restaurantId: string, actor: string, request: CreateCampaignRequest): Promise<Campaign> {
    const estimatedAudienceSize = await this.audienceResolver.estimate(restaurantId, request.audience);
    const abTestConfig =
      request.type === CampaignType.AB_TEST
        ? request.abTestConfig ?? { splitPercent: DEFAULT_AB_SPLIT_PERCENT }
        : request.abTestConfig ?? null;

    const campaign = await withTransaction(this.pool, async (client) => {
      const created = await new CampaignModel(client).create({
        restaurantId,
        name: request.name,
        description: request.description ?? null,
        type: request.type,
        primaryChannel: request.primaryChannel,
        fallbackChannel: request.fallbackChannel ?? null,
        audience: request.audience,
        estimatedAudienceSize,
        messageSubject: request.messageSubject ?? null,
        messageTemplate: request.messageTemplate,
        recurringConfig: request.recurringConfig ?? null,
        abTestConfig,
        promoTemplate: request.promoTemplate ?? null,
        createdBy: actor,
      });

      await new CampaignAuditLogModel(client).create({
        campaignId: created.id,
        action: CampaignAuditAction.CREATED,
        performedBy: actor,
        changes: { name: created.name, type: created.type, audienceType: request.audience.type },
      });

      return created;
    });

    logger.info({ restaurantId, campaignId: campaign.id, estimatedAudienceSize }, 'Campaign created');
    return campaign;
  }

  /**
   * Drafts only. A new audience refreshes the cached audience size.
   */
  async updateCampaign(
    restaurantId: string,
    campaignId: string,
    actor: string,
    request: UpdateCampaignRequest
  ): Promise<Campaign> {
    const estimatedAudienceSize = request.audience
      ? await this.audienceResolver.estimate(restaurantId, request.audience)
      : undefined;

    const campaign = await withTransaction(this.pool, async (client) => {
      const campaigns = new CampaignModel(client);
      const existing = await campaigns.findByIdForUpdate(campaignId, restaurantId);
      if (!existing) {
        throw new CampaignNotFoundError(campaignId);
      }
      if (existing.status !== CampaignStatus.DRAFT) {
        throw new CampaignNotEditableError(campaignId, existing.status);
      }

      const data: UpdateCampaignData = { ...request, estimatedAudienceSize };
      const updated = await campaigns.update(campaignId, restaurantId, data);
      if (!updated) {
        throw new CampaignNotFoundError(campaignId);
      }

      await new CampaignAuditLogModel(client).create({
        campaignId,
        action: CampaignAuditAction.EDITED,
        performedBy: actor,
        changes: { fields: changedFields(request) },
      });

      return updated;
    });

    logger.info({ restaurantId, campaignId }, 'Campaign updated');
    return campaign;
  }

  /**
   * Drafts and cancelled campaigns only; their sends go with them. The audit
   * trail is kept.
   */
  async deleteCampaign(restaurantId: string, campaignId: string, actor: string): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      const campaigns = new CampaignModel(client);
      const existing = await campaigns.findByIdForUpdate(campaignId, restaurantId);
      if (!existing) {
        throw new CampaignNotFoundError(campaignId);
      }
      if (existing.status !== CampaignStatus.DRAFT && existing.status !== CampaignStatus.CANCELLED) {
        throw new CampaignNotEditableError(campaignId, existing.status);
      }

      await new CampaignAuditLogModel(client).create({
        campaignId,
        action: CampaignAuditAction.DELETED,
        performedBy: actor,
        changes: { name: existing.name, status: existing.status },
      });
      await campaigns.delete(campaignId, restaurantId);
    });

    logger.info({ restaurantId, campaignId }, 'Campaign deleted');
  }

  async getCampaign(restaurantId: string, campaignId: string): Promise<Campaign> {
    const campaign = await this.campaignModel.findById(campaignId, restaurantId);
    if (!campaign) {
      throw new CampaignNotFoundError(campaignId);
    }
    return campaign;
  }

  async listCampaigns(restaurantId: string, filters: ListCampaignsFilters): Promise<Campaign[]> {
    const { limit, offset } = resolvePagination(filters.limit, filters.offset);
    return this.campaignModel.list(restaurantId, { ...filters, limit, offset });
  }

  async getAuditLog(
    restaurantId: string,
    campaignId: string,
    limit?: number,
    offset?: number
  ): Promise<CampaignAuditEntry[]> {
    await this.getCampaign(restaurantId, campaignId);
    const page = resolvePagination(limit, offset);
    return this.auditLogModel.findByCampaignId(campaignId, page.limit, page.offset);
  }

  async previewAudience(restaurantId: string, spec: AudienceSpec): Promise<{ estimatedAudienceSize: number }> {
    const estimatedAudienceSize = await this.audienceResolver.resolveCount(restaurantId, spec);
    return { estimatedAudienceSize };
  }

  async previewAudienceMembers(
    restaurantId: string,
    spec: AudienceSpec,
    options: ResolveMembersOptions
  ): Promise<AudienceMember[]> {
    return this.audienceResolver.resolveMembers(restaurantId, spec, options);
  }

  async scheduleCampaign(
    restaurantId: string,
    campaignId: string,
    scheduledAt: Date,
    actor: string
  ): Promise<Campaign> {
    if (scheduledAt.getTime() <= this.clock().getTime()) {
      throw new InvalidScheduleError('Scheduled time must be in the future');
    }

    return this.transition(restaurantId, campaignId, CampaignStatus.SCHEDULED, actor, CampaignAuditAction.SCHEDULED, {
      timestamps: { scheduledAt },
      changes: { scheduledAt: scheduledAt.toISOString() },
    });
  }

  /**
   * Immediate dispatch of a draft, or of a campaign already scheduled.
   */
  async sendNow(restaurantId: string, campaignId: string, actor: string): Promise<DispatchSummary> {
    const campaign = await this.getCampaign(restaurantId, campaignId);
    if (campaign.status === CampaignStatus.DRAFT) {
      const now = this.clock();
      await this.transition(restaurantId, campaignId, CampaignStatus.SCHEDULED, actor, CampaignAuditAction.SCHEDULED, {
        timestamps: { scheduledAt: now },
        changes: { scheduledAt: now.toISOString(), immediate: true },
      });
    }
    return this.dispatchCampaign(restaurantId, campaignId, actor);
  }

  /**
   * scheduled → sending, then one send row per reachable audience member.
   * A campaign that reaches nobody completes straight away.
   */
  async dispatchCampaign(
    restaurantId: string,
    campaignId: string,
    actor: string = SYSTEM_ACTOR
  ): Promise<DispatchSummary> {
    const campaign = await this.getCampaign(restaurantId, campaignId);
    const estimatedAudienceSize = await this.audienceResolver.estimate(restaurantId, campaign.audience);

    const sending = await this.transition(
      restaurantId,
      campaignId,
      CampaignStatus.SENDING,
      actor,
      CampaignAuditAction.DISPATCHED,
      {
        changes: { estimatedAudienceSize },
        beforeUpdate: (campaigns) => campaigns.updateEstimatedAudienceSize(campaignId, restaurantId, estimatedAudienceSize),
      }
    );

    const fanOut = await this.fanOut(sending, estimatedAudienceSize);
    if (!fanOut.halted) {
      await this.campaignModel.markDispatchCompleted(campaignId, restaurantId, this.clock());
    }
    await this.metricsService.recompute(campaignId);

    await this.announce(CampaignEvents.CAMPAIGN_DISPATCHED, sending, actor, { sendsCreated: fanOut.sendsCreated });

    let finalStatus = fanOut.halted ? (await this.getCampaign(restaurantId, campaignId)).status : sending.status;
    if (!fanOut.halted && fanOut.sendsCreated === 0) {
      const completed = await this.completeIfFinished(restaurantId, campaignId);
      finalStatus = completed.status;
    }

    logger.info(
      { restaurantId, campaignId, estimatedAudienceSize, ...fanOut, status: finalStatus },
      'Campaign dispatched'
    );

    return {
      campaignId,
      estimatedAudienceSize,
      sendsCreated: fanOut.sendsCreated,
      skippedNoConsent: fanOut.skippedNoConsent,
      status: finalStatus,
    };
  }

  async pauseCampaign(restaurantId: string, campaignId: string, actor: string): Promise<Campaign> {
    const campaign = await this.transition(
      restaurantId,
      campaignId,
      CampaignStatus.PAUSED,
      actor,
      CampaignAuditAction.PAUSED
    );
    await this.announce(CampaignEvents.CAMPAIGN_PAUSED, campaign, actor);
    return campaign;
  }

  /**
   * paused → sending. Members the interrupted dispatch never reached get
   * their rows now; existing rows are left as they are.
   */
  async resumeCampaign(restaurantId: string, campaignId: string, actor: string): Promise<Campaign> {
    const campaign = await this.transition(
      restaurantId,
      campaignId,
      CampaignStatus.SENDING,
      actor,
      CampaignAuditAction.RESUMED
    );

    const fanOut = await this.fanOut(campaign, campaign.estimatedAudienceSize);
    if (!fanOut.halted) {
      await this.campaignModel.markDispatchCompleted(campaignId, restaurantId, this.clock());
    }
    await this.metricsService.recompute(campaignId);
    await this.announce(CampaignEvents.CAMPAIGN_RESUMED, campaign, actor, { sendsCreated: fanOut.sendsCreated });

    logger.info({ restaurantId, campaignId, ...fanOut }, 'Campaign resumed');
    return this.getCampaign(restaurantId, campaignId);
  }

  /**
   * Terminal. Redemptions already made stay valid.
   */
  async cancelCampaign(restaurantId: string, campaignId: string, actor: string, reason?: string): Promise<Campaign> {
    const campaign = await this.transition(
      restaurantId,
      campaignId,
      CampaignStatus.CANCELLED,
      actor,
      CampaignAuditAction.CANCELLED,
      { changes: reason ? { reason } : {} }
    );
    await this.announce(CampaignEvents.CAMPAIGN_CANCELLED, campaign, actor, reason ? { reason } : {});
    return campaign;
  }

  /**
   * sending → sent once the fan-out has finished and no send row is still
   * pending. Anything else is returned unchanged.
   */
  async completeIfFinished(restaurantId: string, campaignId: string, actor: string = SYSTEM_ACTOR): Promise<Campaign> {
    const now = this.clock();
    const result = await withTransaction(this.pool, async (client) => {
      const campaigns = new CampaignModel(client);
      const campaign = await campaigns.findByIdForUpdate(campaignId, restaurantId);
      if (!campaign) {
        throw new CampaignNotFoundError(campaignId);
      }
      if (campaign.status !== CampaignStatus.SENDING || campaign.dispatchCompletedAt === null) {
        return { campaign, completed: false };
      }

      const pending = await new CampaignSendModel(client).countNonTerminal(campaignId);
      if (pending > 0) {
        return { campaign, completed: false };
      }

      const updated = await campaigns.updateStatus(campaignId, restaurantId, CampaignStatus.SENT, { sentAt: now });
      await new CampaignAuditLogModel(client).create({
        campaignId,
        action: CampaignAuditAction.COMPLETED,
        performedBy: actor,
        changes: { from: campaign.status, to: CampaignStatus.SENT },
      });
      return { campaign: updated, completed: true };
    });

    if (!result.completed) {
      return result.campaign;
    }

    campaignMetrics.campaignTransitions.inc({ from_status: CampaignStatus.SENDING, to_status: CampaignStatus.SENT });
    await this.metricsService.recompute(campaignId);
    await this.announce(CampaignEvents.CAMPAIGN_COMPLETED, result.campaign, actor);
    logger.info({ restaurantId, campaignId }, 'Campaign completed');
    return result.campaign;
  }

  /**
   * Dispatch every scheduled campaign that is due. One failure does not stop
   * the rest.
   */
  async dispatchDueCampaigns(now: Date, limit = campaignConfig.jobs.dueCampaignBatchSize): Promise<DueDispatchResult> {
    const due = await this.campaignModel.findDueScheduled(now, limit);
    const result: DueDispatchResult = { dispatched: 0, failed: 0 };

    for (const ref of due) {
      try {
        await this.dispatchCampaign(ref.restaurantId, ref.id, SYSTEM_ACTOR);
        result.dispatched++;
      } catch (error) {
        if (error instanceof InvalidStatusTransitionError) {
          logger.debug({ campaignId: ref.id }, 'Due campaign already moved on, skipping');
          continue;
        }
        result.failed++;
        logger.error({ err: error, campaignId: ref.id, restaurantId: ref.restaurantId }, 'Failed to dispatch due campaign');
      }
    }

    return result;
  }

  /**
   * Re-run the fan-out of sending campaigns whose dispatch died part way.
   * Rows already written are kept; only missing recipients get one.
   */
  async resumeStalledDispatches(
    now: Date,
    limit = campaignConfig.jobs.stalledDispatchBatchSize
  ): Promise<StalledDispatchResult> {
    const olderThan = new Date(now.getTime() - campaignConfig.dispatch.stalledAfterSeconds * 1000);
    const stalled = await this.campaignModel.findStalledDispatches(olderThan, limit);
    const result: StalledDispatchResult = { resumed: 0, failed: 0 };

    for (const ref of stalled) {
      try {
        const campaign = await this.getCampaign(ref.restaurantId, ref.id);
        if (campaign.status !== CampaignStatus.SENDING || campaign.dispatchCompletedAt !== null) {
          continue;
        }

        const fanOut = await this.fanOut(campaign, campaign.estimatedAudienceSize);
        if (!fanOut.halted) {
          await this.campaignModel.markDispatchCompleted(ref.id, ref.restaurantId, this.clock());
        }
        await this.metricsService.recompute(ref.id);
        await this.completeIfFinished(ref.restaurantId, ref.id);

        result.resumed++;
        logger.warn({ restaurantId: ref.restaurantId, campaignId: ref.id, ...fanOut }, 'Stalled campaign dispatch resumed');
      } catch (error) {
        result.failed++;
        logger.error({ err: error, campaignId: ref.id, restaurantId: ref.restaurantId }, 'Failed to resume stalled dispatch');
      }
    }

    return result;
  }

  /**
   * Recompute metrics for campaigns still in flight and complete the ones
   * whose sends have all settled. One failure does not stop the rest.
   */
  async refreshActiveCampaigns(limit: number): Promise<ActiveRefreshResult> {
    const active = await this.campaignModel.findByStatuses([CampaignStatus.SENDING, CampaignStatus.PAUSED], limit);
    const result: ActiveRefreshResult = { refreshed: 0, completed: 0, failed: 0 };

    for (const ref of active) {
      try {
        await this.metricsService.recompute(ref.id);
        result.refreshed++;
        const campaign = await this.completeIfFinished(ref.restaurantId, ref.id);
        if (campaign.status === CampaignStatus.SENT) {
          result.completed++;
        }
      } catch (error) {
        result.failed++;
        logger.error({ err: error, campaignId: ref.id, restaurantId: ref.restaurantId }, 'Failed to refresh campaign');
      }
    }

    return result;
  }

  private async transition(
    restaurantId: string,
    campaignId: string,
    to: CampaignStatus,
    actor: string,
    action: CampaignAuditAction,
    options: TransitionOptions = {}
  ): Promise<Campaign> {
    const { from, campaign } = await withTransaction(this.pool, async (client) => {
      const campaigns = new CampaignModel(client);
      const existing = await campaigns.findByIdForUpdate(campaignId, restaurantId);
      if (!existing) {
        throw new CampaignNotFoundError(campaignId);
      }

      CampaignStateMachine.validateTransition(existing.status, to);

      if (options.beforeUpdate) {
        await options.beforeUpdate(campaigns, existing, client);
      }

      const updated = await campaigns.updateStatus(campaignId, restaurantId, to, options.timestamps);
      await new CampaignAuditLogModel(client).create({
        campaignId,
        action,
        performedBy: actor,
        changes: { from: existing.status, to, ...options.changes },
      });

      return { from: existing.status, campaign: updated };
    });

    campaignMetrics.campaignTransitions.inc({ from_status: from, to_status: to });
    logger.info({ restaurantId, campaignId, from, to, actor }, 'Campaign status changed');
    return campaign;
  }

  private async fanOut(campaign: Campaign, expectedRecipients: number): Promise<FanOutResult> {
    const result: FanOutResult = { sendsCreated: 0, skippedNoConsent: 0, halted: false };
    const batchSize = campaignConfig.dispatch.batchSize;
    const promoTemplate = campaign.promoTemplate;
    let afterCustomerId: string | undefined;
    let recipientIndex = 0;

    for (;;) {
      const members = await this.audienceResolver.resolveMembers(campaign.restaurantId, campaign.audience, {
        limit: batchSize,
        afterCustomerId,
      });

      for (const member of members) {
        const channel = selectChannel(campaign, member);
        if (!channel) {
          result.skippedNoConsent++;
          continue;
        }

        const abVariant = assignAbVariant(campaign, recipientIndex, expectedRecipients);
        recipientIndex++;

        try {
          const { created } = await this.sendService.createSendRow(
            campaign.restaurantId,
            { campaignId: campaign.id, customerId: member.customerId, channel, abVariant },
            {
              grantPromoCode: promoTemplate
                ? async (client) => {
                    const promoCode = await this.promoCodeService.grantFromTemplate(
                      client,
                      campaign.restaurantId,
                      campaign.id,
                      promoTemplate
                    );
                    return promoCode.code;
                  }
                : undefined,
            }
          );
          if (created) {
            result.sendsCreated++;
          }
        } catch (error) {
          if (error instanceof CampaignNotDispatchableError) {
            logger.info({ campaignId: campaign.id }, 'Campaign left sending state, dispatch halted');
            result.halted = true;
            return result;
          }
          throw error;
        }
      }

      if (members.length < batchSize) {
        return result;
      }
      afterCustomerId = members[members.length - 1].customerId;
      await this.campaignModel.touch(campaign.id, campaign.restaurantId);
    }
  }

  private async announce(
    type: CampaignEvents,
    campaign: Campaign,
    actor: string,
    extra: { sendsCreated?: number; reason?: string } = {}
  ): Promise<void> {
    try {
      await this.eventPublisher.publishCampaignEvent(type, {
        campaignId: campaign.id,
        restaurantId: campaign.restaurantId,
        status: campaign.status,
        performedBy: actor,
        ...extra,
      });
    } catch (error) {
      logger.error({ err: error, eventType: type, campaignId: campaign.id }, 'Campaign event not published, state change stands');
    }
  }
}

function changedFields(request: UpdateCampaignRequest): string[] {
  return Object.entries(request)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key);
}
