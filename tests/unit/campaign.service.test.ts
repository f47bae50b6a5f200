import { Pool } from 'pg';
import {
  CampaignNotDispatchableError,
  InvalidScheduleError,
  InvalidStatusTransitionError,
} from '../../src/errors/domain-errors';
import { EventPublisher } from '../../src/events/event-publisher';
import { CampaignEvents } from '../../src/events/event-types';
import { CampaignAuditLogModel } from '../../src/models/campaign-audit-log.model';
import { CampaignModel } from '../../src/models/campaign.model';
import { CampaignSendModel } from '../../src/models/campaign-send.model';
import { AudienceResolverService } from '../../src/services/audience-resolver.service';
import { CampaignMetricsService } from '../../src/services/campaign-metrics.service';
import { CampaignSendService } from '../../src/services/campaign-send.service';
import {
  assignAbVariant,
  CampaignService,
  hasConsent,
  selectChannel,
} from '../../src/services/campaign.service';
import { PromoCodeService } from '../../src/services/promo-code.service';
import { AudienceMember, ChannelConsent } from '../../src/types/audience.types';
import { CampaignAuditAction } from '../../src/types/audit.types';
import { CampaignStatus, CampaignType, Channel } from '../../src/types/campaign.types';
import { createMockPool, statementsOf } from '../fixtures/mock-pg';
import {
  buildCampaign,
  buildSend,
  CAMPAIGN_ID,
  CUSTOMER_ID,
  NOW,
  OTHER_CUSTOMER_ID,
  RESTAURANT_ID,
} from '../fixtures/test-data';

jest.mock('../../src/models/campaign.model');
jest.mock('../../src/models/campaign-audit-log.model');
jest.mock('../../src/models/campaign-send.model');

const campaignModel = jest.mocked(CampaignModel.prototype);
const auditLogModel = jest.mocked(CampaignAuditLogModel.prototype);
const sendModel = jest.mocked(CampaignSendModel.prototype);

const NO_CONSENT: ChannelConsent = { push: false, email: false, sms: false, whatsapp: false };

function member(customerId: string, consent: Partial<ChannelConsent>): AudienceMember {
  return { customerId, name: null, email: null, phone: null, consent: { ...NO_CONSENT, ...consent } };
}

describe('channel selection', () => {
  const campaign = buildCampaign({ primaryChannel: Channel.EMAIL, fallbackChannel: Channel.SMS });

  it('checks the consent flag of the given channel', () => {
    expect(hasConsent({ ...NO_CONSENT, whatsapp: true }, Channel.WHATSAPP)).toBe(true);
    expect(hasConsent({ ...NO_CONSENT, whatsapp: true }, Channel.PUSH)).toBe(false);
  });

  it('prefers the primary channel, then the fallback', () => {
    expect(selectChannel(campaign, member(CUSTOMER_ID, { email: true, sms: true }))).toBe(Channel.EMAIL);
    expect(selectChannel(campaign, member(CUSTOMER_ID, { sms: true }))).toBe(Channel.SMS);
  });

  it('gives up when neither channel is consented', () => {
    expect(selectChannel(campaign, member(CUSTOMER_ID, { push: true }))).toBeNull();
    expect(selectChannel(buildCampaign({ fallbackChannel: null }), member(CUSTOMER_ID, { sms: true }))).toBeNull();
  });
});

describe('assignAbVariant', () => {
  it('leaves non-test campaigns without a variant', () => {
    expect(assignAbVariant(buildCampaign(), 0, 10)).toBeNull();
  });

  it('puts the first split percent of recipients in A', () => {
    const campaign = buildCampaign({ type: CampaignType.AB_TEST, abTestConfig: { splitPercent: 30 } });
    expect([0, 1, 2, 3, 9].map(index => assignAbVariant(campaign, index, 10))).toEqual(['A', 'A', 'A', 'B', 'B']);
  });

  it('splits evenly by default, rounding half up', () => {
    const campaign = buildCampaign({ type: CampaignType.AB_TEST, abTestConfig: null });
    expect([0, 1, 2, 3, 4].map(index => assignAbVariant(campaign, index, 5))).toEqual(['A', 'A', 'A', 'B', 'B']);
  });
});

describe('CampaignService', () => {
  let pool: ReturnType<typeof createMockPool>;
  let audienceResolver: { estimate: jest.Mock; resolveCount: jest.Mock; resolveMembers: jest.Mock };
  let sendService: { createSendRow: jest.Mock };
  let metricsService: { recompute: jest.Mock };
  let promoCodeService: { grantFromTemplate: jest.Mock };
  let eventPublisher: { publishCampaignEvent: jest.Mock };
  let service: CampaignService;

  beforeEach(() => {
    jest.resetAllMocks();
    pool = createMockPool();
    audienceResolver = { estimate: jest.fn(), resolveCount: jest.fn(), resolveMembers: jest.fn() };
    sendService = { createSendRow: jest.fn() };
    metricsService = { recompute: jest.fn().mockResolvedValue(undefined) };
    promoCodeService = { grantFromTemplate: jest.fn() };
    eventPublisher = { publishCampaignEvent: jest.fn().mockResolvedValue(undefined) };

    service = new CampaignService(pool as unknown as Pool, {
      audienceResolver: audienceResolver as unknown as AudienceResolverService,
      sendService: sendService as unknown as CampaignSendService,
      metricsService: metricsService as unknown as CampaignMetricsService,
      promoCodeService: promoCodeService as unknown as PromoCodeService,
      eventPublisher: eventPublisher as unknown as EventPublisher,
      clock: () => NOW,
    });
  });

  describe('scheduleCampaign', () => {
    const scheduledAt = new Date('2025-06-20T09:00:00.000Z');

    it('refuses a time that is not in the future', async () => {
      await expect(service.scheduleCampaign(RESTAURANT_ID, CAMPAIGN_ID, NOW, 'manager-1')).rejects.toThrow(
        InvalidScheduleError
      );
      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('moves a draft to scheduled and audits the move', async () => {
      const scheduled = buildCampaign({ status: CampaignStatus.SCHEDULED, scheduledAt });
      campaignModel.findByIdForUpdate.mockResolvedValue(buildCampaign());
      campaignModel.updateStatus.mockResolvedValue(scheduled);

      const result = await service.scheduleCampaign(RESTAURANT_ID, CAMPAIGN_ID, scheduledAt, 'manager-1');

      expect(result).toBe(scheduled);
      expect(campaignModel.updateStatus).toHaveBeenCalledWith(CAMPAIGN_ID, RESTAURANT_ID, CampaignStatus.SCHEDULED, {
        scheduledAt,
      });
      expect(auditLogModel.create).toHaveBeenCalledWith({
        campaignId: CAMPAIGN_ID,
        action: CampaignAuditAction.SCHEDULED,
        performedBy: 'manager-1',
        changes: { from: CampaignStatus.DRAFT, to: CampaignStatus.SCHEDULED, scheduledAt: '2025-06-20T09:00:00.000Z' },
      });
      expect(statementsOf(pool.client)).toEqual(['BEGIN', 'COMMIT']);
    });

    it('leaves a sent campaign alone', async () => {
      campaignModel.findByIdForUpdate.mockResolvedValue(buildCampaign({ status: CampaignStatus.SENT }));

      await expect(service.scheduleCampaign(RESTAURANT_ID, CAMPAIGN_ID, scheduledAt, 'manager-1')).rejects.toThrow(
        InvalidStatusTransitionError
      );
      expect(campaignModel.updateStatus).not.toHaveBeenCalled();
      expect(auditLogModel.create).not.toHaveBeenCalled();
      expect(statementsOf(pool.client)).toEqual(['BEGIN', 'ROLLBACK']);
    });
  });

  describe('dispatchCampaign', () => {
    const scheduled = buildCampaign({
      status: CampaignStatus.SCHEDULED,
      primaryChannel: Channel.EMAIL,
      fallbackChannel: Channel.SMS,
    });
    const sending = { ...scheduled, status: CampaignStatus.SENDING };

    beforeEach(() => {
      campaignModel.findById.mockResolvedValue(scheduled);
      campaignModel.findByIdForUpdate.mockResolvedValue(scheduled);
      campaignModel.updateStatus.mockResolvedValue(sending);
    });

    it('creates a row per consenting member and counts the rest', async () => {
      audienceResolver.estimate.mockResolvedValue(3);
      audienceResolver.resolveMembers.mockResolvedValue([
        member(CUSTOMER_ID, { email: true }),
        member(OTHER_CUSTOMER_ID, { sms: true }),
        member('99999999-9999-4999-8999-999999999999', { push: true }),
      ]);
      sendService.createSendRow.mockResolvedValue({ send: buildSend(), created: true });

      const summary = await service.dispatchCampaign(RESTAURANT_ID, CAMPAIGN_ID, 'manager-1');

      expect(summary).toEqual({
        campaignId: CAMPAIGN_ID,
        estimatedAudienceSize: 3,
        sendsCreated: 2,
        skippedNoConsent: 1,
        status: CampaignStatus.SENDING,
      });
      expect(sendService.createSendRow.mock.calls.map(([, request]) => [request.customerId, request.channel])).toEqual([
        [CUSTOMER_ID, Channel.EMAIL],
        [OTHER_CUSTOMER_ID, Channel.SMS],
      ]);
      expect(campaignModel.updateEstimatedAudienceSize).toHaveBeenCalledWith(CAMPAIGN_ID, RESTAURANT_ID, 3);
      expect(metricsService.recompute).toHaveBeenCalledWith(CAMPAIGN_ID);
      expect(eventPublisher.publishCampaignEvent).toHaveBeenCalledWith(CampaignEvents.CAMPAIGN_DISPATCHED, {
        campaignId: CAMPAIGN_ID,
        restaurantId: RESTAURANT_ID,
        status: CampaignStatus.SENDING,
        performedBy: 'manager-1',
        sendsCreated: 2,
      });
    });

    it('completes at once when nobody is reachable', async () => {
      const sent = { ...scheduled, status: CampaignStatus.SENT, sentAt: NOW };
      audienceResolver.estimate.mockResolvedValue(0);
      audienceResolver.resolveMembers.mockResolvedValue([]);
      campaignModel.findByIdForUpdate
        .mockResolvedValueOnce(scheduled)
        .mockResolvedValueOnce({ ...sending, dispatchCompletedAt: NOW });
      campaignModel.updateStatus.mockResolvedValueOnce(sending).mockResolvedValueOnce(sent);
      sendModel.countNonTerminal.mockResolvedValue(0);

      const summary = await service.dispatchCampaign(RESTAURANT_ID, CAMPAIGN_ID);

      expect(summary.status).toBe(CampaignStatus.SENT);
      expect(campaignModel.markDispatchCompleted).toHaveBeenCalledWith(CAMPAIGN_ID, RESTAURANT_ID, NOW);
      expect(campaignModel.updateStatus).toHaveBeenLastCalledWith(CAMPAIGN_ID, RESTAURANT_ID, CampaignStatus.SENT, {
        sentAt: NOW,
      });
      expect(auditLogModel.create).toHaveBeenLastCalledWith({
        campaignId: CAMPAIGN_ID,
        action: CampaignAuditAction.COMPLETED,
        performedBy: 'system',
        changes: { from: CampaignStatus.SENDING, to: CampaignStatus.SENT },
      });
    });

    it('stops creating rows once the campaign is paused underneath it', async () => {
      audienceResolver.estimate.mockResolvedValue(2);
      audienceResolver.resolveMembers.mockResolvedValue([
        member(CUSTOMER_ID, { email: true }),
        member(OTHER_CUSTOMER_ID, { email: true }),
      ]);
      sendService.createSendRow.mockRejectedValue(new CampaignNotDispatchableError(CAMPAIGN_ID, CampaignStatus.PAUSED));
      campaignModel.findById
        .mockResolvedValueOnce(scheduled)
        .mockResolvedValueOnce({ ...scheduled, status: CampaignStatus.PAUSED });

      const summary = await service.dispatchCampaign(RESTAURANT_ID, CAMPAIGN_ID, 'manager-1');

      expect(summary).toMatchObject({ sendsCreated: 0, status: CampaignStatus.PAUSED });
      expect(sendService.createSendRow).toHaveBeenCalledTimes(1);
      expect(campaignModel.markDispatchCompleted).not.toHaveBeenCalled();
    });

    it('does not complete a campaign whose fan-out is still running', async () => {
      audienceResolver.estimate.mockResolvedValue(2);
      audienceResolver.resolveMembers.mockResolvedValue([
        member(CUSTOMER_ID, { email: true }),
        member(OTHER_CUSTOMER_ID, { email: true }),
      ]);
      campaignModel.findByIdForUpdate.mockResolvedValue(sending);
      campaignModel.findByIdForUpdate.mockResolvedValueOnce(scheduled);
      sendModel.countNonTerminal.mockResolvedValue(0);
      // the metrics job gets in between the two rows, with the first already delivered
      sendService.createSendRow
        .mockImplementationOnce(async () => {
          await service.completeIfFinished(RESTAURANT_ID, CAMPAIGN_ID);
          return { send: buildSend(), created: true };
        })
        .mockResolvedValueOnce({ send: buildSend({ customerId: OTHER_CUSTOMER_ID }), created: true });

      const summary = await service.dispatchCampaign(RESTAURANT_ID, CAMPAIGN_ID, 'manager-1');

      expect(summary).toMatchObject({ sendsCreated: 2, status: CampaignStatus.SENDING });
      expect(campaignModel.updateStatus).toHaveBeenCalledTimes(1);
      expect(campaignModel.updateStatus).not.toHaveBeenCalledWith(
        CAMPAIGN_ID,
        RESTAURANT_ID,
        CampaignStatus.SENT,
        expect.anything()
      );
      expect(campaignModel.markDispatchCompleted.mock.invocationCallOrder[0]).toBeGreaterThan(
        sendService.createSendRow.mock.invocationCallOrder[1]
      );
    });

    it('leaves the dispatch unmarked when the fan-out fails part way', async () => {
      audienceResolver.estimate.mockResolvedValue(2);
      audienceResolver.resolveMembers.mockResolvedValue([
        member(CUSTOMER_ID, { email: true }),
        member(OTHER_CUSTOMER_ID, { email: true }),
      ]);
      sendService.createSendRow
        .mockResolvedValueOnce({ send: buildSend(), created: true })
        .mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.dispatchCampaign(RESTAURANT_ID, CAMPAIGN_ID, 'manager-1')).rejects.toThrow('connection reset');
      expect(campaignModel.markDispatchCompleted).not.toHaveBeenCalled();
    });
  });

  describe('completeIfFinished', () => {
    it('waits for the dispatch marker even when no row is pending', async () => {
      const sending = buildCampaign({ status: CampaignStatus.SENDING });
      campaignModel.findByIdForUpdate.mockResolvedValue(sending);
      sendModel.countNonTerminal.mockResolvedValue(0);

      await expect(service.completeIfFinished(RESTAURANT_ID, CAMPAIGN_ID)).resolves.toBe(sending);
      expect(sendModel.countNonTerminal).not.toHaveBeenCalled();
      expect(campaignModel.updateStatus).not.toHaveBeenCalled();
    });

    it('waits for pending rows once the fan-out is done', async () => {
      campaignModel.findByIdForUpdate.mockResolvedValue(
        buildCampaign({ status: CampaignStatus.SENDING, dispatchCompletedAt: NOW })
      );
      sendModel.countNonTerminal.mockResolvedValue(3);

      const result = await service.completeIfFinished(RESTAURANT_ID, CAMPAIGN_ID);

      expect(result.status).toBe(CampaignStatus.SENDING);
      expect(sendModel.countNonTerminal).toHaveBeenCalledWith(CAMPAIGN_ID);
      expect(campaignModel.updateStatus).not.toHaveBeenCalled();
    });
  });

  describe('resumeStalledDispatches', () => {
    const STALLED_ID = '99999999-9999-4999-8999-999999999999';

    it('finishes the fan-out of stalled campaigns and isolates failures', async () => {
      const stalled = buildCampaign({ status: CampaignStatus.SENDING, estimatedAudienceSize: 1 });
      campaignModel.findStalledDispatches.mockResolvedValue([
        { id: STALLED_ID, restaurantId: RESTAURANT_ID },
        { id: CAMPAIGN_ID, restaurantId: RESTAURANT_ID },
      ]);
      campaignModel.findById.mockRejectedValueOnce(new Error('connection reset')).mockResolvedValueOnce(stalled);
      campaignModel.findByIdForUpdate.mockResolvedValue(stalled);
      audienceResolver.resolveMembers.mockResolvedValue([member(CUSTOMER_ID, { email: true })]);
      sendService.createSendRow.mockResolvedValue({ send: buildSend(), created: true });

      const result = await service.resumeStalledDispatches(NOW);

      expect(result).toEqual({ resumed: 1, failed: 1 });
      expect(campaignModel.findStalledDispatches).toHaveBeenCalledWith(new Date('2025-06-15T11:55:00.000Z'), 10);
      expect(sendService.createSendRow).toHaveBeenCalledTimes(1);
      expect(campaignModel.markDispatchCompleted).toHaveBeenCalledWith(CAMPAIGN_ID, RESTAURANT_ID, NOW);
      expect(metricsService.recompute).toHaveBeenCalledWith(CAMPAIGN_ID);
    });

    it('skips a campaign that finished or moved on since it was listed', async () => {
      campaignModel.findStalledDispatches.mockResolvedValue([{ id: CAMPAIGN_ID, restaurantId: RESTAURANT_ID }]);
      campaignModel.findById.mockResolvedValue(buildCampaign({ status: CampaignStatus.PAUSED }));

      await expect(service.resumeStalledDispatches(NOW)).resolves.toEqual({ resumed: 0, failed: 0 });
      expect(audienceResolver.resolveMembers).not.toHaveBeenCalled();
    });
  });

  it('refreshes every active campaign even when one of them fails', async () => {
    const OTHER_CAMPAIGN_ID = '99999999-9999-4999-8999-999999999999';
    const finished = buildCampaign({ status: CampaignStatus.SENDING, dispatchCompletedAt: NOW });
    campaignModel.findByStatuses.mockResolvedValue([
      { id: OTHER_CAMPAIGN_ID, restaurantId: RESTAURANT_ID },
      { id: CAMPAIGN_ID, restaurantId: RESTAURANT_ID },
    ]);
    metricsService.recompute.mockRejectedValueOnce(new Error('deadlock detected'));
    campaignModel.findByIdForUpdate.mockResolvedValue(finished);
    campaignModel.updateStatus.mockResolvedValue({ ...finished, status: CampaignStatus.SENT, sentAt: NOW });
    sendModel.countNonTerminal.mockResolvedValue(0);

    await expect(service.refreshActiveCampaigns(50)).resolves.toEqual({ refreshed: 1, completed: 1, failed: 1 });
    expect(campaignModel.updateStatus).toHaveBeenCalledWith(CAMPAIGN_ID, RESTAURANT_ID, CampaignStatus.SENT, {
      sentAt: NOW,
    });
  });

  it('keeps a pause even when its event cannot be published', async () => {
    const paused = buildCampaign({ status: CampaignStatus.PAUSED });
    campaignModel.findByIdForUpdate.mockResolvedValue(buildCampaign({ status: CampaignStatus.SENDING }));
    campaignModel.updateStatus.mockResolvedValue(paused);
    eventPublisher.publishCampaignEvent.mockRejectedValue(new Error('broker unavailable'));

    await expect(service.pauseCampaign(RESTAURANT_ID, CAMPAIGN_ID, 'manager-1')).resolves.toBe(paused);
  });

  it('skips due campaigns that already moved on and counts real failures', async () => {
    campaignModel.findDueScheduled.mockResolvedValue([
      { id: CAMPAIGN_ID, restaurantId: RESTAURANT_ID },
      { id: '99999999-9999-4999-8999-999999999999', restaurantId: RESTAURANT_ID },
    ]);
    const dispatch = jest
      .spyOn(service, 'dispatchCampaign')
      .mockRejectedValueOnce(new InvalidStatusTransitionError('campaign', 'cancelled', 'sending'))
      .mockRejectedValueOnce(new Error('connection reset'));

    await expect(service.dispatchDueCampaigns(NOW)).resolves.toEqual({ dispatched: 0, failed: 1 });
    expect(dispatch).toHaveBeenCalledTimes(2);
  });
});
