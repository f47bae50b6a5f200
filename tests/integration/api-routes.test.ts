import { FastifyInstance } from 'fastify';
import { Pool } from 'pg';
import { createApp } from '../../src/app';
import {
  InvariantViolationError,
  PromoCodeRejectedError,
  TransientContentionError,
} from '../../src/errors/domain-errors';
import { AppServices } from '../../src/services';
import { PromoRejectionReason } from '../../src/types/promo-code.types';
import { CampaignStatus } from '../../src/types/campaign.types';
import { CAMPAIGN_ID, CUSTOMER_ID, OTHER_CUSTOMER_ID, PROMO_CODE_ID, RESTAURANT_ID } from '../fixtures/test-data';

const tenantHeaders = { 'x-restaurant-id': RESTAURANT_ID, 'x-actor-id': 'manager-7' };

function mockServices() {
  return {
    campaignService: {
      scheduleCampaign: jest.fn(),
      getCampaign: jest.fn(),
      previewAudience: jest.fn(),
      previewAudienceMembers: jest.fn(),
    },
    promoCodeService: {
      validateAndRedeem: jest.fn(),
      redeem: jest.fn(),
      validate: jest.fn(),
      createPromoCode: jest.fn(),
    },
    sendService: {},
    metricsService: {},
  };
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let services: ReturnType<typeof mockServices>;
  let pool: { query: jest.Mock };

  beforeEach(async () => {
    services = mockServices();
    pool = { query: jest.fn().mockResolvedValue({ rows: [{ '?column?': 1 }], rowCount: 1 }) };
    app = await createApp({
      pool: pool as unknown as Pool,
      services: services as unknown as AppServices,
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('restaurant context', () => {
    it('rejects requests without a restaurant id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/apply',
        payload: { customerId: CUSTOMER_ID, code: 'SUMMER-AB12CD34', orderAmountCents: 10000 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ message: 'x-restaurant-id header must be a valid UUID' });
      expect(services.promoCodeService.validateAndRedeem).not.toHaveBeenCalled();
    });

    it('passes the acting user through to the service', async () => {
      const scheduledAt = '2025-06-20T09:00:00.000Z';
      services.campaignService.scheduleCampaign.mockResolvedValue({ id: CAMPAIGN_ID, status: CampaignStatus.SCHEDULED });

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/campaigns/${CAMPAIGN_ID}/schedule`,
        headers: tenantHeaders,
        payload: { scheduledAt },
      });

      expect(response.statusCode).toBe(200);
      expect(services.campaignService.scheduleCampaign).toHaveBeenCalledWith(
        RESTAURANT_ID,
        CAMPAIGN_ID,
        new Date(scheduledAt),
        'manager-7'
      );
    });
  });

  describe('validation', () => {
    it('lists the failing body fields', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/apply',
        headers: tenantHeaders,
        payload: { customerId: CUSTOMER_ID, code: 'SUMMER-AB12CD34', orderAmountCents: -5 },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.message).toBe('Request body validation failed');
      expect(body.details.map((d: { field: string }) => d.field)).toEqual(['orderAmountCents']);
    });

    it('checks each custom filter value against its field type', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/audiences/preview',
        headers: tenantHeaders,
        payload: {
          audience: {
            type: 'custom_filter',
            conditions: [
              { field: 'lastVisit', operator: 'gt', value: 5 },
              { field: 'totalPoints', operator: 'gte', value: '2025-01-01' },
              { field: 'visitCount', operator: 'eq', value: 2.5 },
            ],
          },
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual([
        { field: 'audience.conditions.0.value', message: 'Value must be an ISO date for this field', type: 'string.base' },
        { field: 'audience.conditions.1.value', message: 'Value must be a whole number for this field', type: 'number.base' },
        { field: 'audience.conditions.2.value', message: 'Value must be a whole number for this field', type: 'number.integer' },
      ]);
      expect(services.campaignService.previewAudience).not.toHaveBeenCalled();
    });

    it('passes custom filter values that match their fields', async () => {
      services.campaignService.previewAudience.mockResolvedValue({ estimatedAudienceSize: 4 });
      const audience = {
        type: 'custom_filter',
        conditions: [
          { field: 'lastVisit', operator: 'lt', value: '2025-05-01T00:00:00.000Z' },
          { field: 'totalSpentCents', operator: 'gte', value: 20000 },
        ],
      };

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/audiences/preview',
        headers: tenantHeaders,
        payload: { audience },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ estimatedAudienceSize: 4 });
      expect(services.campaignService.previewAudience).toHaveBeenCalledWith(RESTAURANT_ID, audience);
    });

    it('rejects a promo code that would already be expired', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes',
        headers: tenantHeaders,
        payload: {
          code: 'WELCOME10',
          discountType: 'percentage',
          discountValue: 10,
          validUntil: '2020-01-01T00:00:00.000Z',
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual([
        {
          field: 'validUntil',
          message: 'validUntil must be in the future when validFrom is omitted',
          type: 'date.greater',
        },
      ]);
      expect(services.promoCodeService.createPromoCode).not.toHaveBeenCalled();
    });

    it('rejects ids that are not UUIDs', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/campaigns/not-a-uuid',
        headers: tenantHeaders,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details[0].message).toBe('Campaign ID must be a valid UUID');
      expect(services.campaignService.getCampaign).not.toHaveBeenCalled();
    });
  });

  describe('promo codes at checkout', () => {
    it('applies a code and answers 201', async () => {
      const applied = { promoCodeId: PROMO_CODE_ID, code: 'SUMMER-AB12CD34', discountCents: 1000 };
      services.promoCodeService.validateAndRedeem.mockResolvedValue(applied);

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/apply',
        headers: tenantHeaders,
        payload: { customerId: CUSTOMER_ID, code: '  SUMMER-AB12CD34 ', orderAmountCents: 10000 },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual(applied);
      expect(services.promoCodeService.validateAndRedeem).toHaveBeenCalledWith(
        RESTAURANT_ID,
        CUSTOMER_ID,
        'SUMMER-AB12CD34',
        10000,
        undefined
      );
    });

    it('answers 422 with the rejection reason', async () => {
      services.promoCodeService.validateAndRedeem.mockRejectedValue(
        new PromoCodeRejectedError(PromoRejectionReason.MINIMUM_SPEND_NOT_MET, 'Minimum spend of $50.00 required')
      );

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/apply',
        headers: { ...tenantHeaders, 'x-request-id': 'req-checkout-1' },
        payload: { customerId: CUSTOMER_ID, code: 'SUMMER-AB12CD34', orderAmountCents: 4000 },
      });

      expect(response.statusCode).toBe(422);
      expect(response.headers['x-request-id']).toBe('req-checkout-1');
      expect(response.json()).toEqual({
        error: 'Minimum spend of $50.00 required',
        code: 'PROMO_CODE_REJECTED',
        reason: PromoRejectionReason.MINIMUM_SPEND_NOT_MET,
        requestId: 'req-checkout-1',
      });
    });

    it('answers 503 with Retry-After when the code stays contended', async () => {
      services.promoCodeService.redeem.mockRejectedValue(new TransientContentionError('Promo redemption', 3));

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/redeem',
        headers: tenantHeaders,
        payload: {
          promoCodeId: PROMO_CODE_ID,
          customerId: CUSTOMER_ID,
          orderAmountCents: 10000,
          discountAppliedCents: 1000,
        },
      });

      expect(response.statusCode).toBe(503);
      expect(response.headers['retry-after']).toBe('1');
      expect(response.json()).toMatchObject({
        error: 'Promo redemption failed after 3 attempts due to concurrent access',
        code: 'TRANSIENT_CONTENTION',
        retryable: true,
      });
      expect(services.promoCodeService.redeem).toHaveBeenCalledWith({
        promoCodeId: PROMO_CODE_ID,
        customerId: CUSTOMER_ID,
        orderAmountCents: 10000,
        discountAppliedCents: 1000,
        restaurantId: RESTAURANT_ID,
      });
    });

    it('hides invariant violations behind a 500', async () => {
      services.promoCodeService.validate.mockRejectedValue(
        new InvariantViolationError('Promo code usage exceeds its cap', { promoCodeId: PROMO_CODE_ID })
      );

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/promo-codes/validate',
        headers: tenantHeaders,
        payload: { customerId: CUSTOMER_ID, code: 'SUMMER-AB12CD34', orderAmountCents: 10000 },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({ error: 'Internal server error', code: 'INVARIANT_VIOLATION' });
    });
  });

  describe('audience members', () => {
    const members = [CUSTOMER_ID, OTHER_CUSTOMER_ID].map(customerId => ({
      customerId,
      name: null,
      email: null,
      phone: null,
      consent: { push: false, email: true, sms: false, whatsapp: false },
    }));

    it('returns a cursor when the page is full', async () => {
      services.campaignService.previewAudienceMembers.mockResolvedValue(members);

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/audiences/members',
        headers: tenantHeaders,
        payload: { audience: { type: 'all' }, limit: 2 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().nextCursor).toBe(OTHER_CUSTOMER_ID);
      expect(services.campaignService.previewAudienceMembers).toHaveBeenCalledWith(
        RESTAURANT_ID,
        { type: 'all' },
        { limit: 2, afterCustomerId: undefined }
      );
    });

    it('has no cursor on a short page', async () => {
      services.campaignService.previewAudienceMembers.mockResolvedValue(members);

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/audiences/members',
        headers: tenantHeaders,
        payload: { audience: { type: 'all' } },
      });

      expect(response.json()).toEqual({ data: members, nextCursor: null });
    });
  });

  describe('health', () => {
    it('is live without touching the database', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('ok');
      expect(pool.query).not.toHaveBeenCalled();
    });

    it('is not ready while the database is down', async () => {
      pool.query.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        status: 'not ready',
        checks: { database: false, rabbitmq: false },
      });
    });
  });
});
