import { AudienceType } from '../../src/types/audience.types';
import {
  Campaign,
  CampaignStatus,
  CampaignType,
  Channel,
} from '../../src/types/campaign.types';
import { CampaignSend, SendStatus } from '../../src/types/campaign-send.types';
import { DiscountType, PromoCode, PromoOrderType } from '../../src/types/promo-code.types';

export const RESTAURANT_ID = '11111111-1111-4111-8111-111111111111';
export const OTHER_RESTAURANT_ID = '22222222-2222-4222-8222-222222222222';
export const CAMPAIGN_ID = '33333333-3333-4333-8333-333333333333';
export const PROMO_CODE_ID = '44444444-4444-4444-8444-444444444444';
export const CUSTOMER_ID = '55555555-5555-4555-8555-555555555555';
export const OTHER_CUSTOMER_ID = '66666666-6666-4666-8666-666666666666';
export const SEND_ID = '77777777-7777-4777-8777-777777777777';
export const TAG_ID = '88888888-8888-4888-8888-888888888888';

export const NOW = new Date('2025-06-15T12:00:00.000Z');

export function buildCampaign(overrides: Partial<Campaign> = {}): Campaign {
  return {
    id: CAMPAIGN_ID,
    restaurantId: RESTAURANT_ID,
    name: 'Summer lunch push',
    description: null,
    type: CampaignType.ONE_TIME,
    status: CampaignStatus.DRAFT,
    primaryChannel: Channel.EMAIL,
    fallbackChannel: null,
    audience: { type: AudienceType.ALL },
    estimatedAudienceSize: 0,
    messageSubject: 'Lunch is on us',
    messageTemplate: 'Hi {{name}}, 10% off lunch this week',
    scheduledAt: null,
    recurringConfig: null,
    abTestConfig: null,
    promoTemplate: null,
    createdBy: 'manager-1',
    createdAt: new Date('2025-06-01T09:00:00.000Z'),
    updatedAt: new Date('2025-06-01T09:00:00.000Z'),
    sentAt: null,
    dispatchCompletedAt: null,
    ...overrides,
  };
}

export function buildPromoCode(overrides: Partial<PromoCode> = {}): PromoCode {
  return {
    id: PROMO_CODE_ID,
    campaignId: null,
    restaurantId: RESTAURANT_ID,
    code: 'SUMMER-AB12CD34',
    discountType: DiscountType.PERCENTAGE,
    discountValue: 10,
    minSpendCents: 5000,
    maxUses: null,
    maxUsesPerCustomer: 1,
    totalUses: 0,
    orderType: PromoOrderType.ALL,
    validFrom: new Date('2025-06-01T00:00:00.000Z'),
    validUntil: new Date('2025-09-01T00:00:00.000Z'),
    isActive: true,
    createdAt: new Date('2025-06-01T00:00:00.000Z'),
    updatedAt: new Date('2025-06-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function buildSend(overrides: Partial<CampaignSend> = {}): CampaignSend {
  return {
    id: SEND_ID,
    campaignId: CAMPAIGN_ID,
    customerId: CUSTOMER_ID,
    channelUsed: Channel.EMAIL,
    status: SendStatus.PENDING,
    sentAt: null,
    deliveredAt: null,
    openedAt: null,
    clickedAt: null,
    errorMessage: null,
    promoCodeAssigned: null,
    abVariant: null,
    createdAt: new Date('2025-06-15T12:00:00.000Z'),
    updatedAt: new Date('2025-06-15T12:00:00.000Z'),
    ...overrides,
  };
}

/** Row shape of promo_codes as the pg driver returns it */
export function promoCodeRow(promo: PromoCode) {
  return {
    id: promo.id,
    campaign_id: promo.campaignId,
    restaurant_id: promo.restaurantId,
    code: promo.code,
    discount_type: promo.discountType,
    discount_value: promo.discountValue,
    min_spend_cents: promo.minSpendCents,
    max_uses: promo.maxUses,
    max_uses_per_customer: promo.maxUsesPerCustomer,
    total_uses: promo.totalUses,
    order_type: promo.orderType,
    valid_from: promo.validFrom,
    valid_until: promo.validUntil,
    is_active: promo.isActive,
    created_at: promo.createdAt,
    updated_at: promo.updatedAt,
  };
}

/** Row shape of campaign_sends as the pg driver returns it */
export function sendRow(send: CampaignSend) {
  return {
    id: send.id,
    campaign_id: send.campaignId,
    customer_id: send.customerId,
    channel_used: send.channelUsed,
    status: send.status,
    sent_at: send.sentAt,
    delivered_at: send.deliveredAt,
    opened_at: send.openedAt,
    clicked_at: send.clickedAt,
    error_message: send.errorMessage,
    promo_code_assigned: send.promoCodeAssigned,
    ab_variant: send.abVariant,
    created_at: send.createdAt,
    updated_at: send.updatedAt,
  };
}
