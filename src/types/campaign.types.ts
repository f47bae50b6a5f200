import { AudienceSpec, StoredAudienceSpec } from './audience.types';
import { DiscountType, PromoOrderType } from './promo-code.types';

export enum CampaignStatus {
  DRAFT = 'draft',
  SCHEDULED = 'scheduled',
  SENDING = 'sending',
  SENT = 'sent',
  CANCELLED = 'cancelled',
  PAUSED = 'paused',
}

export enum CampaignType {
  ONE_TIME = 'one_time',
  SCHEDULED = 'scheduled',
  RECURRING = 'recurring',
  AB_TEST = 'ab_test',
}

export enum Channel {
  PUSH = 'push',
  WHATSAPP = 'whatsapp',
  EMAIL = 'email',
  SMS = 'sms',
}

export type AbVariant = 'A' | 'B';

export interface AbTestConfig {
  /** Share of recipients, in percent, that receive variant A */
  splitPercent: number;
}

export interface RecurringConfig {
  frequency: 'daily' | 'weekly' | 'monthly';
  interval?: number;
  endsAt?: string;
}

/**
 * Settings for the personal single-use code granted to each recipient
 * when a campaign dispatches.
 */
export interface PromoTemplate {
  prefix: string;
  discountType: DiscountType;
  discountValue: number;
  minSpendCents?: number;
  orderType?: PromoOrderType;
  validDays: number;
}

export interface Campaign {
  id: string;
  restaurantId: string;
  name: string;
  description: string | null;
  type: CampaignType;
  status: CampaignStatus;
  primaryChannel: Channel;
  fallbackChannel: Channel | null;
  audience: StoredAudienceSpec;
  /** Cached audience count, refreshed from the resolver */
  estimatedAudienceSize: number;
  messageSubject: string | null;
  messageTemplate: string;
  scheduledAt: Date | null;
  recurringConfig: RecurringConfig | null;
  abTestConfig: AbTestConfig | null;
  promoTemplate: PromoTemplate | null;
  createdBy: string | null;
  createdAt: Date;
  updatedAt: Date;
  sentAt: Date | null;
  /** Set when the fan-out has written a row for every reachable member */
  dispatchCompletedAt: Date | null;
}

export interface CreateCampaignRequest {
  name: string;
  description?: string | null;
  type: CampaignType;
  primaryChannel: Channel;
  fallbackChannel?: Channel | null;
  audience: AudienceSpec;
  messageSubject?: string | null;
  messageTemplate: string;
  recurringConfig?: RecurringConfig | null;
  abTestConfig?: AbTestConfig | null;
  promoTemplate?: PromoTemplate | null;
}

export type UpdateCampaignRequest = Partial<CreateCampaignRequest>;

export interface ListCampaignsFilters {
  status?: CampaignStatus;
  type?: CampaignType;
  limit?: number;
  offset?: number;
}

export interface DispatchSummary {
  campaignId: string;
  estimatedAudienceSize: number;
  sendsCreated: number;
  skippedNoConsent: number;
  status: CampaignStatus;
}
