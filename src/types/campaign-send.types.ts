import { AbVariant, Channel } from './campaign.types';

export enum SendStatus {
  PENDING = 'pending',
  SENT = 'sent',
  DELIVERED = 'delivered',
  FAILED = 'failed',
  BOUNCED = 'bounced',
}

export const TERMINAL_SEND_STATUSES: readonly SendStatus[] = [
  SendStatus.SENT,
  SendStatus.DELIVERED,
  SendStatus.FAILED,
  SendStatus.BOUNCED,
];

export type EngagementEvent = 'opened' | 'clicked';

export interface CampaignSend {
  id: string;
  campaignId: string;
  customerId: string;
  channelUsed: Channel;
  status: SendStatus;
  sentAt: Date | null;
  deliveredAt: Date | null;
  openedAt: Date | null;
  clickedAt: Date | null;
  errorMessage: string | null;
  promoCodeAssigned: string | null;
  abVariant: AbVariant | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateSendRequest {
  campaignId: string;
  customerId: string;
  channel: Channel;
  promoCodeAssigned?: string | null;
  abVariant?: AbVariant | null;
}

export interface UpdateSendStatusRequest {
  status: SendStatus;
  occurredAt: Date;
  errorMessage?: string | null;
}

export interface ListSendsFilters {
  status?: SendStatus;
  limit?: number;
  offset?: number;
}

export interface CampaignMetrics {
  campaignId: string;
  totalTargeted: number;
  totalSent: number;
  totalDelivered: number;
  totalFailed: number;
  totalBounced: number;
  totalOpened: number;
  totalClicked: number;
  totalRedemptions: number;
  totalDiscountCents: number;
  updatedAt: Date;
}
