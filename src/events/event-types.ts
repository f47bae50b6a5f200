import { CampaignStatus } from '../types';

export enum CampaignEvents {
  CAMPAIGN_DISPATCHED = 'campaign.dispatched',
  CAMPAIGN_PAUSED = 'campaign.paused',
  CAMPAIGN_RESUMED = 'campaign.resumed',
  CAMPAIGN_CANCELLED = 'campaign.cancelled',
  CAMPAIGN_COMPLETED = 'campaign.completed',
}

export const EVENT_SCHEMA_VERSION = '1.0.0';

export interface CampaignEventPayload {
  campaignId: string;
  restaurantId: string;
  status: CampaignStatus;
  performedBy: string;
  /** Only on dispatch */
  sendsCreated?: number;
  reason?: string;
}

export interface CampaignEvent {
  version: string;
  id: string;
  type: CampaignEvents;
  aggregateId: string;
  payload: CampaignEventPayload;
  timestamp: Date;
}
