import { Pool } from 'pg';
import { CampaignNotFoundError } from '../errors/domain-errors';
import { CampaignModel } from '../models/campaign.model';
import { CampaignMetricsModel } from '../models/campaign-metrics.model';
import { CampaignMetrics } from '../types';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';
import { isForeignKeyViolation } from '../utils/pg-errors';

export class CampaignMetricsService {
  private campaignModel: CampaignModel;
  private metricsModel: CampaignMetricsModel;

  constructor(pool: Pool) {
    this.campaignModel = new CampaignModel(pool);
    this.metricsModel = new CampaignMetricsModel(pool);
  }

  /**
   * Rebuild the campaign's counters from the send ledger and its promo
   * redemptions. Running it twice without new activity changes nothing.
   */
  async recompute(campaignId: string): Promise<CampaignMetrics> {
    const endTimer = campaignMetrics.metricsRecomputeDuration.startTimer();
    try {
      try {
        await this.metricsModel.recompute(campaignId);
      } catch (error) {
        // the metrics row references campaigns(id)
        if (isForeignKeyViolation(error)) {
          throw new CampaignNotFoundError(campaignId);
        }
        throw error;
      }
      const metrics = await this.metricsModel.findByCampaignId(campaignId);
      if (!metrics) {
        throw new CampaignNotFoundError(campaignId);
      }
      logger.debug({ campaignId, totalTargeted: metrics.totalTargeted }, 'Campaign metrics recomputed');
      return metrics;
    } catch (error) {
      logger.error({ err: error, campaignId }, 'Error recomputing campaign metrics');
      throw error;
    } finally {
      endTimer();
    }
  }

  async recomputeForRestaurant(restaurantId: string, campaignId: string): Promise<CampaignMetrics> {
    await this.assertCampaignExists(restaurantId, campaignId);
    return this.recompute(campaignId);
  }

  /**
   * Stored counters; a campaign that was never recomputed reads as zeros.
   */
  async getMetrics(restaurantId: string, campaignId: string): Promise<CampaignMetrics> {
    const campaign = await this.assertCampaignExists(restaurantId, campaignId);
    const metrics = await this.metricsModel.findByCampaignId(campaignId);
    return metrics ?? emptyMetrics(campaignId, campaign.updatedAt);
  }

  private async assertCampaignExists(restaurantId: string, campaignId: string) {
    const campaign = await this.campaignModel.findById(campaignId, restaurantId);
    if (!campaign) {
      throw new CampaignNotFoundError(campaignId);
    }
    return campaign;
  }
}

export function emptyMetrics(campaignId: string, updatedAt: Date): CampaignMetrics {
  return {
    campaignId,
    totalTargeted: 0,
    totalSent: 0,
    totalDelivered: 0,
    totalFailed: 0,
    totalBounced: 0,
    totalOpened: 0,
    totalClicked: 0,
    totalRedemptions: 0,
    totalDiscountCents: 0,
    updatedAt,
  };
}
