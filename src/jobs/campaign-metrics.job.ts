import { Pool } from 'pg';
import { campaignConfig } from '../config';
import { getDatabase } from '../config/database';
import { CampaignService } from '../services/campaign.service';
import { JobExecutor } from './job-executor';

const ACTIVE_CAMPAIGN_LIMIT = 500;

/**
 * Campaign Metrics Job
 * Keeps metrics fresh for campaigns in flight and completes finished ones
 */
export class CampaignMetricsJob extends JobExecutor {
  private _campaignService?: CampaignService;

  constructor(poolProvider: () => Pool = getDatabase, campaignService?: CampaignService) {
    super(
      {
        name: 'campaign-metrics',
        intervalSeconds: campaignConfig.jobs.metricsIntervalSeconds,
        enableRetry: true,
        retryOptions: {
          maxAttempts: 2,
          delayMs: 5000,
          backoffMultiplier: 2,
          maxDelayMs: 30000,
        },
      },
      poolProvider
    );
    this._campaignService = campaignService;
  }

  private get campaignService(): CampaignService {
    if (!this._campaignService) {
      this._campaignService = new CampaignService(this.pool);
    }
    return this._campaignService;
  }

  protected async executeCore(): Promise<void> {
    const result = await this.campaignService.refreshActiveCampaigns(ACTIVE_CAMPAIGN_LIMIT);
    if (result.failed > 0) {
      this.jobLogger.warn(result, 'Some active campaigns could not be refreshed');
    } else {
      this.jobLogger.debug(result, 'Active campaign metrics refreshed');
    }
  }
}
