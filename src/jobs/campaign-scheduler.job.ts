import { Pool } from 'pg';
import { campaignConfig } from '../config';
import { getDatabase } from '../config/database';
import { CampaignService } from '../services/campaign.service';
import { JobExecutor } from './job-executor';

/**
 * Campaign Scheduler Job
 * Dispatches scheduled campaigns whose time has come and picks up
 * fan-outs that died part way
 */
export class CampaignSchedulerJob extends JobExecutor {
  private _campaignService?: CampaignService;

  constructor(poolProvider: () => Pool = getDatabase, campaignService?: CampaignService) {
    super(
      {
        name: 'campaign-scheduler',
        intervalSeconds: campaignConfig.jobs.schedulerIntervalSeconds,
        // a failed dispatch is picked up on the next tick
        enableRetry: false,
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
    const now = new Date();
    const result = await this.campaignService.dispatchDueCampaigns(now);

    if (result.dispatched > 0 || result.failed > 0) {
      this.jobLogger.info(result, 'Due campaigns processed');
    }

    const stalled = await this.campaignService.resumeStalledDispatches(now);
    if (stalled.resumed > 0 || stalled.failed > 0) {
      this.jobLogger.info(stalled, 'Stalled dispatches processed');
    }
  }
}
