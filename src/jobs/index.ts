import { logger } from '../utils/logger';
import { CampaignMetricsJob } from './campaign-metrics.job';
import { CampaignSchedulerJob } from './campaign-scheduler.job';
import { JobExecutor } from './job-executor';
import { PromoUsageReconciliationJob } from './promo-usage-reconciliation.job';

export * from './job-executor';
export * from './campaign-scheduler.job';
export * from './campaign-metrics.job';
export * from './promo-usage-reconciliation.job';

let runningJobs: JobExecutor[] = [];

export function startJobs(): JobExecutor[] {
  if (runningJobs.length > 0) {
    return runningJobs;
  }

  runningJobs = [new CampaignSchedulerJob(), new CampaignMetricsJob(), new PromoUsageReconciliationJob()];
  runningJobs.forEach(job => job.start());
  logger.info({ jobs: runningJobs.map(job => job.getStatus().name) }, 'Background jobs started');
  return runningJobs;
}

export async function stopJobs(timeoutMs = 30000): Promise<void> {
  const jobs = runningJobs;
  runningJobs = [];
  jobs.forEach(job => job.stop());
  await Promise.all(jobs.map(job => job.waitForCompletion(timeoutMs)));
  logger.info('Background jobs stopped');
}
