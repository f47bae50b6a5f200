import { Pool } from 'pg';
import { campaignConfig } from '../config';
import { getDatabase } from '../config/database';
import { PromoCodeModel } from '../models/promo-code.model';
import { campaignMetrics } from '../utils/metrics';
import { JobExecutor } from './job-executor';

const DRIFT_SCAN_LIMIT = 1000;

/**
 * Promo Usage Reconciliation Job
 * Reports promo codes whose usage counter disagrees with their redemptions
 * or exceeds the global cap. Nothing is repaired.
 */
export class PromoUsageReconciliationJob extends JobExecutor {
  constructor(poolProvider: () => Pool = getDatabase) {
    super(
      {
        name: 'promo-usage-reconciliation',
        intervalSeconds: campaignConfig.jobs.reconciliationIntervalSeconds,
        enableRetry: false,
      },
      poolProvider
    );
  }

  protected async executeCore(): Promise<void> {
    const drift = await new PromoCodeModel(this.pool).findUsageDrift(DRIFT_SCAN_LIMIT);

    for (const row of drift) {
      const overCap = row.maxUses !== null && row.totalUses > row.maxUses;
      const kind = overCap ? 'over_cap' : 'cache_drift';
      campaignMetrics.promoInvariantViolations.inc({ kind });
      this.jobLogger.error({ ...row, kind }, 'Promo code usage invariant violated');
    }

    if (drift.length === 0) {
      this.jobLogger.debug('Promo code usage counters consistent');
    }
  }
}
