/**
 * Campaign Engine Configuration
 * Centralized configuration for promo codes, redemption concurrency and jobs
 */

export const campaignConfig = {
  // === PROMO CODES ===
  promoCodes: {
    defaultPrefix: process.env.PROMO_CODE_DEFAULT_PREFIX || 'PROMO',

    // Random part of PREFIX-XXXXXXXX
    suffixLength: parseInt(process.env.PROMO_CODE_SUFFIX_LENGTH || '8', 10),

    // Collision retries before giving up on generation
    maxGenerationAttempts: parseInt(process.env.PROMO_CODE_MAX_GENERATION_ATTEMPTS || '10', 10),

    defaultMaxUsesPerCustomer: parseInt(process.env.PROMO_CODE_DEFAULT_MAX_USES_PER_CUSTOMER || '1', 10),
  },

  // === REDEMPTION CONCURRENCY ===
  redemption: {
    // Postgres lock_timeout applied inside the redeem transaction
    lockTimeout: process.env.REDEEM_LOCK_TIMEOUT || '2s',

    maxAttempts: parseInt(process.env.REDEEM_MAX_ATTEMPTS || '3', 10),
    initialDelayMs: parseInt(process.env.REDEEM_RETRY_INITIAL_DELAY_MS || '50', 10),
    backoffMultiplier: parseFloat(process.env.REDEEM_RETRY_BACKOFF_MULTIPLIER || '2'),
    maxDelayMs: parseInt(process.env.REDEEM_RETRY_MAX_DELAY_MS || '1000', 10),
  },

  // === AUDIENCES ===
  audience: {
    defaultInactiveDays: parseInt(process.env.AUDIENCE_DEFAULT_INACTIVE_DAYS || '30', 10),
  },

  // === DISPATCH ===
  dispatch: {
    // Members resolved and written per batch
    batchSize: parseInt(process.env.DISPATCH_BATCH_SIZE || '500', 10),

    // A sending campaign without its dispatch marker and untouched this long is resumed
    stalledAfterSeconds: parseInt(process.env.DISPATCH_STALLED_AFTER_SECONDS || '300', 10),
  },

  // === CURRENCY ===
  currency: {
    default: process.env.DEFAULT_CURRENCY || 'USD',
  },

  // === PAGINATION ===
  pagination: {
    defaultLimit: parseInt(process.env.DEFAULT_PAGE_LIMIT || '50', 10),
    maxLimit: parseInt(process.env.MAX_PAGE_LIMIT || '200', 10),
  },

  // === BACKGROUND JOBS ===
  jobs: {
    schedulerIntervalSeconds: parseInt(process.env.CAMPAIGN_SCHEDULER_INTERVAL_SECONDS || '30', 10),
    metricsIntervalSeconds: parseInt(process.env.CAMPAIGN_METRICS_INTERVAL_SECONDS || '60', 10),
    reconciliationIntervalSeconds: parseInt(process.env.PROMO_RECONCILIATION_INTERVAL_SECONDS || '3600', 10),
    dueCampaignBatchSize: parseInt(process.env.DUE_CAMPAIGN_BATCH_SIZE || '20', 10),
    stalledDispatchBatchSize: parseInt(process.env.STALLED_DISPATCH_BATCH_SIZE || '10', 10),
  },
};

export type CampaignConfig = typeof campaignConfig;
