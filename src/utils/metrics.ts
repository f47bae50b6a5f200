import client from 'prom-client';

export const register = new client.Registry();

// Default process metrics (CPU, memory, event loop); skipped under test
if (process.env.NODE_ENV !== 'test') {
  client.collectDefaultMetrics({ register });
}

export const campaignMetrics = {
  promoValidations: new client.Counter({
    name: 'promo_code_validations_total',
    help: 'Promo code validations by result',
    labelNames: ['result'],
    registers: [register],
  }),

  promoRedemptions: new client.Counter({
    name: 'promo_code_redemptions_total',
    help: 'Promo code redemptions committed',
    registers: [register],
  }),

  promoRedemptionRejections: new client.Counter({
    name: 'promo_code_redemption_rejections_total',
    help: 'Promo code redemptions rejected inside the redeem transaction',
    labelNames: ['reason'],
    registers: [register],
  }),

  promoRedemptionContentionRetries: new client.Counter({
    name: 'promo_code_redemption_contention_retries_total',
    help: 'Redeem transactions retried after lock or serialization contention',
    registers: [register],
  }),

  promoInvariantViolations: new client.Counter({
    name: 'promo_code_invariant_violations_total',
    help: 'Promo codes found with usage counters breaking their invariants',
    labelNames: ['kind'],
    registers: [register],
  }),

  campaignTransitions: new client.Counter({
    name: 'campaign_status_transitions_total',
    help: 'Campaign lifecycle transitions',
    labelNames: ['from_status', 'to_status'],
    registers: [register],
  }),

  sendRowsCreated: new client.Counter({
    name: 'campaign_send_rows_created_total',
    help: 'Send ledger rows created',
    labelNames: ['channel'],
    registers: [register],
  }),

  campaignEventsSkipped: new client.Counter({
    name: 'campaign_events_skipped_total',
    help: 'Lifecycle events dropped because the broker was not connected',
    labelNames: ['event_type'],
    registers: [register],
  }),

  metricsRecomputeDuration: new client.Histogram({
    name: 'campaign_metrics_recompute_duration_seconds',
    help: 'Duration of campaign metrics recomputation in seconds',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
    registers: [register],
  }),

  audienceResolveDuration: new client.Histogram({
    name: 'audience_resolve_duration_seconds',
    help: 'Duration of audience resolution in seconds',
    labelNames: ['audience_type', 'mode'],
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
    registers: [register],
  }),
};
