import { CampaignMetrics } from '../types';
import { CampaignSend, SendStatus } from '../types/campaign-send.types';
import { toInt } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';

type CampaignMetricsRow = {
  campaign_id: string;
  total_targeted: number | string;
  total_sent: number | string;
  total_delivered: number | string;
  total_failed: number | string;
  total_bounced: number | string;
  total_opened: number | string;
  total_clicked: number | string;
  total_redemptions: number | string;
  total_discount_cents: number | string;
  updated_at: Date;
};

export type SendCounterColumn =
  | 'total_targeted'
  | 'total_sent'
  | 'total_delivered'
  | 'total_failed'
  | 'total_bounced'
  | 'total_opened'
  | 'total_clicked';

export type SendCounts = Record<SendCounterColumn, number>;

export interface SendCounterRule {
  column: SendCounterColumn;
  /** Rows in one of these statuses */
  statuses?: readonly SendStatus[];
  /** Rows with this engagement timestamp set */
  stamped?: 'opened_at' | 'clicked_at';
}

/**
 * What each campaign_sends counter counts. A rule with neither field counts
 * every row. The recompute statement is built from these.
 */
export const SEND_COUNTERS: readonly SendCounterRule[] = [
  { column: 'total_targeted' },
  { column: 'total_sent', statuses: [SendStatus.SENT, SendStatus.DELIVERED] },
  { column: 'total_delivered', statuses: [SendStatus.DELIVERED] },
  { column: 'total_failed', statuses: [SendStatus.FAILED] },
  { column: 'total_bounced', statuses: [SendStatus.BOUNCED] },
  { column: 'total_opened', stamped: 'opened_at' },
  { column: 'total_clicked', stamped: 'clicked_at' },
];

const REDEMPTION_COUNTER_COLUMNS = ['total_redemptions', 'total_discount_cents'];

export function sendCounterSql(rule: SendCounterRule): string {
  if (rule.statuses) {
    const statuses = rule.statuses.map(status => `'${status}'`).join(', ');
    return `COUNT(*) FILTER (WHERE status IN (${statuses})) AS ${rule.column}`;
  }
  if (rule.stamped) {
    return `COUNT(*) FILTER (WHERE ${rule.stamped} IS NOT NULL) AS ${rule.column}`;
  }
  return `COUNT(*) AS ${rule.column}`;
}

export function sendMatchesCounter(rule: SendCounterRule, send: CampaignSend): boolean {
  if (rule.statuses) {
    return rule.statuses.includes(send.status);
  }
  switch (rule.stamped) {
    case 'opened_at':
      return send.openedAt !== null;
    case 'clicked_at':
      return send.clickedAt !== null;
    case undefined:
      return true;
  }
}

/** The send counters over rows already in memory */
export function countSends(sends: readonly CampaignSend[]): SendCounts {
  const counts: SendCounts = {
    total_targeted: 0,
    total_sent: 0,
    total_delivered: 0,
    total_failed: 0,
    total_bounced: 0,
    total_opened: 0,
    total_clicked: 0,
  };
  for (const rule of SEND_COUNTERS) {
    counts[rule.column] = sends.filter(send => sendMatchesCounter(rule, send)).length;
  }
  return counts;
}

const SEND_COLUMNS = SEND_COUNTERS.map(rule => rule.column);
const COUNTER_COLUMNS = [...SEND_COLUMNS, ...REDEMPTION_COUNTER_COLUMNS];

/**
 * Counters are derived from campaign_sends and from redemptions of the
 * campaign's own promo codes, then written over the stored row. Both CTEs
 * aggregate without GROUP BY, so a campaign with no sends still gets a row
 * of zeros. The DO UPDATE only fires when a counter differs, so updated_at
 * is left alone on a no-op recompute.
 */
export const RECOMPUTE_SQL = `
  WITH send_counts AS (
    SELECT
      ${SEND_COUNTERS.map(sendCounterSql).join(',\n      ')}
    FROM campaign_sends
    WHERE campaign_id = $1
  ),
  redemption_counts AS (
    SELECT
      COUNT(r.id) AS total_redemptions,
      COALESCE(SUM(r.discount_applied_cents), 0) AS total_discount_cents
    FROM promo_code_redemptions r
    JOIN promo_codes pc ON pc.id = r.promo_code_id
    WHERE pc.campaign_id = $1
  )
  INSERT INTO campaign_metrics AS m (campaign_id, ${COUNTER_COLUMNS.join(', ')}, updated_at)
  SELECT
    $1, ${SEND_COLUMNS.map(column => `s.${column}`).join(', ')}, r.total_redemptions, r.total_discount_cents,
    NOW()
  FROM send_counts s CROSS JOIN redemption_counts r
  ON CONFLICT (campaign_id) DO UPDATE SET
    ${COUNTER_COLUMNS.map(column => `${column} = EXCLUDED.${column}`).join(',\n    ')},
    updated_at = NOW()
  WHERE (${COUNTER_COLUMNS.map(column => `m.${column}`).join(', ')})
    IS DISTINCT FROM (${COUNTER_COLUMNS.map(column => `EXCLUDED.${column}`).join(', ')})
`;

export class CampaignMetricsModel {
  constructor(private db: Queryable) {}

  async recompute(campaignId: string): Promise<void> {
    await this.db.query(RECOMPUTE_SQL, [campaignId]);
  }

  async findByCampaignId(campaignId: string): Promise<CampaignMetrics | null> {
    const result = await this.db.query<CampaignMetricsRow>(
      'SELECT * FROM campaign_metrics WHERE campaign_id = $1',
      [campaignId]
    );
    return result.rows[0] ? this.mapToMetrics(result.rows[0]) : null;
  }

  private mapToMetrics(row: CampaignMetricsRow): CampaignMetrics {
    return {
      campaignId: row.campaign_id,
      totalTargeted: toInt(row.total_targeted),
      totalSent: toInt(row.total_sent),
      totalDelivered: toInt(row.total_delivered),
      totalFailed: toInt(row.total_failed),
      totalBounced: toInt(row.total_bounced),
      totalOpened: toInt(row.total_opened),
      totalClicked: toInt(row.total_clicked),
      totalRedemptions: toInt(row.total_redemptions),
      totalDiscountCents: toInt(row.total_discount_cents),
      updatedAt: row.updated_at,
    };
  }
}
