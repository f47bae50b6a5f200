import {
  AbVariant,
  CampaignSend,
  Channel,
  CreateSendRequest,
  ListSendsFilters,
  SendStatus,
  TERMINAL_SEND_STATUSES,
} from '../types';
import { toEnum, toInt, toNullableEnum } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';

type CampaignSendRow = {
  id: string;
  campaign_id: string;
  customer_id: string;
  channel_used: string;
  status: string;
  sent_at: Date | null;
  delivered_at: Date | null;
  opened_at: Date | null;
  clicked_at: Date | null;
  error_message: string | null;
  promo_code_assigned: string | null;
  ab_variant: string | null;
  created_at: Date;
  updated_at: Date;
};

export interface SendStatusUpdate {
  status: SendStatus;
  sentAt: Date | null;
  deliveredAt: Date | null;
  errorMessage: string | null;
}

const CHANNELS = Object.values(Channel);
const SEND_STATUSES = Object.values(SendStatus);
const AB_VARIANTS: readonly AbVariant[] = ['A', 'B'];

export class CampaignSendModel {
  constructor(private db: Queryable) {}

  /**
   * Insert the recipient row, or do nothing when the campaign already has one
   * for this customer. Returns null in the second case.
   */
  async insertIfAbsent(data: CreateSendRequest): Promise<CampaignSend | null> {
    const query = `
      INSERT INTO campaign_sends (
        campaign_id, customer_id, channel_used, status, promo_code_assigned, ab_variant
      )
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (campaign_id, customer_id) DO NOTHING
      RETURNING *
    `;
    const result = await this.db.query<CampaignSendRow>(query, [
      data.campaignId,
      data.customerId,
      data.channel,
      SendStatus.PENDING,
      data.promoCodeAssigned ?? null,
      data.abVariant ?? null,
    ]);
    return result.rows[0] ? this.mapToSend(result.rows[0]) : null;
  }

  async findByCampaignAndCustomer(campaignId: string, customerId: string): Promise<CampaignSend | null> {
    const query = 'SELECT * FROM campaign_sends WHERE campaign_id = $1 AND customer_id = $2';
    const result = await this.db.query<CampaignSendRow>(query, [campaignId, customerId]);
    return result.rows[0] ? this.mapToSend(result.rows[0]) : null;
  }

  /**
   * Sends are reached through their campaign so a restaurant can only
   * touch its own rows.
   */
  async findByIdForUpdate(sendId: string, restaurantId: string): Promise<CampaignSend | null> {
    const query = `
      SELECT cs.* FROM campaign_sends cs
      JOIN campaigns c ON c.id = cs.campaign_id
      WHERE cs.id = $1 AND c.restaurant_id = $2
      FOR UPDATE OF cs
    `;
    const result = await this.db.query<CampaignSendRow>(query, [sendId, restaurantId]);
    return result.rows[0] ? this.mapToSend(result.rows[0]) : null;
  }

  async updateStatus(sendId: string, update: SendStatusUpdate): Promise<CampaignSend> {
    const query = `
      UPDATE campaign_sends
      SET status = $2,
          sent_at = $3,
          delivered_at = $4,
          error_message = $5,
          updated_at = NOW()
      WHERE id = $1
      RETURNING *
    `;
    const result = await this.db.query<CampaignSendRow>(query, [
      sendId,
      update.status,
      update.sentAt,
      update.deliveredAt,
      update.errorMessage,
    ]);
    return this.mapToSend(result.rows[0]);
  }

  async recordOpen(sendId: string, occurredAt: Date): Promise<CampaignSend> {
    const query = `
      UPDATE campaign_sends
      SET opened_at = COALESCE(opened_at, $2), updated_at = NOW()
      WHERE id = $1
      RETURNING *
    `;
    const result = await this.db.query<CampaignSendRow>(query, [sendId, occurredAt]);
    return this.mapToSend(result.rows[0]);
  }

  async recordClick(sendId: string, occurredAt: Date): Promise<CampaignSend> {
    const query = `
      UPDATE campaign_sends
      SET clicked_at = COALESCE(clicked_at, $2),
          opened_at = COALESCE(opened_at, $2),
          updated_at = NOW()
      WHERE id = $1
      RETURNING *
    `;
    const result = await this.db.query<CampaignSendRow>(query, [sendId, occurredAt]);
    return this.mapToSend(result.rows[0]);
  }

  async listByCampaign(campaignId: string, filters: ListSendsFilters): Promise<CampaignSend[]> {
    const values: unknown[] = [campaignId];
    let query = 'SELECT * FROM campaign_sends WHERE campaign_id = $1';

    if (filters.status) {
      values.push(filters.status);
      query += ` AND status = $${values.length}`;
    }

    values.push(filters.limit ?? 50);
    query += ` ORDER BY created_at ASC, id ASC LIMIT $${values.length}`;
    values.push(filters.offset ?? 0);
    query += ` OFFSET $${values.length}`;

    const result = await this.db.query<CampaignSendRow>(query, values);
    return result.rows.map(row => this.mapToSend(row));
  }

  async countNonTerminal(campaignId: string): Promise<number> {
    const query = 'SELECT COUNT(*) AS count FROM campaign_sends WHERE campaign_id = $1 AND NOT (status = ANY($2))';
    const result = await this.db.query<{ count: string | number }>(query, [campaignId, TERMINAL_SEND_STATUSES]);
    return toInt(result.rows[0]?.count);
  }

  private mapToSend(row: CampaignSendRow): CampaignSend {
    return {
      id: row.id,
      campaignId: row.campaign_id,
      customerId: row.customer_id,
      channelUsed: toEnum(CHANNELS, row.channel_used, 'campaign_sends.channel_used'),
      status: toEnum(SEND_STATUSES, row.status, 'campaign_sends.status'),
      sentAt: row.sent_at,
      deliveredAt: row.delivered_at,
      openedAt: row.opened_at,
      clickedAt: row.clicked_at,
      errorMessage: row.error_message,
      promoCodeAssigned: row.promo_code_assigned,
      abVariant: toNullableEnum(AB_VARIANTS, row.ab_variant, 'campaign_sends.ab_variant'),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
