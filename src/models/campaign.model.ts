import {
  AbTestConfig,
  AudienceSpec,
  Campaign,
  CampaignStatus,
  CampaignType,
  Channel,
  ListCampaignsFilters,
  PromoTemplate,
  RecurringConfig,
} from '../types';
import { DiscountType, PromoOrderType } from '../types/promo-code.types';
import { parseStoredAudience, serializeAudience } from '../utils/audience-spec';
import { toEnum, toNullableEnum, toInt } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';
import { logger } from '../utils/logger';

type CampaignRow = {
  id: string;
  restaurant_id: string;
  name: string;
  description: string | null;
  type: string;
  status: string;
  primary_channel: string;
  fallback_channel: string | null;
  audience_type: string;
  audience_filter: unknown;
  estimated_audience_size: number | string;
  message_subject: string | null;
  message_template: string;
  scheduled_at: Date | null;
  recurring_config: unknown;
  ab_test_config: unknown;
  promo_template: unknown;
  created_by: string | null;
  created_at: Date;
  updated_at: Date;
  sent_at: Date | null;
  dispatch_completed_at: Date | null;
};

export interface CampaignRef {
  id: string;
  restaurantId: string;
}

export interface CreateCampaignData {
  restaurantId: string;
  name: string;
  description: string | null;
  type: CampaignType;
  primaryChannel: Channel;
  fallbackChannel: Channel | null;
  audience: AudienceSpec;
  estimatedAudienceSize: number;
  messageSubject: string | null;
  messageTemplate: string;
  recurringConfig: RecurringConfig | null;
  abTestConfig: AbTestConfig | null;
  promoTemplate: PromoTemplate | null;
  createdBy: string | null;
}

export type UpdateCampaignData = Partial<Omit<CreateCampaignData, 'restaurantId' | 'createdBy'>>;

const CAMPAIGN_STATUSES = Object.values(CampaignStatus);
const CAMPAIGN_TYPES = Object.values(CampaignType);
const CHANNELS = Object.values(Channel);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseAbTestConfig(value: unknown): AbTestConfig | null {
  if (isRecord(value) && typeof value.splitPercent === 'number') {
    return { splitPercent: value.splitPercent };
  }
  return null;
}

function parseRecurringConfig(value: unknown): RecurringConfig | null {
  if (!isRecord(value)) {
    return null;
  }
  const frequency = value.frequency;
  if (frequency !== 'daily' && frequency !== 'weekly' && frequency !== 'monthly') {
    return null;
  }
  const config: RecurringConfig = { frequency };
  if (typeof value.interval === 'number') config.interval = value.interval;
  if (typeof value.endsAt === 'string') config.endsAt = value.endsAt;
  return config;
}

function parsePromoTemplate(value: unknown): PromoTemplate | null {
  if (!isRecord(value)) {
    return null;
  }
  if (
    typeof value.prefix !== 'string' ||
    typeof value.discountValue !== 'number' ||
    typeof value.validDays !== 'number'
  ) {
    return null;
  }
  const template: PromoTemplate = {
    prefix: value.prefix,
    discountType: toEnum(Object.values(DiscountType), value.discountType, 'campaigns.promo_template.discountType'),
    discountValue: value.discountValue,
    validDays: value.validDays,
  };
  if (typeof value.minSpendCents === 'number') template.minSpendCents = value.minSpendCents;
  if (value.orderType !== undefined) {
    template.orderType = toEnum(Object.values(PromoOrderType), value.orderType, 'campaigns.promo_template.orderType');
  }
  return template;
}

function jsonOrNull(value: object | null): string | null {
  return value === null ? null : JSON.stringify(value);
}

export class CampaignModel {
  constructor(private db: Queryable) {}

  async create(data: CreateCampaignData): Promise<Campaign> {
    const audience = serializeAudience(data.audience);
    const query = `
      INSERT INTO campaigns (
        restaurant_id, name, description, type, status,
        primary_channel, fallback_channel, audience_type, audience_filter,
        estimated_audience_size, message_subject, message_template,
        recurring_config, ab_test_config, promo_template, created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
      RETURNING *
    `;

    const values = [
      data.restaurantId,
      data.name,
      data.description,
      data.type,
      CampaignStatus.DRAFT,
      data.primaryChannel,
      data.fallbackChannel,
      audience.audienceType,
      JSON.stringify(audience.audienceFilter),
      data.estimatedAudienceSize,
      data.messageSubject,
      data.messageTemplate,
      jsonOrNull(data.recurringConfig),
      jsonOrNull(data.abTestConfig),
      jsonOrNull(data.promoTemplate),
      data.createdBy,
    ];

    try {
      const result = await this.db.query<CampaignRow>(query, values);
      return this.mapToCampaign(result.rows[0]);
    } catch (error) {
      logger.error({ err: error, restaurantId: data.restaurantId }, 'Error creating campaign');
      throw error;
    }
  }

  async findById(id: string, restaurantId: string): Promise<Campaign | null> {
    const query = 'SELECT * FROM campaigns WHERE id = $1 AND restaurant_id = $2';
    const result = await this.db.query<CampaignRow>(query, [id, restaurantId]);
    return result.rows[0] ? this.mapToCampaign(result.rows[0]) : null;
  }

  /**
   * Row lock for lifecycle transitions. Must run inside a transaction.
   */
  async findByIdForUpdate(id: string, restaurantId: string): Promise<Campaign | null> {
    const query = 'SELECT * FROM campaigns WHERE id = $1 AND restaurant_id = $2 FOR UPDATE';
    const result = await this.db.query<CampaignRow>(query, [id, restaurantId]);
    return result.rows[0] ? this.mapToCampaign(result.rows[0]) : null;
  }

  /**
   * Shared lock: send rows may be written concurrently with each other,
   * but not with a status change.
   */
  async findStatusForShare(id: string, restaurantId: string): Promise<CampaignStatus | null> {
    const query = 'SELECT status FROM campaigns WHERE id = $1 AND restaurant_id = $2 FOR SHARE';
    const result = await this.db.query<{ status: string }>(query, [id, restaurantId]);
    return result.rows[0] ? toEnum(CAMPAIGN_STATUSES, result.rows[0].status, 'campaigns.status') : null;
  }

  async list(restaurantId: string, filters: ListCampaignsFilters): Promise<Campaign[]> {
    const conditions = ['restaurant_id = $1'];
    const values: unknown[] = [restaurantId];
    let paramIndex = 2;

    if (filters.status) {
      conditions.push(`status = $${paramIndex++}`);
      values.push(filters.status);
    }
    if (filters.type) {
      conditions.push(`type = $${paramIndex++}`);
      values.push(filters.type);
    }

    const query = `
      SELECT * FROM campaigns
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      LIMIT $${paramIndex++} OFFSET $${paramIndex}
    `;
    values.push(filters.limit ?? 50, filters.offset ?? 0);

    const result = await this.db.query<CampaignRow>(query, values);
    return result.rows.map(row => this.mapToCampaign(row));
  }

  async update(id: string, restaurantId: string, data: UpdateCampaignData): Promise<Campaign | null> {
    const fields: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 3;

    const set = (column: string, value: unknown) => {
      fields.push(`${column} = $${paramIndex++}`);
      values.push(value);
    };

    if (data.name !== undefined) set('name', data.name);
    if (data.description !== undefined) set('description', data.description);
    if (data.type !== undefined) set('type', data.type);
    if (data.primaryChannel !== undefined) set('primary_channel', data.primaryChannel);
    if (data.fallbackChannel !== undefined) set('fallback_channel', data.fallbackChannel);
    if (data.audience !== undefined) {
      const audience = serializeAudience(data.audience);
      set('audience_type', audience.audienceType);
      set('audience_filter', JSON.stringify(audience.audienceFilter));
    }
    if (data.estimatedAudienceSize !== undefined) set('estimated_audience_size', data.estimatedAudienceSize);
    if (data.messageSubject !== undefined) set('message_subject', data.messageSubject);
    if (data.messageTemplate !== undefined) set('message_template', data.messageTemplate);
    if (data.recurringConfig !== undefined) set('recurring_config', jsonOrNull(data.recurringConfig));
    if (data.abTestConfig !== undefined) set('ab_test_config', jsonOrNull(data.abTestConfig));
    if (data.promoTemplate !== undefined) set('promo_template', jsonOrNull(data.promoTemplate));

    if (fields.length === 0) {
      return this.findById(id, restaurantId);
    }

    const query = `
      UPDATE campaigns
      SET ${fields.join(', ')}, updated_at = NOW()
      WHERE id = $1 AND restaurant_id = $2
      RETURNING *
    `;

    try {
      const result = await this.db.query<CampaignRow>(query, [id, restaurantId, ...values]);
      return result.rows[0] ? this.mapToCampaign(result.rows[0]) : null;
    } catch (error) {
      logger.error({ err: error, campaignId: id }, 'Error updating campaign');
      throw error;
    }
  }

  /**
   * Entering sending starts a new fan-out, so the dispatch marker is cleared.
   */
  async updateStatus(
    id: string,
    restaurantId: string,
    status: CampaignStatus,
    timestamps: { scheduledAt?: Date; sentAt?: Date } = {}
  ): Promise<Campaign> {
    const query = `
      UPDATE campaigns
      SET status = $3,
          scheduled_at = COALESCE($4, scheduled_at),
          sent_at = COALESCE($5, sent_at),
          dispatch_completed_at = CASE WHEN $6::boolean THEN NULL ELSE dispatch_completed_at END,
          updated_at = NOW()
      WHERE id = $1 AND restaurant_id = $2
      RETURNING *
    `;
    const result = await this.db.query<CampaignRow>(query, [
      id,
      restaurantId,
      status,
      timestamps.scheduledAt ?? null,
      timestamps.sentAt ?? null,
      status === CampaignStatus.SENDING,
    ]);
    return this.mapToCampaign(result.rows[0]);
  }

  /**
   * Only a campaign still sending takes the marker; a pause that landed after
   * the last row leaves it unset and resume re-runs the fan-out.
   */
  async markDispatchCompleted(id: string, restaurantId: string, completedAt: Date): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE campaigns SET dispatch_completed_at = $3, updated_at = NOW()
       WHERE id = $1 AND restaurant_id = $2 AND status = $4`,
      [id, restaurantId, completedAt, CampaignStatus.SENDING]
    );
    return (result.rowCount ?? 0) > 0;
  }

  /** Keeps a long fan-out from looking stalled */
  async touch(id: string, restaurantId: string): Promise<void> {
    await this.db.query('UPDATE campaigns SET updated_at = NOW() WHERE id = $1 AND restaurant_id = $2', [
      id,
      restaurantId,
    ]);
  }

  async updateEstimatedAudienceSize(id: string, restaurantId: string, size: number): Promise<void> {
    await this.db.query(
      'UPDATE campaigns SET estimated_audience_size = $3, updated_at = NOW() WHERE id = $1 AND restaurant_id = $2',
      [id, restaurantId, size]
    );
  }

  async delete(id: string, restaurantId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM campaigns WHERE id = $1 AND restaurant_id = $2', [
      id,
      restaurantId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Scheduled campaigns whose time has come, across all restaurants.
   * Dispatch re-checks the status under the row lock.
   */
  async findDueScheduled(now: Date, limit: number): Promise<CampaignRef[]> {
    const query = `
      SELECT id, restaurant_id FROM campaigns
      WHERE status = $1 AND scheduled_at <= $2
      ORDER BY scheduled_at ASC
      LIMIT $3
    `;
    const result = await this.db.query<{ id: string; restaurant_id: string }>(query, [
      CampaignStatus.SCHEDULED,
      now,
      limit,
    ]);
    return result.rows.map(row => ({ id: row.id, restaurantId: row.restaurant_id }));
  }

  /**
   * Sending campaigns whose fan-out never finished and has not been touched
   * since `olderThan`: the process running it died or the fan-out failed.
   */
  async findStalledDispatches(olderThan: Date, limit: number): Promise<CampaignRef[]> {
    const query = `
      SELECT id, restaurant_id FROM campaigns
      WHERE status = $1 AND dispatch_completed_at IS NULL AND updated_at <= $2
      ORDER BY updated_at ASC
      LIMIT $3
    `;
    const result = await this.db.query<{ id: string; restaurant_id: string }>(query, [
      CampaignStatus.SENDING,
      olderThan,
      limit,
    ]);
    return result.rows.map(row => ({ id: row.id, restaurantId: row.restaurant_id }));
  }

  async findByStatuses(statuses: CampaignStatus[], limit: number): Promise<CampaignRef[]> {
    const query = `
      SELECT id, restaurant_id FROM campaigns
      WHERE status = ANY($1)
      ORDER BY updated_at ASC
      LIMIT $2
    `;
    const result = await this.db.query<{ id: string; restaurant_id: string }>(query, [statuses, limit]);
    return result.rows.map(row => ({ id: row.id, restaurantId: row.restaurant_id }));
  }

  private mapToCampaign(row: CampaignRow): Campaign {
    return {
      id: row.id,
      restaurantId: row.restaurant_id,
      name: row.name,
      description: row.description,
      type: toEnum(CAMPAIGN_TYPES, row.type, 'campaigns.type'),
      status: toEnum(CAMPAIGN_STATUSES, row.status, 'campaigns.status'),
      primaryChannel: toEnum(CHANNELS, row.primary_channel, 'campaigns.primary_channel'),
      fallbackChannel: toNullableEnum(CHANNELS, row.fallback_channel, 'campaigns.fallback_channel'),
      audience: parseStoredAudience(row.audience_type, row.audience_filter),
      estimatedAudienceSize: toInt(row.estimated_audience_size),
      messageSubject: row.message_subject,
      messageTemplate: row.message_template,
      scheduledAt: row.scheduled_at,
      recurringConfig: parseRecurringConfig(row.recurring_config),
      abTestConfig: parseAbTestConfig(row.ab_test_config),
      promoTemplate: parsePromoTemplate(row.promo_template),
      createdBy: row.created_by,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      sentAt: row.sent_at,
      dispatchCompletedAt: row.dispatch_completed_at,
    };
  }
}
