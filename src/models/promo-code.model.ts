import {
  DiscountType,
  ListPromoCodesFilters,
  PromoCode,
  PromoOrderType,
  PromoRedemption,
} from '../types';
import { toEnum, toInt } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';

type PromoCodeRow = {
  id: string;
  campaign_id: string | null;
  restaurant_id: string;
  code: string;
  discount_type: string;
  discount_value: number | string;
  min_spend_cents: number | string;
  max_uses: number | null;
  max_uses_per_customer: number;
  total_uses: number;
  order_type: string;
  valid_from: Date;
  valid_until: Date;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

type RedemptionRow = {
  id: string;
  promo_code_id: string;
  customer_id: string;
  restaurant_id: string;
  order_id: string | null;
  order_amount_cents: number | string;
  discount_applied_cents: number | string;
  redeemed_at: Date;
};

type CountRow = { count: string | number };

export interface CreatePromoCodeData {
  restaurantId: string;
  campaignId: string | null;
  code: string;
  discountType: DiscountType;
  discountValue: number;
  minSpendCents: number;
  maxUses: number | null;
  maxUsesPerCustomer: number;
  orderType: PromoOrderType;
  validFrom: Date;
  validUntil: Date;
}

export interface InsertRedemptionData {
  promoCodeId: string;
  customerId: string;
  restaurantId: string;
  orderId: string | null;
  orderAmountCents: number;
  discountAppliedCents: number;
}

export interface PromoUsageRow {
  promoCodeId: string;
  restaurantId: string;
  totalUses: number;
  redemptionCount: number;
  maxUses: number | null;
}

/** Storage-level guard on total_uses <= max_uses */
export const PROMO_USAGE_CHECK = 'promo_codes_usage_check';

const DISCOUNT_TYPES = Object.values(DiscountType);
const ORDER_TYPES = Object.values(PromoOrderType);

export class PromoCodeModel {
  constructor(private db: Queryable) {}

  async create(data: CreatePromoCodeData): Promise<PromoCode> {
    const query = `
      INSERT INTO promo_codes (
        restaurant_id, campaign_id, code, discount_type, discount_value,
        min_spend_cents, max_uses, max_uses_per_customer, order_type,
        valid_from, valid_until
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      RETURNING *
    `;
    const result = await this.db.query<PromoCodeRow>(query, [
      data.restaurantId,
      data.campaignId,
      data.code,
      data.discountType,
      data.discountValue,
      data.minSpendCents,
      data.maxUses,
      data.maxUsesPerCustomer,
      data.orderType,
      data.validFrom,
      data.validUntil,
    ]);
    return this.mapToPromoCode(result.rows[0]);
  }

  async findById(id: string, restaurantId: string): Promise<PromoCode | null> {
    const query = 'SELECT * FROM promo_codes WHERE id = $1 AND restaurant_id = $2';
    const result = await this.db.query<PromoCodeRow>(query, [id, restaurantId]);
    return result.rows[0] ? this.mapToPromoCode(result.rows[0]) : null;
  }

  /** `code` must already be upper-cased */
  async findByCode(code: string, restaurantId: string): Promise<PromoCode | null> {
    const query = 'SELECT * FROM promo_codes WHERE restaurant_id = $1 AND code = $2';
    const result = await this.db.query<PromoCodeRow>(query, [restaurantId, code]);
    return result.rows[0] ? this.mapToPromoCode(result.rows[0]) : null;
  }

  async codeExists(code: string, restaurantId: string): Promise<boolean> {
    const query = 'SELECT EXISTS(SELECT 1 FROM promo_codes WHERE restaurant_id = $1 AND code = $2) AS present';
    const result = await this.db.query<{ present: boolean }>(query, [restaurantId, code]);
    return result.rows[0]?.present === true;
  }

  /**
   * Exclusive row lock held until the surrounding transaction ends.
   * Concurrent redeemers of the same code queue here.
   */
  async lockForRedemption(id: string, restaurantId: string): Promise<PromoCode | null> {
    const query = 'SELECT * FROM promo_codes WHERE id = $1 AND restaurant_id = $2 FOR UPDATE';
    const result = await this.db.query<PromoCodeRow>(query, [id, restaurantId]);
    return result.rows[0] ? this.mapToPromoCode(result.rows[0]) : null;
  }

  async setLockTimeout(timeout: string): Promise<void> {
    await this.db.query("SELECT set_config('lock_timeout', $1, true)", [timeout]);
  }

  async countCustomerRedemptions(promoCodeId: string, customerId: string): Promise<number> {
    const query = 'SELECT COUNT(*) AS count FROM promo_code_redemptions WHERE promo_code_id = $1 AND customer_id = $2';
    const result = await this.db.query<CountRow>(query, [promoCodeId, customerId]);
    return toInt(result.rows[0]?.count);
  }

  async countRedemptions(promoCodeId: string): Promise<number> {
    const query = 'SELECT COUNT(*) AS count FROM promo_code_redemptions WHERE promo_code_id = $1';
    const result = await this.db.query<CountRow>(query, [promoCodeId]);
    return toInt(result.rows[0]?.count);
  }

  async insertRedemption(data: InsertRedemptionData): Promise<PromoRedemption> {
    const query = `
      INSERT INTO promo_code_redemptions (
        promo_code_id, customer_id, restaurant_id, order_id,
        order_amount_cents, discount_applied_cents
      )
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING *
    `;
    const result = await this.db.query<RedemptionRow>(query, [
      data.promoCodeId,
      data.customerId,
      data.restaurantId,
      data.orderId,
      data.orderAmountCents,
      data.discountAppliedCents,
    ]);
    return this.mapToRedemption(result.rows[0]);
  }

  async incrementTotalUses(id: string): Promise<void> {
    await this.db.query('UPDATE promo_codes SET total_uses = total_uses + 1, updated_at = NOW() WHERE id = $1', [id]);
  }

  async list(restaurantId: string, filters: ListPromoCodesFilters): Promise<PromoCode[]> {
    const conditions = ['restaurant_id = $1'];
    const values: unknown[] = [restaurantId];
    let paramIndex = 2;

    if (filters.campaignId) {
      conditions.push(`campaign_id = $${paramIndex++}`);
      values.push(filters.campaignId);
    }
    if (filters.isActive !== undefined) {
      conditions.push(`is_active = $${paramIndex++}`);
      values.push(filters.isActive);
    }

    const query = `
      SELECT * FROM promo_codes
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      LIMIT $${paramIndex++} OFFSET $${paramIndex}
    `;
    values.push(filters.limit ?? 50, filters.offset ?? 0);

    const result = await this.db.query<PromoCodeRow>(query, values);
    return result.rows.map(row => this.mapToPromoCode(row));
  }

  async deactivate(id: string, restaurantId: string): Promise<PromoCode | null> {
    const query = `
      UPDATE promo_codes
      SET is_active = FALSE, updated_at = NOW()
      WHERE id = $1 AND restaurant_id = $2
      RETURNING *
    `;
    const result = await this.db.query<PromoCodeRow>(query, [id, restaurantId]);
    return result.rows[0] ? this.mapToPromoCode(result.rows[0]) : null;
  }

  async listRedemptions(
    promoCodeId: string,
    restaurantId: string,
    limit: number,
    offset: number
  ): Promise<PromoRedemption[]> {
    const query = `
      SELECT * FROM promo_code_redemptions
      WHERE promo_code_id = $1 AND restaurant_id = $2
      ORDER BY redeemed_at DESC
      LIMIT $3 OFFSET $4
    `;
    const result = await this.db.query<RedemptionRow>(query, [promoCodeId, restaurantId, limit, offset]);
    return result.rows.map(row => this.mapToRedemption(row));
  }

  /**
   * Codes whose cached usage counter disagrees with the redemption table
   * or exceeds the global cap.
   */
  async findUsageDrift(limit: number): Promise<PromoUsageRow[]> {
    const query = `
      SELECT pc.id, pc.restaurant_id, pc.total_uses, pc.max_uses, COUNT(r.id) AS redemption_count
      FROM promo_codes pc
      LEFT JOIN promo_code_redemptions r ON r.promo_code_id = pc.id
      GROUP BY pc.id
      HAVING pc.total_uses <> COUNT(r.id)
         OR (pc.max_uses IS NOT NULL AND pc.total_uses > pc.max_uses)
      LIMIT $1
    `;
    const result = await this.db.query<{
      id: string;
      restaurant_id: string;
      total_uses: number;
      max_uses: number | null;
      redemption_count: string | number;
    }>(query, [limit]);

    return result.rows.map(row => ({
      promoCodeId: row.id,
      restaurantId: row.restaurant_id,
      totalUses: row.total_uses,
      redemptionCount: toInt(row.redemption_count),
      maxUses: row.max_uses,
    }));
  }

  private mapToPromoCode(row: PromoCodeRow): PromoCode {
    return {
      id: row.id,
      campaignId: row.campaign_id,
      restaurantId: row.restaurant_id,
      code: row.code,
      discountType: toEnum(DISCOUNT_TYPES, row.discount_type, 'promo_codes.discount_type'),
      discountValue: Number(row.discount_value),
      minSpendCents: toInt(row.min_spend_cents),
      maxUses: row.max_uses,
      maxUsesPerCustomer: row.max_uses_per_customer,
      totalUses: row.total_uses,
      orderType: toEnum(ORDER_TYPES, row.order_type, 'promo_codes.order_type'),
      validFrom: row.valid_from,
      validUntil: row.valid_until,
      isActive: row.is_active,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private mapToRedemption(row: RedemptionRow): PromoRedemption {
    return {
      id: row.id,
      promoCodeId: row.promo_code_id,
      customerId: row.customer_id,
      restaurantId: row.restaurant_id,
      orderId: row.order_id,
      orderAmountCents: toInt(row.order_amount_cents),
      discountAppliedCents: toInt(row.discount_applied_cents),
      redeemedAt: row.redeemed_at,
    };
  }
}
