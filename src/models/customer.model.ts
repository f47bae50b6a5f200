import { AudienceFilter, AudienceMember } from '../types';
import { toInt } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';

type AudienceMemberRow = {
  id: string;
  name: string | null;
  email: string | null;
  phone: string | null;
  consent_push: boolean;
  consent_email: boolean;
  consent_sms: boolean;
  consent_whatsapp: boolean;
};

/**
 * Read-only access to the customer base owned by the loyalty subsystem.
 * Filters are compiled by buildAudienceFilter with `$1` reserved for the
 * restaurant id.
 */
export class CustomerModel {
  constructor(private db: Queryable) {}

  async hasCustomers(restaurantId: string): Promise<boolean> {
    const result = await this.db.query<{ present: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM customers WHERE restaurant_id = $1) AS present',
      [restaurantId]
    );
    return result.rows[0]?.present === true;
  }

  async countMatching(restaurantId: string, filter: AudienceFilter): Promise<number> {
    const query = `SELECT COUNT(*) AS count FROM customers c WHERE c.restaurant_id = $1 AND ${filter.clause}`;
    const result = await this.db.query<{ count: string | number }>(query, [restaurantId, ...filter.params]);
    return toInt(result.rows[0]?.count);
  }

  /**
   * Keyset page ordered by customer id.
   */
  async findMatching(
    restaurantId: string,
    filter: AudienceFilter,
    limit: number,
    afterCustomerId?: string
  ): Promise<AudienceMember[]> {
    const values: unknown[] = [restaurantId, ...filter.params];
    let query = `
      SELECT c.id, c.name, c.email, c.phone,
             c.consent_push, c.consent_email, c.consent_sms, c.consent_whatsapp
      FROM customers c
      WHERE c.restaurant_id = $1 AND ${filter.clause}`;

    if (afterCustomerId) {
      values.push(afterCustomerId);
      query += ` AND c.id > $${values.length}`;
    }

    values.push(limit);
    query += ` ORDER BY c.id ASC LIMIT $${values.length}`;

    const result = await this.db.query<AudienceMemberRow>(query, values);
    return result.rows.map(row => ({
      customerId: row.id,
      name: row.name,
      email: row.email,
      phone: row.phone,
      consent: {
        push: row.consent_push,
        email: row.consent_email,
        sms: row.consent_sms,
        whatsapp: row.consent_whatsapp,
      },
    }));
  }
}
