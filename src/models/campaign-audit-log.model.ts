import { CampaignAuditAction, CampaignAuditEntry, CreateAuditEntryParams } from '../types';
import { toEnum, toRecord } from '../utils/row-parsers';
import { Queryable } from '../utils/transaction';

type CampaignAuditRow = {
  id: string;
  campaign_id: string;
  action: string;
  performed_by: string;
  changes: unknown;
  created_at: Date;
};

const AUDIT_ACTIONS = Object.values(CampaignAuditAction);

export class CampaignAuditLogModel {
  constructor(private db: Queryable) {}

  async create(params: CreateAuditEntryParams): Promise<CampaignAuditEntry> {
    const query = `
      INSERT INTO campaign_audit_log (campaign_id, action, performed_by, changes)
      VALUES ($1, $2, $3, $4)
      RETURNING *
    `;
    const result = await this.db.query<CampaignAuditRow>(query, [
      params.campaignId,
      params.action,
      params.performedBy,
      JSON.stringify(params.changes ?? {}),
    ]);
    return this.mapToEntry(result.rows[0]);
  }

  async findByCampaignId(campaignId: string, limit: number, offset: number): Promise<CampaignAuditEntry[]> {
    const query = `
      SELECT * FROM campaign_audit_log
      WHERE campaign_id = $1
      ORDER BY created_at ASC, id ASC
      LIMIT $2 OFFSET $3
    `;
    const result = await this.db.query<CampaignAuditRow>(query, [campaignId, limit, offset]);
    return result.rows.map(row => this.mapToEntry(row));
  }

  private mapToEntry(row: CampaignAuditRow): CampaignAuditEntry {
    return {
      id: row.id,
      campaignId: row.campaign_id,
      action: toEnum(AUDIT_ACTIONS, row.action, 'campaign_audit_log.action'),
      performedBy: row.performed_by,
      changes: toRecord(row.changes),
      createdAt: row.created_at,
    };
  }
}
