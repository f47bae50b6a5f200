export enum CampaignAuditAction {
  CREATED = 'created',
  EDITED = 'edited',
  SCHEDULED = 'scheduled',
  DISPATCHED = 'dispatched',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  PAUSED = 'paused',
  RESUMED = 'resumed',
  DELETED = 'deleted',
}

export const SYSTEM_ACTOR = 'system';

export interface CampaignAuditEntry {
  id: string;
  campaignId: string;
  action: CampaignAuditAction;
  performedBy: string;
  changes: Record<string, unknown>;
  createdAt: Date;
}

export interface CreateAuditEntryParams {
  campaignId: string;
  action: CampaignAuditAction;
  performedBy: string;
  changes?: Record<string, unknown>;
}
