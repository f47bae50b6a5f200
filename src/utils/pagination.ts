import { campaignConfig } from '../config/campaign.config';

export interface Pagination {
  limit: number;
  offset: number;
}

export function resolvePagination(limit?: number, offset?: number): Pagination {
  const { defaultLimit, maxLimit } = campaignConfig.pagination;
  return {
    limit: Math.min(Math.max(limit ?? defaultLimit, 1), maxLimit),
    offset: Math.max(offset ?? 0, 0),
  };
}
