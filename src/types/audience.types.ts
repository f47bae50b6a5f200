export enum AudienceType {
  ALL = 'all',
  TAGGED = 'tagged',
  INACTIVE_SINCE = 'inactive_since',
  WALLET_RANGE = 'wallet_range',
  CUSTOM_FILTER = 'custom_filter',
  LOCATION_RADIUS = 'location_radius',
}

/**
 * Customer columns a custom filter may reference.
 * Keys are the public field names, values the SQL column on alias `c`.
 */
export const CUSTOM_FILTER_FIELDS = {
  totalPoints: 'c.total_points',
  visitCount: 'c.visit_count',
  totalSpentCents: 'c.total_spent_cents',
  lastVisit: 'c.last_visit',
  createdAt: 'c.created_at',
} as const;

export type CustomFilterField = keyof typeof CUSTOM_FILTER_FIELDS;

/** Timestamp columns; the other filter fields are integers */
export const DATE_FILTER_FIELDS: CustomFilterField[] = ['lastVisit', 'createdAt'];

export type ComparisonOperator = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte';

export type CustomFilterCondition =
  | { field: CustomFilterField; operator: ComparisonOperator; value: number | string }
  | { field: CustomFilterField; operator: 'is_null' | 'is_not_null' };

export interface AllAudience {
  type: AudienceType.ALL;
}

export interface TaggedAudience {
  type: AudienceType.TAGGED;
  tagIds: string[];
}

export interface InactiveSinceAudience {
  type: AudienceType.INACTIVE_SINCE;
  days: number;
}

export interface WalletRangeAudience {
  type: AudienceType.WALLET_RANGE;
  minPoints?: number;
  maxPoints?: number;
}

export interface CustomFilterAudience {
  type: AudienceType.CUSTOM_FILTER;
  conditions: CustomFilterCondition[];
}

export interface LocationRadiusAudience {
  type: AudienceType.LOCATION_RADIUS;
  latitude: number;
  longitude: number;
  radiusKm: number;
}

/**
 * A stored audience whose type this build does not recognize.
 * Resolves to an empty audience.
 */
export interface UnsupportedAudience {
  type: 'unsupported';
  storedType: string;
}

export type AudienceSpec =
  | AllAudience
  | TaggedAudience
  | InactiveSinceAudience
  | WalletRangeAudience
  | CustomFilterAudience
  | LocationRadiusAudience;

export type StoredAudienceSpec = AudienceSpec | UnsupportedAudience;

export interface ChannelConsent {
  push: boolean;
  email: boolean;
  sms: boolean;
  whatsapp: boolean;
}

export interface AudienceMember {
  customerId: string;
  name: string | null;
  email: string | null;
  phone: string | null;
  consent: ChannelConsent;
}

export interface AudienceFilter {
  clause: string;
  params: unknown[];
}

export interface ResolveMembersOptions {
  limit?: number;
  afterCustomerId?: string;
}
