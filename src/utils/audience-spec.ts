import {
  AudienceSpec,
  AudienceType,
  ComparisonOperator,
  CUSTOM_FILTER_FIELDS,
  CustomFilterCondition,
  CustomFilterField,
  StoredAudienceSpec,
} from '../types/audience.types';

/**
 * Column pair an audience is persisted as on `campaigns`.
 * The filter JSON uses snake_case keys.
 */
export interface AudienceColumns {
  audienceType: string;
  audienceFilter: Record<string, unknown>;
}

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isCustomFilterField(value: unknown): value is CustomFilterField {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CUSTOM_FILTER_FIELDS, value);
}

function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return typeof value === 'string' && COMPARISON_OPERATORS.some(op => op === value);
}

function parseCondition(raw: unknown): CustomFilterCondition | null {
  if (!isRecord(raw) || !isCustomFilterField(raw.field)) {
    return null;
  }

  const field = raw.field;
  if (raw.operator === 'is_null' || raw.operator === 'is_not_null') {
    return { field, operator: raw.operator };
  }

  if (isComparisonOperator(raw.operator) && (isFiniteNumber(raw.value) || typeof raw.value === 'string')) {
    return { field, operator: raw.operator, value: raw.value };
  }

  return null;
}

function optionalNumber(value: unknown): number | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  return isFiniteNumber(value) ? value : null;
}

/**
 * Rebuild the audience union from its stored columns. Anything that does not
 * parse, including types added by newer writers, comes back as `unsupported`.
 */
export function parseStoredAudience(audienceType: string, audienceFilter: unknown): StoredAudienceSpec {
  const unsupported: StoredAudienceSpec = { type: 'unsupported', storedType: audienceType };
  const filter = isRecord(audienceFilter) ? audienceFilter : {};

  switch (audienceType) {
    case AudienceType.ALL:
      return { type: AudienceType.ALL };

    case AudienceType.TAGGED: {
      const tagIds = filter.tag_ids;
      if (!Array.isArray(tagIds) || !tagIds.every((id): id is string => typeof id === 'string')) {
        return unsupported;
      }
      return { type: AudienceType.TAGGED, tagIds };
    }

    case AudienceType.INACTIVE_SINCE:
      return isFiniteNumber(filter.days) ? { type: AudienceType.INACTIVE_SINCE, days: filter.days } : unsupported;

    case AudienceType.WALLET_RANGE: {
      const minPoints = optionalNumber(filter.min_points);
      const maxPoints = optionalNumber(filter.max_points);
      if (minPoints === null || maxPoints === null) {
        return unsupported;
      }
      return { type: AudienceType.WALLET_RANGE, minPoints, maxPoints };
    }

    case AudienceType.CUSTOM_FILTER: {
      const rawConditions = filter.conditions;
      if (!Array.isArray(rawConditions)) {
        return unsupported;
      }
      const conditions: CustomFilterCondition[] = [];
      for (const raw of rawConditions) {
        const condition = parseCondition(raw);
        if (!condition) {
          return unsupported;
        }
        conditions.push(condition);
      }
      return { type: AudienceType.CUSTOM_FILTER, conditions };
    }

    case AudienceType.LOCATION_RADIUS:
      if (isFiniteNumber(filter.latitude) && isFiniteNumber(filter.longitude) && isFiniteNumber(filter.radius_km)) {
        return {
          type: AudienceType.LOCATION_RADIUS,
          latitude: filter.latitude,
          longitude: filter.longitude,
          radiusKm: filter.radius_km,
        };
      }
      return unsupported;

    default:
      return unsupported;
  }
}

export function serializeAudience(spec: AudienceSpec): AudienceColumns {
  switch (spec.type) {
    case AudienceType.ALL:
      return { audienceType: spec.type, audienceFilter: {} };
    case AudienceType.TAGGED:
      return { audienceType: spec.type, audienceFilter: { tag_ids: spec.tagIds } };
    case AudienceType.INACTIVE_SINCE:
      return { audienceType: spec.type, audienceFilter: { days: spec.days } };
    case AudienceType.WALLET_RANGE: {
      const audienceFilter: Record<string, unknown> = {};
      if (spec.minPoints !== undefined) audienceFilter.min_points = spec.minPoints;
      if (spec.maxPoints !== undefined) audienceFilter.max_points = spec.maxPoints;
      return { audienceType: spec.type, audienceFilter };
    }
    case AudienceType.CUSTOM_FILTER:
      return { audienceType: spec.type, audienceFilter: { conditions: spec.conditions } };
    case AudienceType.LOCATION_RADIUS:
      return {
        audienceType: spec.type,
        audienceFilter: { latitude: spec.latitude, longitude: spec.longitude, radius_km: spec.radiusKm },
      };
  }
}
