import {
  AudienceFilter,
  AudienceType,
  ComparisonOperator,
  CUSTOM_FILTER_FIELDS,
  CustomFilterCondition,
  StoredAudienceSpec,
} from '../types/audience.types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const SQL_OPERATORS: Record<ComparisonOperator, string> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

class PlaceholderCounter {
  readonly params: unknown[] = [];

  constructor(private next: number) {}

  add(value: unknown): string {
    this.params.push(value);
    return `$${this.next++}`;
  }
}

function compileCondition(condition: CustomFilterCondition, placeholders: PlaceholderCounter): string {
  const column = CUSTOM_FILTER_FIELDS[condition.field];

  switch (condition.operator) {
    case 'is_null':
      return `${column} IS NULL`;
    case 'is_not_null':
      return `${column} IS NOT NULL`;
    default:
      return `${column} ${SQL_OPERATORS[condition.operator]} ${placeholders.add(condition.value)}`;
  }
}

/**
 * Compile an audience into a SQL predicate over the `customers` table aliased `c`.
 *
 * Placeholders are numbered from `startIndex` so the caller can bind its own
 * parameters (the restaurant id) first. Returns null when the audience can
 * match nobody: an empty tag set, an inverted wallet range, a location radius
 * (not evaluated yet) or a stored type this build does not know.
 */
export function buildAudienceFilter(
  spec: StoredAudienceSpec,
  now: Date,
  startIndex = 2
): AudienceFilter | null {
  const placeholders = new PlaceholderCounter(startIndex);

  switch (spec.type) {
    case AudienceType.ALL:
      return { clause: 'TRUE', params: [] };

    case AudienceType.TAGGED: {
      const tagIds = Array.from(new Set(spec.tagIds));
      if (tagIds.length === 0) {
        return null;
      }
      const clause =
        'EXISTS (SELECT 1 FROM customer_tag_assignments cta ' +
        'JOIN customer_tags ct ON ct.id = cta.tag_id ' +
        'WHERE cta.customer_id = c.id AND ct.restaurant_id = c.restaurant_id ' +
        `AND cta.tag_id = ANY(${placeholders.add(tagIds)}::uuid[]))`;
      return { clause, params: placeholders.params };
    }

    case AudienceType.INACTIVE_SINCE: {
      // never-visited customers count as maximally inactive
      const cutoff = new Date(now.getTime() - spec.days * MS_PER_DAY);
      const clause = `(c.last_visit IS NULL OR c.last_visit < ${placeholders.add(cutoff)})`;
      return { clause, params: placeholders.params };
    }

    case AudienceType.WALLET_RANGE: {
      const minPoints = spec.minPoints ?? 0;
      if (spec.maxPoints !== undefined && spec.maxPoints < minPoints) {
        return null;
      }
      let clause = `c.total_points >= ${placeholders.add(minPoints)}`;
      if (spec.maxPoints !== undefined) {
        clause += ` AND c.total_points <= ${placeholders.add(spec.maxPoints)}`;
      }
      return { clause, params: placeholders.params };
    }

    case AudienceType.CUSTOM_FILTER: {
      if (spec.conditions.length === 0) {
        return { clause: 'TRUE', params: [] };
      }
      const parts = spec.conditions.map(condition => compileCondition(condition, placeholders));
      return { clause: `(${parts.join(' AND ')})`, params: placeholders.params };
    }

    case AudienceType.LOCATION_RADIUS:
      return null;

    case 'unsupported':
      return null;

    default: {
      const exhaustive: never = spec;
      return exhaustive;
    }
  }
}
