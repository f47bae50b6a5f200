import { AudienceType } from '../../src/types/audience.types';
import { buildAudienceFilter } from '../../src/utils/audience-filter';
import { NOW, TAG_ID } from '../fixtures/test-data';

const OTHER_TAG_ID = '99999999-9999-4999-8999-999999999999';

describe('buildAudienceFilter', () => {
  it('matches everyone for the all audience', () => {
    expect(buildAudienceFilter({ type: AudienceType.ALL }, NOW)).toEqual({ clause: 'TRUE', params: [] });
  });

  describe('tagged', () => {
    it('binds the de-duplicated tag ids as a uuid array', () => {
      const filter = buildAudienceFilter({ type: AudienceType.TAGGED, tagIds: [TAG_ID, OTHER_TAG_ID, TAG_ID] }, NOW);

      expect(filter).toEqual({
        clause:
          'EXISTS (SELECT 1 FROM customer_tag_assignments cta ' +
          'JOIN customer_tags ct ON ct.id = cta.tag_id ' +
          'WHERE cta.customer_id = c.id AND ct.restaurant_id = c.restaurant_id ' +
          'AND cta.tag_id = ANY($2::uuid[]))',
        params: [[TAG_ID, OTHER_TAG_ID]],
      });
    });

    it('matches nobody with an empty tag set', () => {
      expect(buildAudienceFilter({ type: AudienceType.TAGGED, tagIds: [] }, NOW)).toBeNull();
    });
  });

  describe('inactive_since', () => {
    it('includes never-visited customers and uses a cutoff of now minus days', () => {
      const filter = buildAudienceFilter({ type: AudienceType.INACTIVE_SINCE, days: 30 }, NOW);

      expect(filter).toEqual({
        clause: '(c.last_visit IS NULL OR c.last_visit < $2)',
        params: [new Date('2025-05-16T12:00:00.000Z')],
      });
    });

    it('leaves a customer who visited yesterday outside the 30 day window', () => {
      const filter = buildAudienceFilter({ type: AudienceType.INACTIVE_SINCE, days: 30 }, NOW);
      const cutoff = filter?.params[0];
      const yesterday = new Date(NOW.getTime() - 24 * 60 * 60 * 1000);

      if (!(cutoff instanceof Date)) {
        throw new Error('expected a Date cutoff');
      }
      // last_visit < cutoff is false for yesterday
      expect(yesterday.getTime()).toBeGreaterThan(cutoff.getTime());
    });
  });

  describe('wallet_range', () => {
    it('includes zero points when min is 0', () => {
      expect(buildAudienceFilter({ type: AudienceType.WALLET_RANGE, minPoints: 0 }, NOW)).toEqual({
        clause: 'c.total_points >= $2',
        params: [0],
      });
    });

    it('defaults a missing min to 0 and binds the max', () => {
      expect(buildAudienceFilter({ type: AudienceType.WALLET_RANGE, maxPoints: 500 }, NOW)).toEqual({
        clause: 'c.total_points >= $2 AND c.total_points <= $3',
        params: [0, 500],
      });
    });

    it('matches nobody when max is below min', () => {
      expect(buildAudienceFilter({ type: AudienceType.WALLET_RANGE, minPoints: 100, maxPoints: 50 }, NOW)).toBeNull();
    });
  });

  describe('custom_filter', () => {
    it('joins conditions with AND and numbers placeholders in order', () => {
      const filter = buildAudienceFilter(
        {
          type: AudienceType.CUSTOM_FILTER,
          conditions: [
            { field: 'visitCount', operator: 'gte', value: 3 },
            { field: 'lastVisit', operator: 'is_not_null' },
            { field: 'totalSpentCents', operator: 'lt', value: 20000 },
          ],
        },
        NOW
      );

      expect(filter).toEqual({
        clause: '(c.visit_count >= $2 AND c.last_visit IS NOT NULL AND c.total_spent_cents < $3)',
        params: [3, 20000],
      });
    });

    it('starts numbering at the given index', () => {
      const filter = buildAudienceFilter(
        { type: AudienceType.CUSTOM_FILTER, conditions: [{ field: 'totalPoints', operator: 'neq', value: 0 }] },
        NOW,
        4
      );

      expect(filter).toEqual({ clause: '(c.total_points <> $4)', params: [0] });
    });

    it('matches everyone with no conditions', () => {
      expect(buildAudienceFilter({ type: AudienceType.CUSTOM_FILTER, conditions: [] }, NOW)).toEqual({
        clause: 'TRUE',
        params: [],
      });
    });
  });

  it('does not evaluate location radius audiences', () => {
    expect(
      buildAudienceFilter({ type: AudienceType.LOCATION_RADIUS, latitude: 40.7, longitude: -74, radiusKm: 5 }, NOW)
    ).toBeNull();
  });

  it('matches nobody for an unsupported stored type', () => {
    expect(buildAudienceFilter({ type: 'unsupported', storedType: 'lookalike' }, NOW)).toBeNull();
  });
});
