import { AudienceType, InactiveSinceAudience } from '../../src/types/audience.types';
import { parseStoredAudience, serializeAudience } from '../../src/utils/audience-spec';
import { TAG_ID } from '../fixtures/test-data';

describe('parseStoredAudience', () => {
  it('reads snake_case filter keys', () => {
    expect(parseStoredAudience('wallet_range', { min_points: 100, max_points: 900 })).toEqual({
      type: AudienceType.WALLET_RANGE,
      minPoints: 100,
      maxPoints: 900,
    });
    expect(parseStoredAudience('tagged', { tag_ids: [TAG_ID] })).toEqual({
      type: AudienceType.TAGGED,
      tagIds: [TAG_ID],
    });
    expect(parseStoredAudience('location_radius', { latitude: 51.5, longitude: -0.12, radius_km: 3 })).toEqual({
      type: AudienceType.LOCATION_RADIUS,
      latitude: 51.5,
      longitude: -0.12,
      radiusKm: 3,
    });
  });

  it('ignores the filter for the all audience', () => {
    expect(parseStoredAudience('all', null)).toEqual({ type: AudienceType.ALL });
  });

  it('parses custom filter conditions', () => {
    expect(
      parseStoredAudience('custom_filter', {
        conditions: [
          { field: 'visitCount', operator: 'gt', value: 2 },
          { field: 'lastVisit', operator: 'is_null' },
        ],
      })
    ).toEqual({
      type: AudienceType.CUSTOM_FILTER,
      conditions: [
        { field: 'visitCount', operator: 'gt', value: 2 },
        { field: 'lastVisit', operator: 'is_null' },
      ],
    });
  });

  it('marks unknown types as unsupported', () => {
    expect(parseStoredAudience('lookalike', { seed: 'x' })).toEqual({ type: 'unsupported', storedType: 'lookalike' });
  });

  it('marks malformed filters as unsupported', () => {
    expect(parseStoredAudience('inactive_since', { days: 'thirty' })).toEqual({
      type: 'unsupported',
      storedType: 'inactive_since',
    });
    expect(parseStoredAudience('tagged', { tag_ids: [1, 2] })).toEqual({ type: 'unsupported', storedType: 'tagged' });
    expect(
      parseStoredAudience('custom_filter', { conditions: [{ field: 'password', operator: 'eq', value: 'x' }] })
    ).toEqual({ type: 'unsupported', storedType: 'custom_filter' });
  });
});

describe('serializeAudience', () => {
  it('writes snake_case keys and omits absent wallet bounds', () => {
    expect(serializeAudience({ type: AudienceType.WALLET_RANGE, minPoints: 0 })).toEqual({
      audienceType: 'wallet_range',
      audienceFilter: { min_points: 0 },
    });
    expect(serializeAudience({ type: AudienceType.LOCATION_RADIUS, latitude: 1, longitude: 2, radiusKm: 3 })).toEqual({
      audienceType: 'location_radius',
      audienceFilter: { latitude: 1, longitude: 2, radius_km: 3 },
    });
  });

  it('is read back by parseStoredAudience', () => {
    const spec: InactiveSinceAudience = { type: AudienceType.INACTIVE_SINCE, days: 45 };
    const { audienceType, audienceFilter } = serializeAudience(spec);
    expect(parseStoredAudience(audienceType, audienceFilter)).toEqual(spec);
  });
});
