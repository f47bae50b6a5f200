import { Pool, PoolClient } from 'pg';
import { CodeGenerationExhaustedError } from '../../src/errors/domain-errors';
import {
  normalizePrefix,
  PromoCodeGeneratorService,
  randomSuffix,
} from '../../src/services/promo-code-generator.service';
import { DiscountType, PromoOrderType } from '../../src/types/promo-code.types';
import { buildPromoCode, CAMPAIGN_ID, NOW, RESTAURANT_ID, promoCodeRow } from '../fixtures/test-data';

const SUFFIX = /^[ABCDEFGHJKMNPQRSTUVWXYZ23456789]{8}$/;

const codeData = {
  campaignId: CAMPAIGN_ID,
  discountType: DiscountType.FIXED_AMOUNT,
  discountValue: 500,
  minSpendCents: 0,
  maxUses: 1,
  maxUsesPerCustomer: 1,
  orderType: PromoOrderType.ALL,
  validFrom: NOW,
  validUntil: new Date('2025-07-15T12:00:00.000Z'),
};

describe('normalizePrefix', () => {
  it('upper-cases and strips anything but letters and digits', () => {
    expect(normalizePrefix('summer 25!')).toBe('SUMMER25');
  });

  it('falls back to the default prefix when nothing is left', () => {
    expect(normalizePrefix('')).toBe('PROMO');
    expect(normalizePrefix('***')).toBe('PROMO');
  });
});

describe('randomSuffix', () => {
  it('draws 8 characters from the unambiguous alphabet', () => {
    for (let i = 0; i < 50; i++) {
      expect(randomSuffix()).toMatch(SUFFIX);
    }
  });
});

describe('PromoCodeGeneratorService', () => {
  let mockPool: { query: jest.Mock };

  beforeEach(() => {
    mockPool = { query: jest.fn() };
  });

  it('generates PREFIX-XXXXXXXX, retrying past an existing code', async () => {
    mockPool.query
      .mockResolvedValueOnce({ rows: [{ present: true }] })
      .mockResolvedValueOnce({ rows: [{ present: false }] });
    const generator = new PromoCodeGeneratorService(mockPool as unknown as Pool, 5);

    const code = await generator.generate(RESTAURANT_ID, 'summer');

    expect(code).toMatch(/^SUMMER-[ABCDEFGHJKMNPQRSTUVWXYZ23456789]{8}$/);
    expect(mockPool.query).toHaveBeenCalledTimes(2);
    expect(mockPool.query.mock.calls[1][1]).toEqual([RESTAURANT_ID, code]);
  });

  it('gives up after the configured number of collisions', async () => {
    mockPool.query.mockResolvedValue({ rows: [{ present: true }] });
    const generator = new PromoCodeGeneratorService(mockPool as unknown as Pool, 3);

    await expect(generator.generate(RESTAURANT_ID, 'summer')).rejects.toThrow(CodeGenerationExhaustedError);
    expect(mockPool.query).toHaveBeenCalledTimes(3);
  });

  it('regenerates under a savepoint when a transaction insert collides', async () => {
    const client = { query: jest.fn() };
    let inserts = 0;
    client.query.mockImplementation(async (sql: string) => {
      if (sql.startsWith('SELECT EXISTS')) {
        return { rows: [{ present: false }] };
      }
      if (sql.includes('INSERT INTO promo_codes')) {
        inserts++;
        if (inserts === 1) {
          throw Object.assign(new Error('duplicate key value'), { code: '23505' });
        }
        return { rows: [promoCodeRow(buildPromoCode({ code: 'VIP-ABCDEFGH', campaignId: CAMPAIGN_ID }))] };
      }
      return { rows: [] };
    });
    const generator = new PromoCodeGeneratorService(mockPool as unknown as Pool, 5);

    const promo = await generator.createWithGeneratedCode(
      RESTAURANT_ID,
      'vip',
      codeData,
      client as unknown as PoolClient
    );

    expect(promo.code).toBe('VIP-ABCDEFGH');
    const savepoints = client.query.mock.calls
      .map(([sql]) => sql)
      .filter((sql: string) => sql.includes('SAVEPOINT'));
    expect(savepoints).toEqual([
      'SAVEPOINT generated_promo_code',
      'ROLLBACK TO SAVEPOINT generated_promo_code',
      'SAVEPOINT generated_promo_code',
      'RELEASE SAVEPOINT generated_promo_code',
    ]);
    expect(mockPool.query).not.toHaveBeenCalled();
  });

  it('does not use savepoints on the pool', async () => {
    mockPool.query.mockImplementation(async (sql: string) =>
      sql.startsWith('SELECT EXISTS')
        ? { rows: [{ present: false }] }
        : { rows: [promoCodeRow(buildPromoCode({ code: 'PROMO-ABCDEFGH' }))] }
    );
    const generator = new PromoCodeGeneratorService(mockPool as unknown as Pool, 5);

    await generator.createWithGeneratedCode(RESTAURANT_ID, '', codeData);

    const statements: string[] = mockPool.query.mock.calls.map(([sql]) => sql);
    expect(statements.some(sql => sql.includes('SAVEPOINT'))).toBe(false);
    expect(mockPool.query.mock.calls[1][1][2]).toMatch(/^PROMO-/);
  });
});
