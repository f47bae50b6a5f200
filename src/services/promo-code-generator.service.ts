import { randomInt } from 'crypto';
import { Pool } from 'pg';
import { campaignConfig } from '../config/campaign.config';
import { CodeGenerationExhaustedError } from '../errors/domain-errors';
import { CreatePromoCodeData, PromoCodeModel } from '../models/promo-code.model';
import { PromoCode } from '../types';
import { logger } from '../utils/logger';
import { isUniqueViolation } from '../utils/pg-errors';
import { Queryable } from '../utils/transaction';

// Excludes 0, O, 1, I and L
const CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';

export function normalizePrefix(prefix: string): string {
  const cleaned = prefix.toUpperCase().replace(/[^A-Z0-9]/g, '');
  return cleaned.length > 0 ? cleaned : campaignConfig.promoCodes.defaultPrefix;
}

export function randomSuffix(length = campaignConfig.promoCodes.suffixLength): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return suffix;
}

export class PromoCodeGeneratorService {
  constructor(
    private pool: Pool,
    private maxAttempts = campaignConfig.promoCodes.maxGenerationAttempts
  ) {}

  /**
   * Produce a `PREFIX-XXXXXXXX` code not yet used by the restaurant.
   * The existence check only avoids obvious collisions; the unique
   * constraint decides at insert time.
   */
  async generate(
    restaurantId: string,
    prefix = campaignConfig.promoCodes.defaultPrefix,
    db: Queryable = this.pool
  ): Promise<string> {
    const normalized = normalizePrefix(prefix);
    const model = new PromoCodeModel(db);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const code = `${normalized}-${randomSuffix()}`;
      if (!(await model.codeExists(code, restaurantId))) {
        return code;
      }
      logger.debug({ restaurantId, attempt }, 'Generated promo code collided, retrying');
    }

    throw new CodeGenerationExhaustedError(normalized, this.maxAttempts);
  }

  /**
   * Insert a promo code under a freshly generated code, regenerating when a
   * concurrent writer took the same code first.
   *
   * When `db` is a transaction client each insert runs under a savepoint,
   * so a unique violation does not abort the caller's transaction.
   */
  async createWithGeneratedCode(
    restaurantId: string,
    prefix: string,
    data: Omit<CreatePromoCodeData, 'code' | 'restaurantId'>,
    db: Queryable = this.pool
  ): Promise<PromoCode> {
    const model = new PromoCodeModel(db);
    const inTransaction = db !== this.pool;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const code = await this.generate(restaurantId, prefix, db);
      if (inTransaction) {
        await db.query('SAVEPOINT generated_promo_code');
      }

      try {
        const promoCode = await model.create({ ...data, restaurantId, code });
        if (inTransaction) {
          await db.query('RELEASE SAVEPOINT generated_promo_code');
        }
        logger.info({ restaurantId, promoCodeId: promoCode.id, code }, 'Promo code generated');
        return promoCode;
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }
        if (inTransaction) {
          await db.query('ROLLBACK TO SAVEPOINT generated_promo_code');
        }
        logger.warn({ restaurantId, attempt }, 'Promo code taken between check and insert, regenerating');
      }
    }

    throw new CodeGenerationExhaustedError(normalizePrefix(prefix), this.maxAttempts);
  }
}
