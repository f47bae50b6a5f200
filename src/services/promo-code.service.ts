import { Pool, PoolClient } from 'pg';
import { campaignConfig } from '../config/campaign.config';
import {
  DuplicatePromoCodeError,
  InvalidValidityWindowError,
  InvariantViolationError,
  PromoCodeNotFoundError,
  PromoCodeRejectedError,
  TransientContentionError,
} from '../errors/domain-errors';
import { PROMO_USAGE_CHECK, PromoCodeModel } from '../models/promo-code.model';
import {
  ApplyPromoCodeResult,
  CreatePromoCodeRequest,
  DiscountType,
  GeneratePromoCodeRequest,
  ListPromoCodesFilters,
  PromoCode,
  PromoOrderType,
  PromoRedemption,
  PromoRejectionReason,
  PromoTemplate,
  PromoUsageConsistency,
  PromoValidationResult,
  RedeemPromoCodeRequest,
} from '../types';
import { logger } from '../utils/logger';
import { campaignMetrics } from '../utils/metrics';
import { clampCents, formatCents, percentageOfCents } from '../utils/money';
import { resolvePagination } from '../utils/pagination';
import { isCheckViolation, isContentionError, isUniqueViolation } from '../utils/pg-errors';
import { retry } from '../utils/retry';
import { withTransaction } from '../utils/transaction';
import { PromoCodeGeneratorService } from './promo-code-generator.service';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface EligibilityContext {
  now: Date;
  orderAmountCents: number;
  customerRedemptionCount: number;
}

export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Discount in cents for an order, never negative and never more than the order.
 */
export function calculateDiscount(promoCode: PromoCode, orderAmountCents: number): number {
  const raw =
    promoCode.discountType === DiscountType.PERCENTAGE
      ? percentageOfCents(orderAmountCents, promoCode.discountValue)
      : promoCode.discountValue;
  return clampCents(Math.floor(raw), 0, Math.max(orderAmountCents, 0));
}

export function assertUsageWithinCap(promoCode: PromoCode): void {
  if (promoCode.maxUses !== null && promoCode.totalUses > promoCode.maxUses) {
    campaignMetrics.promoInvariantViolations.inc({ kind: 'over_cap' });
    logger.error(
      { promoCodeId: promoCode.id, totalUses: promoCode.totalUses, maxUses: promoCode.maxUses },
      'Promo code usage exceeds its global cap'
    );
    throw new InvariantViolationError('Promo code usage exceeds its global cap', {
      promoCodeId: promoCode.id,
      totalUses: promoCode.totalUses,
      maxUses: promoCode.maxUses,
    });
  }
}

/**
 * Apply the eligibility rules in their fixed order. The first failing rule
 * decides the reason.
 */
export function evaluatePromoCode(promoCode: PromoCode | null, context: EligibilityContext): PromoValidationResult {
  if (
    !promoCode ||
    !promoCode.isActive ||
    context.now < promoCode.validFrom ||
    context.now > promoCode.validUntil
  ) {
    return {
      valid: false,
      reason: PromoRejectionReason.INVALID_OR_EXPIRED,
      message: 'Invalid or expired promo code',
    };
  }

  if (promoCode.maxUses !== null && promoCode.totalUses >= promoCode.maxUses) {
    return {
      valid: false,
      reason: PromoRejectionReason.USAGE_LIMIT_REACHED,
      message: 'Promo code usage limit reached',
    };
  }

  if (context.customerRedemptionCount >= promoCode.maxUsesPerCustomer) {
    return {
      valid: false,
      reason: PromoRejectionReason.ALREADY_USED,
      message: 'You have already used this promo code',
    };
  }

  if (context.orderAmountCents < promoCode.minSpendCents) {
    return {
      valid: false,
      reason: PromoRejectionReason.MINIMUM_SPEND_NOT_MET,
      message: `Minimum spend of ${formatCents(promoCode.minSpendCents)} required`,
    };
  }

  return {
    valid: true,
    promoCodeId: promoCode.id,
    code: promoCode.code,
    discountCents: calculateDiscount(promoCode, context.orderAmountCents),
    discountType: promoCode.discountType,
    discountValue: promoCode.discountValue,
    orderType: promoCode.orderType,
  };
}

export class PromoCodeService {
  private promoCodeModel: PromoCodeModel;
  private generator: PromoCodeGeneratorService;

  constructor(private pool: Pool, private clock: () => Date = () => new Date()) {
    this.promoCodeModel = new PromoCodeModel(pool);
    this.generator = new PromoCodeGeneratorService(pool);
  }

  /**
   * Check a code for a customer's order without changing anything.
   */
  async validate(
    restaurantId: string,
    customerId: string,
    code: string,
    orderAmountCents: number
  ): Promise<PromoValidationResult> {
    try {
      const promoCode = await this.promoCodeModel.findByCode(normalizeCode(code), restaurantId);
      if (promoCode) {
        assertUsageWithinCap(promoCode);
      }

      const customerRedemptionCount = promoCode
        ? await this.promoCodeModel.countCustomerRedemptions(promoCode.id, customerId)
        : 0;

      const result = evaluatePromoCode(promoCode, {
        now: this.clock(),
        orderAmountCents,
        customerRedemptionCount,
      });

      campaignMetrics.promoValidations.inc({ result: result.valid ? 'valid' : result.reason });
      return result;
    } catch (error) {
      logger.error({ err: error, restaurantId, customerId }, 'Error validating promo code');
      throw error;
    }
  }

  /**
   * Record a redemption under an exclusive lock on the promo code row.
   * Every rule is evaluated again inside the lock; contention is retried with
   * backoff and surfaces as TransientContentionError once attempts run out.
   */
  async redeem(request: RedeemPromoCodeRequest): Promise<PromoRedemption> {
    const policy = campaignConfig.redemption;

    try {
      const redemption = await retry(() => this.redeemOnce(request), {
        maxAttempts: policy.maxAttempts,
        delayMs: policy.initialDelayMs,
        backoffMultiplier: policy.backoffMultiplier,
        maxDelayMs: policy.maxDelayMs,
        shouldRetry: isContentionError,
        onRetry: (attempt, error, delayMs) => {
          campaignMetrics.promoRedemptionContentionRetries.inc();
          logger.warn(
            { err: error, attempt, delayMs, promoCodeId: request.promoCodeId },
            'Promo code redemption hit lock contention, retrying'
          );
        },
      });

      campaignMetrics.promoRedemptions.inc();
      logger.info(
        {
          redemptionId: redemption.id,
          promoCodeId: redemption.promoCodeId,
          customerId: redemption.customerId,
          discountAppliedCents: redemption.discountAppliedCents,
        },
        'Promo code redeemed'
      );
      return redemption;
    } catch (error) {
      if (isContentionError(error)) {
        logger.error(
          { err: error, promoCodeId: request.promoCodeId, attempts: policy.maxAttempts },
          'Promo code redemption gave up after repeated contention'
        );
        throw new TransientContentionError('Promo code redemption', policy.maxAttempts, error);
      }
      if (error instanceof PromoCodeRejectedError) {
        campaignMetrics.promoRedemptionRejections.inc({ reason: error.reason });
        logger.warn(
          { promoCodeId: request.promoCodeId, customerId: request.customerId, reason: error.reason },
          'Promo code redemption rejected'
        );
      }
      throw error;
    }
  }

  /**
   * Validate, then redeem the computed discount.
   */
  async validateAndRedeem(
    restaurantId: string,
    customerId: string,
    code: string,
    orderAmountCents: number,
    orderId?: string | null
  ): Promise<ApplyPromoCodeResult> {
    const validation = await this.validate(restaurantId, customerId, code, orderAmountCents);
    if (!validation.valid) {
      throw new PromoCodeRejectedError(validation.reason, validation.message);
    }

    const redemption = await this.redeem({
      promoCodeId: validation.promoCodeId,
      customerId,
      restaurantId,
      orderAmountCents,
      discountAppliedCents: validation.discountCents,
      orderId: orderId ?? null,
    });

    return {
      redemptionId: redemption.id,
      promoCodeId: redemption.promoCodeId,
      discountCents: redemption.discountAppliedCents,
    };
  }

  /** validFrom defaults to now, so a validUntil already past cannot be stored */
  private validityWindow(validFrom: Date | undefined, validUntil: Date): { validFrom: Date; validUntil: Date } {
    const from = validFrom ?? this.clock();
    if (validUntil.getTime() <= from.getTime()) {
      throw new InvalidValidityWindowError(from, validUntil);
    }
    return { validFrom: from, validUntil };
  }

  async createPromoCode(restaurantId: string, request: CreatePromoCodeRequest): Promise<PromoCode> {
    const code = normalizeCode(request.code);
    const validity = this.validityWindow(request.validFrom, request.validUntil);
    try {
      const promoCode = await this.promoCodeModel.create({
        restaurantId,
        campaignId: request.campaignId ?? null,
        code,
        discountType: request.discountType,
        discountValue: request.discountValue,
        minSpendCents: request.minSpendCents ?? 0,
        maxUses: request.maxUses ?? null,
        maxUsesPerCustomer: request.maxUsesPerCustomer ?? campaignConfig.promoCodes.defaultMaxUsesPerCustomer,
        orderType: request.orderType ?? PromoOrderType.ALL,
        ...validity,
      });
      logger.info({ restaurantId, promoCodeId: promoCode.id, code }, 'Promo code created');
      return promoCode;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicatePromoCodeError(code);
      }
      logger.error({ err: error, restaurantId, code }, 'Error creating promo code');
      throw error;
    }
  }

  async generatePromoCode(restaurantId: string, request: GeneratePromoCodeRequest): Promise<PromoCode> {
    const validity = this.validityWindow(request.validFrom, request.validUntil);
    return this.generator.createWithGeneratedCode(
      restaurantId,
      request.prefix ?? campaignConfig.promoCodes.defaultPrefix,
      {
        campaignId: request.campaignId ?? null,
        discountType: request.discountType,
        discountValue: request.discountValue,
        minSpendCents: request.minSpendCents ?? 0,
        maxUses: request.maxUses ?? null,
        maxUsesPerCustomer: request.maxUsesPerCustomer ?? campaignConfig.promoCodes.defaultMaxUsesPerCustomer,
        orderType: request.orderType ?? PromoOrderType.ALL,
        ...validity,
      }
    );
  }

  /**
   * Single-use code for one campaign recipient, written in the caller's
   * transaction alongside the send row.
   */
  async grantFromTemplate(
    client: PoolClient,
    restaurantId: string,
    campaignId: string,
    template: PromoTemplate
  ): Promise<PromoCode> {
    const validFrom = this.clock();
    return this.generator.createWithGeneratedCode(
      restaurantId,
      template.prefix,
      {
        campaignId,
        discountType: template.discountType,
        discountValue: template.discountValue,
        minSpendCents: template.minSpendCents ?? 0,
        maxUses: 1,
        maxUsesPerCustomer: 1,
        orderType: template.orderType ?? PromoOrderType.ALL,
        validFrom,
        validUntil: new Date(validFrom.getTime() + template.validDays * MS_PER_DAY),
      },
      client
    );
  }

  async getPromoCode(restaurantId: string, promoCodeId: string): Promise<PromoCode> {
    const promoCode = await this.promoCodeModel.findById(promoCodeId, restaurantId);
    if (!promoCode) {
      throw new PromoCodeNotFoundError(promoCodeId);
    }
    return promoCode;
  }

  async listPromoCodes(restaurantId: string, filters: ListPromoCodesFilters): Promise<PromoCode[]> {
    const { limit, offset } = resolvePagination(filters.limit, filters.offset);
    return this.promoCodeModel.list(restaurantId, { ...filters, limit, offset });
  }

  async deactivatePromoCode(restaurantId: string, promoCodeId: string): Promise<PromoCode> {
    const promoCode = await this.promoCodeModel.deactivate(promoCodeId, restaurantId);
    if (!promoCode) {
      throw new PromoCodeNotFoundError(promoCodeId);
    }
    logger.info({ restaurantId, promoCodeId }, 'Promo code deactivated');
    return promoCode;
  }

  async listRedemptions(
    restaurantId: string,
    promoCodeId: string,
    limit?: number,
    offset?: number
  ): Promise<PromoRedemption[]> {
    await this.getPromoCode(restaurantId, promoCodeId);
    const page = resolvePagination(limit, offset);
    return this.promoCodeModel.listRedemptions(promoCodeId, restaurantId, page.limit, page.offset);
  }

  /**
   * Compare the cached usage counter with the redemption rows. A counter
   * over the global cap is an invariant violation; a plain mismatch is
   * reported as inconsistent.
   */
  async checkUsageConsistency(restaurantId: string, promoCodeId: string): Promise<PromoUsageConsistency> {
    const promoCode = await this.getPromoCode(restaurantId, promoCodeId);
    assertUsageWithinCap(promoCode);

    const redemptionCount = await this.promoCodeModel.countRedemptions(promoCode.id);
    const consistent = redemptionCount === promoCode.totalUses;
    if (!consistent) {
      campaignMetrics.promoInvariantViolations.inc({ kind: 'cache_drift' });
      logger.warn(
        { promoCodeId, totalUses: promoCode.totalUses, redemptionCount },
        'Promo code usage counter disagrees with redemption rows'
      );
    }

    return {
      promoCodeId: promoCode.id,
      totalUses: promoCode.totalUses,
      redemptionCount,
      maxUses: promoCode.maxUses,
      consistent,
    };
  }

  private async redeemOnce(request: RedeemPromoCodeRequest): Promise<PromoRedemption> {
    return withTransaction(this.pool, async (client) => {
      const model = new PromoCodeModel(client);
      await model.setLockTimeout(campaignConfig.redemption.lockTimeout);

      const promoCode = await model.lockForRedemption(request.promoCodeId, request.restaurantId);
      if (!promoCode) {
        throw new PromoCodeNotFoundError(request.promoCodeId);
      }
      assertUsageWithinCap(promoCode);

      const customerRedemptionCount = await model.countCustomerRedemptions(promoCode.id, request.customerId);
      const result = evaluatePromoCode(promoCode, {
        now: this.clock(),
        orderAmountCents: request.orderAmountCents,
        customerRedemptionCount,
      });

      if (!result.valid) {
        throw new PromoCodeRejectedError(result.reason, result.message);
      }

      if (
        request.discountAppliedCents < 0 ||
        request.discountAppliedCents > request.orderAmountCents ||
        request.discountAppliedCents > result.discountCents
      ) {
        throw new PromoCodeRejectedError(
          PromoRejectionReason.DISCOUNT_MISMATCH,
          `Discount of ${formatCents(request.discountAppliedCents)} exceeds the ${formatCents(result.discountCents)} this code allows`
        );
      }

      const redemption = await model.insertRedemption({
        promoCodeId: promoCode.id,
        customerId: request.customerId,
        restaurantId: request.restaurantId,
        orderId: request.orderId ?? null,
        orderAmountCents: request.orderAmountCents,
        discountAppliedCents: request.discountAppliedCents,
      });
      try {
        await model.incrementTotalUses(promoCode.id);
      } catch (error) {
        if (isCheckViolation(error, PROMO_USAGE_CHECK)) {
          campaignMetrics.promoInvariantViolations.inc({ kind: 'over_cap' });
          throw new InvariantViolationError('Promo code usage would exceed its cap', {
            promoCodeId: promoCode.id,
            totalUses: promoCode.totalUses,
            maxUses: promoCode.maxUses,
          });
        }
        throw error;
      }

      return redemption;
    });
  }
}
