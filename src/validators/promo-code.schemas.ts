import Joi from 'joi';
import { DiscountType, PromoOrderType } from '../types/promo-code.types';

// ============================================================================
// PROMO CODE VALIDATION SCHEMAS
// ============================================================================

const amountCents = Joi.number().integer().min(0).max(100000000);

const promoCodeFields = {
  campaignId: Joi.string().uuid().allow(null),

  discountType: Joi.string()
    .valid(...Object.values(DiscountType))
    .required(),

  discountValue: Joi.when('discountType', {
    is: DiscountType.PERCENTAGE,
    then: Joi.number().greater(0).max(100).precision(2).required(),
    otherwise: Joi.number().integer().min(1).required(),
  }).messages({
    'number.max': 'Percentage discount cannot exceed 100',
  }),

  minSpendCents: amountCents,
  maxUses: Joi.number().integer().min(1).allow(null),
  maxUsesPerCustomer: Joi.number().integer().min(1).max(1000),
  orderType: Joi.string().valid(...Object.values(PromoOrderType)),
  validFrom: Joi.date().iso(),

  validUntil: Joi.date()
    .iso()
    .required()
    .when('validFrom', {
      is: Joi.exist(),
      then: Joi.date().greater(Joi.ref('validFrom')).messages({
        'date.greater': 'validUntil must be after validFrom',
      }),
      // validFrom defaults to now
      otherwise: Joi.date().greater('now').messages({
        'date.greater': 'validUntil must be in the future when validFrom is omitted',
      }),
    }),
};

/**
 * Create Promo Code Request Schema
 * Codes are stored upper-case
 */
export const createPromoCodeSchema = Joi.object({
  code: Joi.string()
    .trim()
    .pattern(/^[A-Za-z0-9-]{3,50}$/)
    .required()
    .messages({
      'string.pattern.base': 'Code must be 3-50 letters, digits or dashes',
    }),
  ...promoCodeFields,
});

export const generatePromoCodeSchema = Joi.object({
  prefix: Joi.string().pattern(/^[A-Za-z0-9]{1,20}$/),
  ...promoCodeFields,
});

export const validatePromoCodeSchema = Joi.object({
  customerId: Joi.string().uuid().required(),
  code: Joi.string().trim().min(1).max(50).required(),
  orderAmountCents: amountCents.required(),
});

export const redeemPromoCodeSchema = Joi.object({
  promoCodeId: Joi.string().uuid().required(),
  customerId: Joi.string().uuid().required(),
  orderAmountCents: amountCents.required(),
  discountAppliedCents: amountCents.required(),
  orderId: Joi.string().uuid().allow(null),
});

export const applyPromoCodeSchema = Joi.object({
  customerId: Joi.string().uuid().required(),
  code: Joi.string().trim().min(1).max(50).required(),
  orderAmountCents: amountCents.required(),
  orderId: Joi.string().uuid().allow(null),
});

export const listPromoCodesQuerySchema = Joi.object({
  campaignId: Joi.string().uuid(),
  isActive: Joi.boolean(),
  limit: Joi.number().integer().min(1).max(200),
  offset: Joi.number().integer().min(0),
});

export const promoCodeIdParamSchema = Joi.object({
  id: Joi.string().uuid().required(),
});
