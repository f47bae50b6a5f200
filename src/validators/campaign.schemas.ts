import Joi from 'joi';
import { CampaignStatus, CampaignType, Channel } from '../types/campaign.types';
import { DiscountType, PromoOrderType } from '../types/promo-code.types';
import { audienceSpecSchema } from './audience.schemas';

// ============================================================================
// CAMPAIGN VALIDATION SCHEMAS
// ============================================================================

const channelSchema = Joi.string()
  .valid(...Object.values(Channel))
  .messages({
    'any.only': `Channel must be one of: ${Object.values(Channel).join(', ')}`,
  });

const recurringConfigSchema = Joi.object({
  frequency: Joi.string().valid('daily', 'weekly', 'monthly').required(),
  interval: Joi.number().integer().min(1).max(365),
  endsAt: Joi.string().isoDate(),
});

const abTestConfigSchema = Joi.object({
  splitPercent: Joi.number()
    .integer()
    .min(1)
    .max(99)
    .required()
    .messages({
      'number.min': 'Split must give variant A at least 1%',
      'number.max': 'Split must leave variant B at least 1%',
    }),
});

const promoTemplateSchema = Joi.object({
  prefix: Joi.string()
    .pattern(/^[A-Za-z0-9]{1,20}$/)
    .required()
    .messages({
      'string.pattern.base': 'Prefix must be 1-20 letters or digits',
    }),

  discountType: Joi.string()
    .valid(...Object.values(DiscountType))
    .required(),

  // Percent for percentage codes, cents for fixed-amount codes
  discountValue: Joi.when('discountType', {
    is: DiscountType.PERCENTAGE,
    then: Joi.number().greater(0).max(100).precision(2).required(),
    otherwise: Joi.number().integer().min(1).required(),
  }),

  minSpendCents: Joi.number().integer().min(0),
  orderType: Joi.string().valid(...Object.values(PromoOrderType)),
  validDays: Joi.number().integer().min(1).max(365).required(),
});

const campaignFields = {
  name: Joi.string().trim().min(1).max(200),
  description: Joi.string().max(2000).allow(null, ''),
  type: Joi.string().valid(...Object.values(CampaignType)),
  primaryChannel: channelSchema,
  fallbackChannel: channelSchema.allow(null),
  audience: audienceSpecSchema,
  messageSubject: Joi.string().max(200).allow(null, ''),
  messageTemplate: Joi.string().min(1).max(5000),
  recurringConfig: recurringConfigSchema.allow(null),
  abTestConfig: abTestConfigSchema.allow(null),
  promoTemplate: promoTemplateSchema.allow(null),
};

/**
 * Create Campaign Request Schema
 */
export const createCampaignSchema = Joi.object({
  ...campaignFields,
  name: campaignFields.name.required(),
  type: campaignFields.type.required(),
  primaryChannel: campaignFields.primaryChannel.required(),
  audience: campaignFields.audience.required(),
  messageTemplate: campaignFields.messageTemplate.required(),
});

/**
 * Update Campaign Request Schema
 * Drafts only; at least one field
 */
export const updateCampaignSchema = Joi.object(campaignFields).min(1).messages({
  'object.min': 'At least one field must be provided',
});

export const scheduleCampaignSchema = Joi.object({
  scheduledAt: Joi.date().iso().required(),
});

export const cancelCampaignSchema = Joi.object({
  reason: Joi.string().max(500),
});

export const listCampaignsQuerySchema = Joi.object({
  status: Joi.string().valid(...Object.values(CampaignStatus)),
  type: Joi.string().valid(...Object.values(CampaignType)),
  limit: Joi.number().integer().min(1).max(200),
  offset: Joi.number().integer().min(0),
});

export const paginationQuerySchema = Joi.object({
  limit: Joi.number().integer().min(1).max(200),
  offset: Joi.number().integer().min(0),
});

export const campaignIdParamSchema = Joi.object({
  id: Joi.string()
    .uuid()
    .required()
    .messages({
      'string.guid': 'Campaign ID must be a valid UUID',
    }),
});
