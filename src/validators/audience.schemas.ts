import Joi from 'joi';
import { campaignConfig } from '../config/campaign.config';
import { AudienceType, CUSTOM_FILTER_FIELDS, DATE_FILTER_FIELDS } from '../types/audience.types';

// ============================================================================
// AUDIENCE VALIDATION SCHEMAS
// ============================================================================

const whenType = (type: AudienceType, schema: Joi.Schema) =>
  Joi.when('type', { is: type, then: schema, otherwise: Joi.forbidden() });

// Integer columns take whole numbers, timestamp columns ISO dates
const filterValueByField = Joi.when('field', {
  is: Joi.valid(...DATE_FILTER_FIELDS),
  then: Joi.string().isoDate().required().messages({
    'string.base': 'Value must be an ISO date for this field',
    'string.isoDate': 'Value must be an ISO date for this field',
  }),
  otherwise: Joi.number().integer().strict().required().messages({
    'number.base': 'Value must be a whole number for this field',
    'number.integer': 'Value must be a whole number for this field',
  }),
});

const customFilterConditionSchema = Joi.object({
  field: Joi.string()
    .valid(...Object.keys(CUSTOM_FILTER_FIELDS))
    .required()
    .messages({
      'any.only': `Field must be one of: ${Object.keys(CUSTOM_FILTER_FIELDS).join(', ')}`,
    }),

  operator: Joi.string()
    .valid('eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'is_null', 'is_not_null')
    .required(),

  value: Joi.when('operator', {
    is: Joi.valid('is_null', 'is_not_null'),
    then: Joi.forbidden(),
    otherwise: filterValueByField,
  }),
});

/**
 * Audience Spec Schema
 * One variant per audience type; fields of other variants are rejected
 */
export const audienceSpecSchema = Joi.object({
  type: Joi.string()
    .valid(...Object.values(AudienceType))
    .required()
    .messages({
      'any.only': `Audience type must be one of: ${Object.values(AudienceType).join(', ')}`,
    }),

  tagIds: whenType(
    AudienceType.TAGGED,
    Joi.array().items(Joi.string().uuid()).max(100).required()
  ),

  days: whenType(
    AudienceType.INACTIVE_SINCE,
    Joi.number().integer().min(0).max(3650).default(campaignConfig.audience.defaultInactiveDays)
  ),

  minPoints: whenType(AudienceType.WALLET_RANGE, Joi.number().integer().min(0)),
  maxPoints: whenType(AudienceType.WALLET_RANGE, Joi.number().integer().min(0)),

  conditions: whenType(
    AudienceType.CUSTOM_FILTER,
    Joi.array().items(customFilterConditionSchema).max(20).default([])
  ),

  latitude: whenType(AudienceType.LOCATION_RADIUS, Joi.number().min(-90).max(90).required()),
  longitude: whenType(AudienceType.LOCATION_RADIUS, Joi.number().min(-180).max(180).required()),
  radiusKm: whenType(AudienceType.LOCATION_RADIUS, Joi.number().positive().max(500).required()),
});

export const previewAudienceSchema = Joi.object({
  audience: audienceSpecSchema.required(),
});

export const audienceMembersSchema = Joi.object({
  audience: audienceSpecSchema.required(),
  limit: Joi.number().integer().min(1).max(campaignConfig.dispatch.batchSize).default(50),
  afterCustomerId: Joi.string().uuid(),
});
