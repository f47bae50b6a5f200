import Joi from 'joi';
import { SendStatus } from '../types/campaign-send.types';
import { Channel } from '../types/campaign.types';

// ============================================================================
// SEND LEDGER VALIDATION SCHEMAS
// ============================================================================

export const createSendSchema = Joi.object({
  customerId: Joi.string().uuid().required(),
  channel: Joi.string()
    .valid(...Object.values(Channel))
    .required(),
  promoCodeAssigned: Joi.string().max(80).allow(null),
  abVariant: Joi.string().valid('A', 'B').allow(null),
});

export const updateSendStatusSchema = Joi.object({
  status: Joi.string()
    .valid(SendStatus.SENT, SendStatus.DELIVERED, SendStatus.FAILED, SendStatus.BOUNCED)
    .required(),
  occurredAt: Joi.date().iso().default(() => new Date()),
  errorMessage: Joi.string().max(1000).allow(null),
});

export const recordEngagementSchema = Joi.object({
  event: Joi.string().valid('opened', 'clicked').required(),
  occurredAt: Joi.date().iso().default(() => new Date()),
});

export const listSendsQuerySchema = Joi.object({
  status: Joi.string().valid(...Object.values(SendStatus)),
  limit: Joi.number().integer().min(1).max(200),
  offset: Joi.number().integer().min(0),
});

export const sendIdParamSchema = Joi.object({
  sendId: Joi.string().uuid().required(),
});
