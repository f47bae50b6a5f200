/**
 * Domain-specific error types for the campaign engine
 * Provides type-safe error handling with structured error codes
 */

import { PromoRejectionReason } from '../types/promo-code.types';

export class DomainError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CampaignNotFoundError extends DomainError {
  constructor(campaignId: string) {
    super(`Campaign ${campaignId} not found`, 'CAMPAIGN_NOT_FOUND', 404);
  }
}

export class PromoCodeNotFoundError extends DomainError {
  constructor(promoCodeId: string) {
    super(`Promo code ${promoCodeId} not found`, 'PROMO_CODE_NOT_FOUND', 404);
  }
}

export class CampaignSendNotFoundError extends DomainError {
  constructor(sendId: string) {
    super(`Campaign send ${sendId} not found`, 'CAMPAIGN_SEND_NOT_FOUND', 404);
  }
}

/**
 * Business-rule rejection of a promo code. The reason and message are safe to
 * show to the customer at checkout.
 */
export class PromoCodeRejectedError extends DomainError {
  constructor(public reason: PromoRejectionReason, message: string) {
    super(message, 'PROMO_CODE_REJECTED', 422);
  }
}

export class DuplicatePromoCodeError extends DomainError {
  constructor(code: string) {
    super(`Promo code ${code} already exists for this restaurant`, 'DUPLICATE_PROMO_CODE', 409);
  }
}

export class MissingTenantContextError extends DomainError {
  constructor() {
    super('Restaurant context is required', 'MISSING_TENANT_CONTEXT', 400);
  }
}

export class InvalidStatusTransitionError extends DomainError {
  constructor(entity: string, from: string, to: string) {
    super(
      `Invalid ${entity} status transition from ${from} to ${to}`,
      'INVALID_STATUS_TRANSITION',
      409
    );
  }
}

export class CampaignNotEditableError extends DomainError {
  constructor(campaignId: string, status: string) {
    super(
      `Campaign ${campaignId} is in ${status} status and can no longer be modified`,
      'CAMPAIGN_NOT_EDITABLE',
      409
    );
  }
}

export class CampaignNotDispatchableError extends DomainError {
  constructor(campaignId: string, status: string) {
    super(
      `Campaign ${campaignId} is in ${status} status, sends can only be created while sending`,
      'CAMPAIGN_NOT_DISPATCHABLE',
      409
    );
  }
}

export class InvalidScheduleError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_SCHEDULE', 400);
  }
}

export class InvalidValidityWindowError extends DomainError {
  constructor(validFrom: Date, validUntil: Date) {
    super(
      `validUntil (${validUntil.toISOString()}) must be after validFrom (${validFrom.toISOString()})`,
      'INVALID_VALIDITY_WINDOW',
      400
    );
  }
}

/**
 * Lock or serialization contention that outlived the retry budget.
 * Nothing was applied; the caller may retry the whole operation.
 */
export class TransientContentionError extends DomainError {
  public readonly retryable = true;

  constructor(operation: string, public attempts: number, public lastError?: unknown) {
    super(
      `${operation} failed after ${attempts} attempts due to concurrent access`,
      'TRANSIENT_CONTENTION',
      503
    );
  }
}

/**
 * Stored state breaks an invariant the write path is supposed to guarantee.
 * The operation aborts; no repair is attempted.
 */
export class InvariantViolationError extends DomainError {
  constructor(message: string, public details: Record<string, unknown> = {}) {
    super(message, 'INVARIANT_VIOLATION', 500);
  }
}

export class CodeGenerationExhaustedError extends DomainError {
  constructor(prefix: string, attempts: number) {
    super(
      `Could not generate a unique promo code with prefix ${prefix} after ${attempts} attempts`,
      'CODE_GENERATION_EXHAUSTED',
      503
    );
  }
}
