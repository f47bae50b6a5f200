export enum DiscountType {
  PERCENTAGE = 'percentage',
  FIXED_AMOUNT = 'fixed_amount',
}

export enum PromoOrderType {
  ALL = 'all',
  EATS_ONLY = 'eats_only',
  DELIVERY_ONLY = 'delivery_only',
}

export enum PromoRejectionReason {
  INVALID_OR_EXPIRED = 'INVALID_OR_EXPIRED',
  USAGE_LIMIT_REACHED = 'USAGE_LIMIT_REACHED',
  ALREADY_USED = 'ALREADY_USED',
  MINIMUM_SPEND_NOT_MET = 'MINIMUM_SPEND_NOT_MET',
  DISCOUNT_MISMATCH = 'DISCOUNT_MISMATCH',
}

export interface PromoCode {
  id: string;
  campaignId: string | null;
  restaurantId: string;
  code: string;
  discountType: DiscountType;
  /** Percent for percentage codes, cents for fixed-amount codes */
  discountValue: number;
  minSpendCents: number;
  maxUses: number | null;
  maxUsesPerCustomer: number;
  /** Cached count of redemption rows */
  totalUses: number;
  orderType: PromoOrderType;
  validFrom: Date;
  validUntil: Date;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface PromoRedemption {
  id: string;
  promoCodeId: string;
  customerId: string;
  restaurantId: string;
  orderId: string | null;
  orderAmountCents: number;
  discountAppliedCents: number;
  redeemedAt: Date;
}

export interface CreatePromoCodeRequest {
  code: string;
  campaignId?: string | null;
  discountType: DiscountType;
  discountValue: number;
  minSpendCents?: number;
  maxUses?: number | null;
  maxUsesPerCustomer?: number;
  orderType?: PromoOrderType;
  validFrom?: Date;
  validUntil: Date;
}

export type GeneratePromoCodeRequest = Omit<CreatePromoCodeRequest, 'code'> & {
  prefix?: string;
};

export interface PromoValidationSuccess {
  valid: true;
  promoCodeId: string;
  code: string;
  discountCents: number;
  discountType: DiscountType;
  discountValue: number;
  orderType: PromoOrderType;
}

export interface PromoValidationFailure {
  valid: false;
  reason: PromoRejectionReason;
  message: string;
}

export type PromoValidationResult = PromoValidationSuccess | PromoValidationFailure;

export interface RedeemPromoCodeRequest {
  promoCodeId: string;
  customerId: string;
  restaurantId: string;
  orderAmountCents: number;
  discountAppliedCents: number;
  orderId?: string | null;
}

export interface ApplyPromoCodeResult {
  redemptionId: string;
  promoCodeId: string;
  discountCents: number;
}

export interface PromoUsageConsistency {
  promoCodeId: string;
  totalUses: number;
  redemptionCount: number;
  maxUses: number | null;
  consistent: boolean;
}

export interface ListPromoCodesFilters {
  campaignId?: string;
  isActive?: boolean;
  limit?: number;
  offset?: number;
}
