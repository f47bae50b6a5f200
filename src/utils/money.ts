import { campaignConfig } from '../config/campaign.config';

/**
 * Convert cents to major currency units
 */
export function centsToDollars(cents: number): number {
  return cents / 100;
}

/**
 * Format cents as currency string
 */
export function formatCents(cents: number, currency = campaignConfig.currency.default): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
  }).format(centsToDollars(cents));
}

/**
 * Percentage of an amount in cents, rounded down so a discount never
 * gains a fractional cent
 */
export function percentageOfCents(amountCents: number, percentage: number): number {
  return Math.floor((amountCents * percentage) / 100);
}

export function clampCents(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
