/**
 * Behavioural Baseline Amounts
 *
 * Every anomalous amount is scaled from the victim's own baseline. A GHS 400
 * farmer and a GHS 8,000 professional hit with the same multiplier are
 * equally anomalous relative to their history.
 */

import type { CustomerProfile } from '../types/customer';
import { ALERT_THRESHOLD_MULTIPLIER } from '../config/catalogs';
import type { SeededRandom } from './random';

/** Default multiplier for amounts above the personal threshold */
export const ABOVE_THRESHOLD_MULTIPLIER = 3.5;

/** Structured draining stays inside this band of the personal threshold */
export const DRAIN_BAND = { min: 0.7, max: 0.9 } as const;

/**
 * Round to cent precision
 */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Personal alert threshold for a typical amount
 */
export function personalThreshold(typicalAmount: number): number {
  return roundCurrency(typicalAmount * ALERT_THRESHOLD_MULTIPLIER);
}

/**
 * Amount scaled from the victim's typical transaction.
 * GHS 400 typical -> GHS 1,400 at the default 3.5x.
 */
export function amountAbovePersonalThreshold(
  customer: CustomerProfile,
  multiplier: number = ABOVE_THRESHOLD_MULTIPLIER
): number {
  return roundCurrency(customer.typical_amount_ghs * multiplier);
}

/**
 * Single draining hit, kept just below the victim's personal threshold
 */
export function amountBelowPersonalThreshold(rng: SeededRandom, customer: CustomerProfile): number {
  const threshold = customer.personal_alert_threshold;
  return roundCurrency(rng.uniform(threshold * DRAIN_BAND.min, threshold * DRAIN_BAND.max));
}

/**
 * Positive amount sampled around a baseline: |N(mean, stddev)|
 */
export function amountAroundBaseline(rng: SeededRandom, mean: number, stddev: number): number {
  return roundCurrency(Math.abs(rng.normal(mean, stddev)));
}
