/**
 * Customer Profile Model
 *
 * Builds the synthetic population and each customer's behavioural baseline.
 */

import type {
  BankedCustomerProfile,
  CustomerProfile,
  TierDistribution,
} from '../types/customer';
import {
  ACCOUNT_PREFIXES,
  BANK_ACCOUNT_RATE,
  INCOME_TIERS,
  MOMO_CHANNELS,
  REGIONS,
} from '../config/catalogs';
import type { SeededRandom } from './random';
import { personalThreshold, roundCurrency } from './baseline';

function accountSuffix(index: number): string {
  return String(index).padStart(5, '0');
}

/**
 * Generate `count` customer profiles.
 *
 * Draw order per profile: tier, typical amount, bank account, region,
 * channel, typical hour, monthly count, pin.
 */
export function generateProfiles(rng: SeededRandom, count: number): CustomerProfile[] {
  const profiles: CustomerProfile[] = [];
  const weights = INCOME_TIERS.map((t) => t.weight);

  for (let i = 0; i < count; i++) {
    const tier = rng.weightedPick(INCOME_TIERS, weights);
    const typicalAmount = roundCurrency(rng.uniform(tier.min, tier.max));
    const suffix = accountSuffix(i);
    const hasBank = rng.chance(BANK_ACCOUNT_RATE);

    profiles.push({
      customer_id: `${ACCOUNT_PREFIXES.customer}${suffix}`,
      momo_account: `${ACCOUNT_PREFIXES.momo}${suffix}`,
      bank_account: hasBank ? `${ACCOUNT_PREFIXES.bank}${suffix}` : null,
      region: rng.pick(REGIONS),
      income_tier: tier.tier,
      typical_amount_ghs: typicalAmount,
      personal_alert_threshold: personalThreshold(typicalAmount),
      typical_channel: rng.pick(MOMO_CHANNELS),
      typical_tx_hour: rng.int(8, 20),
      monthly_tx_count: rng.int(5, 60),
      pin: String(rng.int(1000, 9999)),
    });
  }

  return profiles;
}

export function hasBankAccount(profile: CustomerProfile): profile is BankedCustomerProfile {
  return profile.bank_account !== null;
}

/**
 * Profiles that own both a MoMo and a bank account
 */
export function bankHolders(profiles: readonly CustomerProfile[]): BankedCustomerProfile[] {
  return profiles.filter(hasBankAccount);
}

/**
 * Count profiles per income tier
 */
export function summarizeTiers(profiles: readonly CustomerProfile[]): TierDistribution {
  const counts: TierDistribution = { low: 0, middle: 0, high: 0 };
  for (const profile of profiles) {
    counts[profile.income_tier]++;
  }
  return counts;
}
