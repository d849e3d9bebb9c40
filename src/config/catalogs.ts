import type { IncomeTier, MomoChannel } from '../types/customer';
import type {
  BankChannel,
  BankTransactionType,
  MerchantCategory,
  MomoTransactionType,
} from '../types/transaction';

/**
 * Generation Catalogs
 *
 * Static reference data for the synthetic population. Tier ranges reflect
 * Ghana's socioeconomic spread: 55% low-income (farmers, traders, casual
 * workers), 35% middle, 10% high.
 */

export const REGIONS: readonly string[] = [
  'Greater Accra',
  'Ashanti',
  'Western',
  'Eastern',
  'Central',
  'Northern',
  'Volta',
  'Upper East',
  'Upper West',
  'Brong-Ahafo',
];

export interface IncomeTierRange {
  tier: IncomeTier;
  /** Sampling weight for the categorical draw */
  weight: number;
  min: number;
  max: number;
}

export const INCOME_TIERS: readonly IncomeTierRange[] = [
  { tier: 'low', weight: 0.55, min: 300, max: 800 },
  { tier: 'middle', weight: 0.35, min: 800, max: 3000 },
  { tier: 'high', weight: 0.1, min: 3000, max: 15000 },
];

export const MERCHANT_CATEGORIES: readonly MerchantCategory[] = [
  'food',
  'utility',
  'retail',
  'airtime',
  'transfer',
  'unknown',
];

export const MOMO_TX_TYPES: readonly MomoTransactionType[] = [
  'send',
  'receive',
  'withdraw',
  'airtime',
  'bill_payment',
  'transfer',
];

export const BANK_TX_TYPES: readonly BankTransactionType[] = ['transfer', 'withdrawal', 'deposit', 'momo_link'];

export const MOMO_CHANNELS: readonly MomoChannel[] = ['ussd', 'app', 'agent'];

export const BANK_CHANNELS: readonly BankChannel[] = ['mobile', 'internet', 'atm', 'branch', 'momo'];

/** Probability that a customer holds a bank account */
export const BANK_ACCOUNT_RATE = 0.8;

/** Multiplier from typical amount to personal alert threshold */
export const ALERT_THRESHOLD_MULTIPLIER = 3;

/**
 * Account namespaces. Attacker accounts live under their own prefix so they
 * can never collide with a profile's accounts.
 */
export const ACCOUNT_PREFIXES = {
  customer: 'CUST-GH-',
  momo: 'MOMO-GH-',
  bank: 'BANK-GH-',
  attacker: 'MOMO-ATK-',
  momoTransaction: 'MOMO-TXN-',
  bankTransaction: 'BANK-TXN-',
  device: 'DEV-',
  agent: 'AGT-',
} as const;

/**
 * Bank of Ghana AML reporting floor (GHS). A regulatory filing threshold,
 * printed for context only; no generator compares against it.
 */
export const BOG_REPORTING_THRESHOLD = 10000;

/**
 * Get the sampling range for an income tier
 */
export function getIncomeTier(tier: IncomeTier): IncomeTierRange {
  const range = INCOME_TIERS.find((t) => t.tier === tier);
  if (!range) {
    throw new Error(`Unknown income tier: ${tier}`);
  }
  return range;
}
