/**
 * Transaction Record Types
 *
 * Two independent streams (MoMo and bank) joined through the owning
 * customer's linked accounts.
 */

import type { IncomeTier, MomoChannel } from './customer';

export type AttackType =
  | 'otp_phishing'
  | 'account_takeover'
  | 'structured_drain'
  | 'lateral_movement';

/** label = 1 iff attack_type !== 'none' */
export type Labelling =
  | { label: 0; attack_type: 'none' }
  | { label: 1; attack_type: AttackType };

export type MomoTransactionType =
  | 'send'
  | 'receive'
  | 'withdraw'
  | 'airtime'
  | 'bill_payment'
  | 'transfer';

export type BankTransactionType = 'transfer' | 'withdrawal' | 'deposit' | 'momo_link';

export type BankChannel = 'mobile' | 'internet' | 'atm' | 'branch' | 'momo';

export type MerchantCategory = 'food' | 'utility' | 'retail' | 'airtime' | 'transfer' | 'unknown';

interface BaseTransaction {
  transaction_id: string;
  /** Unix epoch milliseconds */
  timestamp: number;
  amount_ghs: number;
  location_region: string;
  /** Echoed from the owning profile */
  income_tier: IncomeTier;
  /** Echoed from the owning profile, never recomputed */
  personal_alert_threshold: number;
}

export type MomoTransaction = BaseTransaction &
  Labelling & {
    sender_account: string;
    receiver_account: string;
    transaction_type: MomoTransactionType;
    channel: MomoChannel;
    agent_id: string | null;
    merchant_category: MerchantCategory;
    device_id: string;
    is_new_device: boolean;
    otp_requested: boolean;
    linked_bank_account: string | null;
  };

export type BankTransaction = BaseTransaction &
  Labelling & {
    account_id: string;
    linked_momo_account: string;
    transaction_type: BankTransactionType;
    channel: BankChannel;
    counterparty_account: string;
    balance_before_ghs: number;
    /** Always round2(balance_before_ghs - amount_ghs) */
    balance_after_ghs: number;
    is_after_hours: boolean;
  };

export type Channel = 'momo' | 'bank';
