/**
 * Customer Profile Types
 *
 * A synthetic customer with a personal behavioural baseline.
 * Every anomalous amount in the corpus is a function of the victim's own
 * baseline rather than a fixed currency floor.
 */

export type IncomeTier = 'low' | 'middle' | 'high';

export type MomoChannel = 'ussd' | 'app' | 'agent';

export interface CustomerProfile {
  /** CUST-GH-NNNNN */
  readonly customer_id: string;
  /** MOMO-GH-NNNNN, always present */
  readonly momo_account: string;
  /** BANK-GH-NNNNN, null for MoMo-only (un-banked) customers */
  readonly bank_account: string | null;
  readonly region: string;
  readonly income_tier: IncomeTier;
  /** Characteristic transaction size in GHS */
  readonly typical_amount_ghs: number;
  /** Always round2(typical_amount_ghs * 3) */
  readonly personal_alert_threshold: number;
  readonly typical_channel: MomoChannel;
  /** Hour of day (8-20) */
  readonly typical_tx_hour: number;
  readonly monthly_tx_count: number;
  readonly pin: string;
}

/** A profile known to own a bank account */
export type BankedCustomerProfile = CustomerProfile & { readonly bank_account: string };

export type TierDistribution = Record<IncomeTier, number>;
