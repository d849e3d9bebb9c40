import type { CustomerProfile } from '../src/types/customer';
import { personalThreshold } from '../src/utils/baseline';

/** 2024-03-01T00:00:00Z */
export const REFERENCE_TIME = Date.UTC(2024, 2, 1);

export function makeProfile(index: number, overrides: Partial<CustomerProfile> = {}): CustomerProfile {
  const suffix = String(index).padStart(5, '0');
  const typical = overrides.typical_amount_ghs ?? 500;

  return {
    customer_id: `CUST-GH-${suffix}`,
    momo_account: `MOMO-GH-${suffix}`,
    bank_account: `BANK-GH-${suffix}`,
    region: 'Ashanti',
    income_tier: 'low',
    typical_amount_ghs: typical,
    personal_alert_threshold: personalThreshold(typical),
    typical_channel: 'ussd',
    typical_tx_hour: 10,
    monthly_tx_count: 20,
    pin: '1234',
    ...overrides,
  };
}

export function isCents(value: number): boolean {
  return Math.round(value * 100) / 100 === value;
}
