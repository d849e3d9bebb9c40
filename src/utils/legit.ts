/**
 * Legitimate Transaction Synthesizer
 *
 * Normal traffic sampled around each customer's baseline. Legitimate records
 * never carry the new-device or after-hours flags.
 */

import type { CustomerProfile } from '../types/customer';
import type { BankTransaction, MomoTransaction } from '../types/transaction';
import {
  BANK_CHANNELS,
  BANK_TX_TYPES,
  MERCHANT_CATEGORIES,
  MOMO_TX_TYPES,
} from '../config/catalogs';
import type { SeededRandom } from './random';
import { amountAroundBaseline, roundCurrency } from './baseline';
import { bankHolders } from './profiles';
import { randomTimestamp } from './time';
import {
  LEGITIMATE,
  agentId,
  bankTransactionId,
  deviceId,
  echoBaseline,
  momoTransactionId,
} from './records';
import { InsufficientPopulationError } from './errors';

export interface TimeWindow {
  /** End of the window, Unix ms */
  reference: number;
  days: number;
}

const MOMO_SPREAD = 0.3;
const BANK_SPREAD = 0.5;
const BANK_AMOUNT_MULTIPLIER = 2;
const BALANCE_MAX_MULTIPLIER = 10;
const OTP_REQUEST_RATE = 0.2;

/**
 * Generate `count` legitimate MoMo transactions
 */
export function generateLegitMomo(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): MomoTransaction[] {
  if (count > 0 && profiles.length === 0) {
    throw new InsufficientPopulationError('legitimate_momo', 1, 0);
  }

  const records: MomoTransaction[] = [];

  for (let i = 0; i < count; i++) {
    const customer = rng.pick(profiles);
    const counterparty = rng.pick(profiles);
    const timestamp = randomTimestamp(rng, window.reference, window.days);
    const amount = amountAroundBaseline(
      rng,
      customer.typical_amount_ghs,
      customer.typical_amount_ghs * MOMO_SPREAD
    );

    records.push({
      transaction_id: momoTransactionId(rng),
      timestamp,
      sender_account: customer.momo_account,
      receiver_account: counterparty.momo_account,
      amount_ghs: amount,
      transaction_type: rng.pick(MOMO_TX_TYPES),
      channel: customer.typical_channel,
      agent_id: customer.typical_channel === 'agent' ? agentId(rng, customer.region) : null,
      merchant_category: rng.pick(MERCHANT_CATEGORIES),
      location_region: customer.region,
      device_id: deviceId(rng),
      is_new_device: false,
      otp_requested: rng.chance(OTP_REQUEST_RATE),
      linked_bank_account: customer.bank_account,
      ...echoBaseline(customer),
      ...LEGITIMATE,
    });
  }

  return records;
}

/**
 * Generate `count` legitimate bank transactions between bank holders
 */
export function generateLegitBank(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): BankTransaction[] {
  const holders = bankHolders(profiles);
  if (count > 0 && holders.length === 0) {
    throw new InsufficientPopulationError('legitimate_bank', 1, 0);
  }

  const records: BankTransaction[] = [];

  for (let i = 0; i < count; i++) {
    const customer = rng.pick(holders);
    const counterparty = rng.pick(holders);
    const timestamp = randomTimestamp(rng, window.reference, window.days);
    const amount = amountAroundBaseline(
      rng,
      customer.typical_amount_ghs * BANK_AMOUNT_MULTIPLIER,
      customer.typical_amount_ghs * BANK_SPREAD
    );
    const balanceBefore = roundCurrency(
      rng.uniform(customer.typical_amount_ghs, customer.typical_amount_ghs * BALANCE_MAX_MULTIPLIER)
    );

    records.push({
      transaction_id: bankTransactionId(rng),
      timestamp,
      account_id: customer.bank_account,
      linked_momo_account: customer.momo_account,
      amount_ghs: amount,
      transaction_type: rng.pick(BANK_TX_TYPES),
      channel: rng.pick(BANK_CHANNELS),
      counterparty_account: counterparty.bank_account,
      balance_before_ghs: balanceBefore,
      balance_after_ghs: roundCurrency(balanceBefore - amount),
      location_region: customer.region,
      is_after_hours: false,
      ...echoBaseline(customer),
      ...LEGITIMATE,
    });
  }

  return records;
}
