/**
 * Attack Pattern 2: Account Takeover (ATO)
 *
 * Attacker uses a shared PIN to take over the MoMo wallet, then pivots to
 * the linked bank account one to three days later.
 * Signals: new device, after-hours, channel switch, same linked accounts.
 */

import type { CustomerProfile } from '../../types/customer';
import type { AttackInstance, InjectionResult } from '../../types/corpus';
import type { BankTransaction, MomoTransaction } from '../../types/transaction';
import { REGIONS } from '../../config/catalogs';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { amountAbovePersonalThreshold, roundCurrency } from '../baseline';
import { bankHolders } from '../profiles';
import {
  attackerAccount,
  bankTransactionId,
  deviceId,
  echoBaseline,
  fraudulent,
  momoTransactionId,
} from '../records';
import { HOUR_MS, SECOND_MS } from '../time';
import { attackStart, collectInstances, requireVictims } from './shared';

/** Bank leg follows the MoMo leg by 24h <= delay < 72h */
export const ATO_BANK_DELAY_MS = { min: 24 * HOUR_MS, max: 72 * HOUR_MS } as const;

export function injectAccountTakeover(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): InjectionResult {
  const victims = bankHolders(profiles);
  requireVictims('account_takeover', victims, count);

  const instances: AttackInstance[] = [];

  for (let i = 0; i < count; i++) {
    const victim = rng.pick(victims);
    const timestamp = attackStart(rng, window, 1, 5);
    const amount = amountAbovePersonalThreshold(victim);
    const balanceBefore = roundCurrency(victim.typical_amount_ghs * rng.uniform(4, 10));
    const attacker = attackerAccount(rng);

    const momoLeg: MomoTransaction = {
      transaction_id: momoTransactionId(rng),
      timestamp,
      sender_account: victim.momo_account,
      receiver_account: attacker,
      amount_ghs: amount,
      transaction_type: 'transfer',
      channel: 'app',
      agent_id: null,
      merchant_category: 'transfer',
      location_region: rng.pick(REGIONS),
      device_id: deviceId(rng),
      is_new_device: true,
      otp_requested: false,
      linked_bank_account: victim.bank_account,
      ...echoBaseline(victim),
      ...fraudulent('account_takeover'),
    };

    const delaySeconds = rng.int(
      ATO_BANK_DELAY_MS.min / SECOND_MS,
      ATO_BANK_DELAY_MS.max / SECOND_MS - 1
    );

    const bankLeg: BankTransaction = {
      transaction_id: bankTransactionId(rng),
      timestamp: timestamp + delaySeconds * SECOND_MS,
      account_id: victim.bank_account,
      linked_momo_account: victim.momo_account,
      amount_ghs: amount,
      transaction_type: 'transfer',
      channel: 'momo',
      counterparty_account: victim.momo_account,
      balance_before_ghs: balanceBefore,
      balance_after_ghs: roundCurrency(balanceBefore - amount),
      location_region: rng.pick(REGIONS),
      is_after_hours: true,
      ...echoBaseline(victim),
      ...fraudulent('account_takeover'),
    };

    instances.push({
      attack_type: 'account_takeover',
      victim,
      attacker_account: attacker,
      momo: [momoLeg],
      bank: [bankLeg],
    });
  }

  return collectInstances(instances);
}
