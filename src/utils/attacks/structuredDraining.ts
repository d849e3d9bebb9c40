/**
 * Attack Pattern 3: Structured Draining
 *
 * Several withdrawals, each just below the victim's personal threshold, in
 * quick succession. No single hit crosses the threshold; the pattern only
 * shows up in aggregated velocity. For a farmer this might be 5 x GHS 280,
 * for a professional 5 x GHS 7,000.
 */

import type { CustomerProfile } from '../../types/customer';
import type { AttackInstance, InjectionResult } from '../../types/corpus';
import type { BankTransaction, MomoTransaction } from '../../types/transaction';
import { REGIONS } from '../../config/catalogs';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { amountBelowPersonalThreshold, roundCurrency } from '../baseline';
import { bankHolders } from '../profiles';
import {
  agentId,
  attackerAccount,
  bankTransactionId,
  deviceId,
  echoBaseline,
  fraudulent,
  momoTransactionId,
} from '../records';
import { MINUTE_MS, isAfterHours } from '../time';
import { attackStart, collectInstances, requireVictims } from './shared';

export const DRAIN_HITS = { min: 3, max: 8 } as const;

/** Minutes between consecutive hits */
export const DRAIN_SPACING_MINUTES = { min: 5, max: 30 } as const;

/** Minutes from each bank leg to its MoMo cash-out */
export const DRAIN_CASHOUT_MINUTES = { min: 1, max: 10 } as const;

export function injectStructuredDraining(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): InjectionResult {
  const victims = bankHolders(profiles);
  requireVictims('structured_drain', victims, count);

  const instances: AttackInstance[] = [];

  for (let i = 0; i < count; i++) {
    const victim = rng.pick(victims);
    const attacker = attackerAccount(rng);
    const startedAt = attackStart(rng, window);
    let balance = roundCurrency(victim.typical_amount_ghs * rng.uniform(5, 12));
    const hits = rng.int(DRAIN_HITS.min, DRAIN_HITS.max);

    const momo: MomoTransaction[] = [];
    const bank: BankTransaction[] = [];
    let hitAt = startedAt;

    for (let hit = 0; hit < hits; hit++) {
      if (hit > 0) {
        hitAt += rng.int(DRAIN_SPACING_MINUTES.min, DRAIN_SPACING_MINUTES.max) * MINUTE_MS;
      }
      const amount = amountBelowPersonalThreshold(rng, victim);
      const balanceAfter = roundCurrency(balance - amount);

      bank.push({
        transaction_id: bankTransactionId(rng),
        timestamp: hitAt,
        account_id: victim.bank_account,
        linked_momo_account: victim.momo_account,
        amount_ghs: amount,
        transaction_type: 'transfer',
        channel: 'momo',
        counterparty_account: victim.momo_account,
        balance_before_ghs: balance,
        balance_after_ghs: balanceAfter,
        location_region: victim.region,
        is_after_hours: isAfterHours(hitAt),
        ...echoBaseline(victim),
        ...fraudulent('structured_drain'),
      });
      balance = balanceAfter;

      const cashOutAt =
        hitAt + rng.int(DRAIN_CASHOUT_MINUTES.min, DRAIN_CASHOUT_MINUTES.max) * MINUTE_MS;

      momo.push({
        transaction_id: momoTransactionId(rng),
        timestamp: cashOutAt,
        sender_account: victim.momo_account,
        receiver_account: attacker,
        amount_ghs: amount,
        transaction_type: 'withdraw',
        channel: 'agent',
        agent_id: agentId(rng, rng.pick(REGIONS)),
        merchant_category: 'unknown',
        location_region: rng.pick(REGIONS),
        device_id: deviceId(rng),
        is_new_device: true,
        otp_requested: false,
        linked_bank_account: victim.bank_account,
        ...echoBaseline(victim),
        ...fraudulent('structured_drain'),
      });
    }

    instances.push({
      attack_type: 'structured_drain',
      victim,
      attacker_account: attacker,
      momo,
      bank,
    });
  }

  return collectInstances(instances);
}
