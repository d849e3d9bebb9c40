/**
 * Attack Pattern 4: Cross-Channel Lateral Movement
 *
 * A small MoMo compromise is the entry point; two to three days later the
 * linked bank account is drained in the early morning, each bank transfer
 * cashed out through a MoMo agent minutes afterwards.
 *
 * Stage 1 sits below suspicion on its own (0.8x typical). Stage 2 hits are
 * typical x 3 x 2.5, i.e. 7.5x the victim's typical amount.
 */

import type { CustomerProfile } from '../../types/customer';
import type { AttackInstance, InjectionResult } from '../../types/corpus';
import type { BankTransaction, MomoTransaction } from '../../types/transaction';
import { ALERT_THRESHOLD_MULTIPLIER, REGIONS } from '../../config/catalogs';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { amountAbovePersonalThreshold, roundCurrency } from '../baseline';
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
import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS, utcDayStart } from '../time';
import { attackStart, collectInstances, requireVictims } from './shared';

export const LATERAL_STAGE1_MULTIPLIER = 0.8;
export const LATERAL_STAGE2_MULTIPLIER = ALERT_THRESHOLD_MULTIPLIER * 2.5;
export const LATERAL_BANK_HITS = { min: 2, max: 5 } as const;

/** Every stage-2 bank leg lands 24h <= delay < 72h after stage 1 */
export const LATERAL_BANK_DELAY_MS = { min: 24 * HOUR_MS, max: 72 * HOUR_MS } as const;

/**
 * Stage 2 lands 2-3 calendar days after stage 1 at 01:00-04:59 UTC. With
 * stage 1 at 18:00-22:59 that keeps every bank leg 24h-72h after it.
 */
const STAGE2_DAYS = { min: 2, max: 3 } as const;
const STAGE2_HOURS = { min: 1, max: 4 } as const;
const CASHOUT_MINUTES = { min: 2, max: 15 } as const;

export function injectLateralMovement(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): InjectionResult {
  const victims = bankHolders(profiles);
  requireVictims('lateral_movement', victims, count);

  const instances: AttackInstance[] = [];

  for (let i = 0; i < count; i++) {
    const victim = rng.pick(victims);
    const attacker = attackerAccount(rng);
    const stage1At = attackStart(rng, window, 18, 22);
    const stage1Amount = roundCurrency(victim.typical_amount_ghs * LATERAL_STAGE1_MULTIPLIER);
    let balance = roundCurrency(victim.typical_amount_ghs * rng.uniform(4, 10));

    const momo: MomoTransaction[] = [
      {
        transaction_id: momoTransactionId(rng),
        timestamp: stage1At,
        sender_account: victim.momo_account,
        receiver_account: attacker,
        amount_ghs: stage1Amount,
        transaction_type: 'send',
        channel: 'ussd',
        agent_id: null,
        merchant_category: 'unknown',
        location_region: victim.region,
        device_id: deviceId(rng),
        is_new_device: true,
        otp_requested: true,
        linked_bank_account: victim.bank_account,
        ...echoBaseline(victim),
        ...fraudulent('lateral_movement'),
      },
    ];
    const bank: BankTransaction[] = [];

    const hits = rng.int(LATERAL_BANK_HITS.min, LATERAL_BANK_HITS.max);
    for (let hit = 0; hit < hits; hit++) {
      const stage2At =
        utcDayStart(stage1At) +
        rng.int(STAGE2_DAYS.min, STAGE2_DAYS.max) * DAY_MS +
        rng.int(STAGE2_HOURS.min, STAGE2_HOURS.max) * HOUR_MS +
        rng.int(0, 3599) * SECOND_MS;
      const amount = amountAbovePersonalThreshold(victim, LATERAL_STAGE2_MULTIPLIER);
      const balanceAfter = roundCurrency(balance - amount);

      bank.push({
        transaction_id: bankTransactionId(rng),
        timestamp: stage2At,
        account_id: victim.bank_account,
        linked_momo_account: victim.momo_account,
        amount_ghs: amount,
        transaction_type: 'transfer',
        channel: 'momo',
        counterparty_account: victim.momo_account,
        balance_before_ghs: balance,
        balance_after_ghs: balanceAfter,
        location_region: rng.pick(REGIONS),
        is_after_hours: true,
        ...echoBaseline(victim),
        ...fraudulent('lateral_movement'),
      });
      balance = balanceAfter;

      momo.push({
        transaction_id: momoTransactionId(rng),
        timestamp: stage2At + rng.int(CASHOUT_MINUTES.min, CASHOUT_MINUTES.max) * MINUTE_MS,
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
        ...fraudulent('lateral_movement'),
      });
    }

    instances.push({
      attack_type: 'lateral_movement',
      victim,
      attacker_account: attacker,
      momo,
      bank,
    });
  }

  return collectInstances(instances);
}
