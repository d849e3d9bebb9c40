/**
 * Attack Pattern 1: OTP Phishing
 *
 * Attacker poses as a merchant and tricks the victim into sharing an OTP.
 * One late-night USSD send from a new device to a fresh attacker account,
 * sized at 3.5x the victim's typical amount.
 */

import type { CustomerProfile } from '../../types/customer';
import type { AttackInstance, InjectionResult } from '../../types/corpus';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { amountAbovePersonalThreshold } from '../baseline';
import { attackerAccount, deviceId, echoBaseline, fraudulent, momoTransactionId } from '../records';
import { attackStart, collectInstances, requireVictims } from './shared';

export function injectOtpPhishing(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
): InjectionResult {
  requireVictims('otp_phishing', profiles, count);

  const instances: AttackInstance[] = [];

  for (let i = 0; i < count; i++) {
    const victim = rng.pick(profiles);
    const attacker = attackerAccount(rng);
    const timestamp = attackStart(rng, window, 22, 23);
    const amount = amountAbovePersonalThreshold(victim);

    instances.push({
      attack_type: 'otp_phishing',
      victim,
      attacker_account: attacker,
      momo: [
        {
          transaction_id: momoTransactionId(rng),
          timestamp,
          sender_account: victim.momo_account,
          receiver_account: attacker,
          amount_ghs: amount,
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
          ...fraudulent('otp_phishing'),
        },
      ],
      bank: [],
    });
  }

  return collectInstances(instances);
}
