/**
 * Attack Pattern Injectors
 *
 * Four independent generators. Each returns labelled records whose anomalous
 * amounts are scaled from the victim's personal baseline.
 */

import type { CustomerProfile } from '../../types/customer';
import type { InjectionResult } from '../../types/corpus';
import type { AttackType } from '../../types/transaction';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { injectOtpPhishing } from './otpPhishing';
import { injectAccountTakeover } from './accountTakeover';
import { injectStructuredDraining } from './structuredDraining';
import { injectLateralMovement } from './lateralMovement';

export { injectOtpPhishing } from './otpPhishing';
export { injectAccountTakeover, ATO_BANK_DELAY_MS } from './accountTakeover';
export { injectStructuredDraining, DRAIN_HITS, DRAIN_SPACING_MINUTES } from './structuredDraining';
export {
  injectLateralMovement,
  LATERAL_BANK_DELAY_MS,
  LATERAL_BANK_HITS,
  LATERAL_STAGE2_MULTIPLIER,
} from './lateralMovement';

export type AttackInjector = (
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  count: number,
  window: TimeWindow
) => InjectionResult;

/**
 * Injectors in draw order. Changing this order changes every seeded corpus.
 */
export const ATTACK_PATTERNS: ReadonlyArray<{ type: AttackType; inject: AttackInjector }> = [
  { type: 'otp_phishing', inject: injectOtpPhishing },
  { type: 'account_takeover', inject: injectAccountTakeover },
  { type: 'structured_drain', inject: injectStructuredDraining },
  { type: 'lateral_movement', inject: injectLateralMovement },
];

/**
 * Split total attack instances across the patterns. The remainder goes to
 * the earliest patterns: 122 -> 31, 31, 30, 30.
 */
export function splitAttackInstances(total: number): Record<AttackType, number> {
  const base = Math.floor(total / ATTACK_PATTERNS.length);
  const remainder = total % ATTACK_PATTERNS.length;

  const split: Record<AttackType, number> = {
    otp_phishing: 0,
    account_takeover: 0,
    structured_drain: 0,
    lateral_movement: 0,
  };

  ATTACK_PATTERNS.forEach((pattern, index) => {
    split[pattern.type] = base + (index < remainder ? 1 : 0);
  });

  return split;
}

/**
 * Run every injector in order, each consuming all of its draws before the
 * next starts
 */
export function injectAttacks(
  rng: SeededRandom,
  profiles: readonly CustomerProfile[],
  split: Record<AttackType, number>,
  window: TimeWindow
): Record<AttackType, InjectionResult> {
  const results: Partial<Record<AttackType, InjectionResult>> = {};

  for (const pattern of ATTACK_PATTERNS) {
    results[pattern.type] = pattern.inject(rng, profiles, split[pattern.type], window);
  }

  return {
    otp_phishing: requireResult(results, 'otp_phishing'),
    account_takeover: requireResult(results, 'account_takeover'),
    structured_drain: requireResult(results, 'structured_drain'),
    lateral_movement: requireResult(results, 'lateral_movement'),
  };
}

function requireResult(
  results: Partial<Record<AttackType, InjectionResult>>,
  type: AttackType
): InjectionResult {
  const result = results[type];
  if (!result) {
    throw new Error(`Attack pattern not registered: ${type}`);
  }
  return result;
}
