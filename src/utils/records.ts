import type { CustomerProfile } from '../types/customer';
import type { AttackType, Labelling } from '../types/transaction';
import { ACCOUNT_PREFIXES } from '../config/catalogs';
import type { SeededRandom } from './random';

const TRANSACTION_ID_MIN = 100000;
const TRANSACTION_ID_MAX = 999999;

export const LEGITIMATE: Labelling = { label: 0, attack_type: 'none' };

export function fraudulent(attackType: AttackType): Labelling {
  return { label: 1, attack_type: attackType };
}

/**
 * Transaction ids share one number space across both channels, so no two
 * records in a run carry the same number.
 */
export function momoTransactionId(rng: SeededRandom): string {
  return `${ACCOUNT_PREFIXES.momoTransaction}${rng.uniqueInt(TRANSACTION_ID_MIN, TRANSACTION_ID_MAX)}`;
}

export function bankTransactionId(rng: SeededRandom): string {
  return `${ACCOUNT_PREFIXES.bankTransaction}${rng.uniqueInt(TRANSACTION_ID_MIN, TRANSACTION_ID_MAX)}`;
}

export function deviceId(rng: SeededRandom): string {
  return `${ACCOUNT_PREFIXES.device}${rng.hex(6)}`;
}

/** AGT-<Region>-NNNN */
export function agentId(rng: SeededRandom, region: string): string {
  const number = String(rng.int(1, 99)).padStart(4, '0');
  return `${ACCOUNT_PREFIXES.agent}${region.replace(/ /g, '')}-${number}`;
}

/**
 * Fresh attacker pseudo-account. The MOMO-ATK- prefix keeps it disjoint
 * from every profile account.
 */
export function attackerAccount(rng: SeededRandom): string {
  return `${ACCOUNT_PREFIXES.attacker}${rng.int(10000, 99999)}`;
}

/** Baseline fields every record echoes from its owner */
export function echoBaseline(customer: CustomerProfile): {
  income_tier: CustomerProfile['income_tier'];
  personal_alert_threshold: number;
} {
  return {
    income_tier: customer.income_tier,
    personal_alert_threshold: customer.personal_alert_threshold,
  };
}
