/**
 * Corpus Assembler
 *
 * Merges legitimate and injected records per channel, orders them by time
 * and reports per-channel counts.
 */

import type { CustomerProfile } from '../types/customer';
import type {
  AttackInstance,
  ChannelSummary,
  Corpus,
  CorpusSummary,
  GeneratedCorpus,
  InjectionResult,
  InvariantViolation,
} from '../types/corpus';
import type { AttackType, BankTransaction, MomoTransaction } from '../types/transaction';
import { ACCOUNT_PREFIXES } from '../config/catalogs';
import type { GeneratorConfig } from '../config/generator';
import { logger } from '../config/logger';
import { SeededRandom } from './random';
import { generateProfiles, summarizeTiers } from './profiles';
import { generateLegitBank, generateLegitMomo, type TimeWindow } from './legit';
import {
  ATO_BANK_DELAY_MS,
  ATTACK_PATTERNS,
  DRAIN_HITS,
  LATERAL_BANK_DELAY_MS,
  LATERAL_BANK_HITS,
  LATERAL_STAGE2_MULTIPLIER,
  injectAttacks,
  splitAttackInstances,
} from './attacks';
import { DRAIN_BAND, amountAbovePersonalThreshold, roundCurrency } from './baseline';
import { DAY_MS } from './time';

function byTimestamp(a: { timestamp: number }, b: { timestamp: number }): number {
  return a.timestamp - b.timestamp;
}

/**
 * Concatenate per channel (legitimate first, then injectors in order) and
 * stable-sort by timestamp. Nothing is deduplicated.
 */
export function assembleCorpus(
  legit: Corpus,
  injections: readonly InjectionResult[]
): Corpus {
  const momo: MomoTransaction[] = [...legit.momo];
  const bank: BankTransaction[] = [...legit.bank];

  for (const injection of injections) {
    momo.push(...injection.momo);
    bank.push(...injection.bank);
  }

  return {
    momo: momo.sort(byTimestamp),
    bank: bank.sort(byTimestamp),
  };
}

function summarizeChannel(records: ReadonlyArray<MomoTransaction | BankTransaction>): ChannelSummary {
  const byAttackType: Record<AttackType, number> = {
    otp_phishing: 0,
    account_takeover: 0,
    structured_drain: 0,
    lateral_movement: 0,
  };
  let fraudulent = 0;

  for (const record of records) {
    if (record.label === 1) {
      fraudulent++;
      byAttackType[record.attack_type]++;
    }
  }

  return {
    total: records.length,
    legitimate: records.length - fraudulent,
    fraudulent,
    by_attack_type: byAttackType,
  };
}

export function summarizeCorpus(corpus: Corpus): CorpusSummary {
  return {
    momo: summarizeChannel(corpus.momo),
    bank: summarizeChannel(corpus.bank),
  };
}

/**
 * Check the derived-field and join-key rules over a whole corpus.
 * Returns every violation found; an empty list means the corpus is coherent.
 */
export function checkCorpusInvariants(
  corpus: Corpus,
  profiles: readonly CustomerProfile[]
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const byMomo = new Map(profiles.map((p) => [p.momo_account, p]));
  const byBank = new Map<string, CustomerProfile>();
  for (const profile of profiles) {
    if (profile.bank_account) {
      byBank.set(profile.bank_account, profile);
    }
  }

  for (const profile of profiles) {
    if (profile.personal_alert_threshold !== roundCurrency(profile.typical_amount_ghs * 3)) {
      violations.push({ channel: 'profile', transaction_id: profile.customer_id, rule: 'threshold' });
    }
  }

  for (const record of corpus.momo) {
    const fail = (rule: string) =>
      violations.push({ channel: 'momo', transaction_id: record.transaction_id, rule });

    if ((record.label === 1) !== (record.attack_type !== 'none')) {
      fail('label');
    }
    const owner = byMomo.get(record.sender_account);
    if (!owner) {
      fail('sender_not_customer');
      continue;
    }
    if (owner.bank_account !== record.linked_bank_account) {
      fail('linked_bank_account');
    }
    if (owner.personal_alert_threshold !== record.personal_alert_threshold) {
      fail('threshold_echo');
    }
    const attackerSide = record.receiver_account.startsWith(ACCOUNT_PREFIXES.attacker);
    if (attackerSide && record.label === 0) {
      fail('attacker_in_legitimate');
    }
  }

  for (const record of corpus.bank) {
    const fail = (rule: string) =>
      violations.push({ channel: 'bank', transaction_id: record.transaction_id, rule });

    if ((record.label === 1) !== (record.attack_type !== 'none')) {
      fail('label');
    }
    if (record.balance_after_ghs !== roundCurrency(record.balance_before_ghs - record.amount_ghs)) {
      fail('balance');
    }
    const owner = byBank.get(record.account_id);
    if (!owner) {
      fail('account_not_customer');
      continue;
    }
    if (owner.momo_account !== record.linked_momo_account) {
      fail('linked_momo_account');
    }
    if (owner.personal_alert_threshold !== record.personal_alert_threshold) {
      fail('threshold_echo');
    }
  }

  return violations;
}

type Bounds = { readonly min: number; readonly max: number };

function delayWithin(delay: number, bounds: Bounds): boolean {
  return delay >= bounds.min && delay < bounds.max;
}

function earliest<T extends { timestamp: number }>(records: readonly T[]): T | undefined {
  return records.reduce<T | undefined>(
    (min, record) => (min === undefined || record.timestamp < min.timestamp ? record : min),
    undefined
  );
}

function inRange(value: number, bounds: Bounds): boolean {
  return value >= bounds.min && value <= bounds.max;
}

/**
 * Check the per-pattern timing and amount rules over the injected instances:
 * every instance starts inside the attack window, ATO and lateral bank legs
 * trail the MoMo compromise by 24h-72h, hit counts stay in range and drain
 * hits stay inside the band below the personal threshold.
 */
export function checkAttackInvariants(
  attacks: Record<AttackType, readonly AttackInstance[]>,
  window: TimeWindow
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const windowStart = window.reference - window.days * DAY_MS;

  const failMomo = (record: MomoTransaction, rule: string) =>
    violations.push({ channel: 'momo', transaction_id: record.transaction_id, rule });
  const failBank = (record: BankTransaction, rule: string) =>
    violations.push({ channel: 'bank', transaction_id: record.transaction_id, rule });

  const outsideWindow = (timestamp: number) =>
    timestamp < windowStart || timestamp > window.reference;

  for (const instances of Object.values(attacks)) {
    for (const instance of instances) {
      const startMomo = earliest(instance.momo);
      const startBank = earliest(instance.bank);
      if (startBank && (!startMomo || startBank.timestamp < startMomo.timestamp)) {
        if (outsideWindow(startBank.timestamp)) {
          failBank(startBank, 'attack_window');
        }
      } else if (startMomo && outsideWindow(startMomo.timestamp)) {
        failMomo(startMomo, 'attack_window');
      }
    }
  }

  for (const instance of attacks.account_takeover) {
    const [momo] = instance.momo;
    if (instance.momo.length !== 1 || instance.bank.length !== 1) {
      for (const record of instance.momo) {
        failMomo(record, 'ato_legs');
      }
      continue;
    }
    const [bank] = instance.bank;
    if (!delayWithin(bank.timestamp - momo.timestamp, ATO_BANK_DELAY_MS)) {
      failBank(bank, 'ato_delay');
    }
  }

  for (const instance of attacks.structured_drain) {
    const [firstHit] = instance.bank;
    if (firstHit && !inRange(instance.bank.length, DRAIN_HITS)) {
      failBank(firstHit, 'drain_hits');
    }
    if (instance.momo.length !== instance.bank.length) {
      for (const cashOut of instance.momo) {
        failMomo(cashOut, 'drain_cashouts');
      }
    }
    const threshold = instance.victim.personal_alert_threshold;
    const band = {
      min: roundCurrency(threshold * DRAIN_BAND.min),
      max: roundCurrency(threshold * DRAIN_BAND.max),
    };
    for (const hit of instance.bank) {
      if (!inRange(hit.amount_ghs, band)) {
        failBank(hit, 'drain_band');
      }
    }
  }

  for (const instance of attacks.lateral_movement) {
    const [stage1] = instance.momo;
    const [firstHit] = instance.bank;
    if (firstHit && !inRange(instance.bank.length, LATERAL_BANK_HITS)) {
      failBank(firstHit, 'lateral_hits');
    }
    const expected = amountAbovePersonalThreshold(instance.victim, LATERAL_STAGE2_MULTIPLIER);
    for (const hit of instance.bank) {
      if (stage1 && !delayWithin(hit.timestamp - stage1.timestamp, LATERAL_BANK_DELAY_MS)) {
        failBank(hit, 'lateral_delay');
      }
      if (hit.amount_ghs !== expected) {
        failBank(hit, 'lateral_amount');
      }
    }
  }

  return violations;
}

/**
 * Run the full pipeline for a config.
 *
 * Draw order is fixed: profiles, legitimate MoMo, legitimate bank, then the
 * four injectors. Same config, same output.
 */
export function generateCorpus(config: GeneratorConfig): GeneratedCorpus {
  const rng = new SeededRandom(config.seed);
  const legitWindow = { reference: config.reference_time, days: config.window_days };
  const attackWindow = { reference: config.reference_time, days: config.attack_window_days };

  const profiles = generateProfiles(rng, config.customers);
  const tiers = summarizeTiers(profiles);
  logger.info({ customers: profiles.length, tiers }, 'Generated customer profiles');

  const momoLegit = generateLegitMomo(rng, profiles, config.momo_legit, legitWindow);
  logger.info({ count: momoLegit.length }, 'Generated legitimate MoMo transactions');

  const bankLegit = generateLegitBank(rng, profiles, config.bank_legit, legitWindow);
  logger.info({ count: bankLegit.length }, 'Generated legitimate bank transactions');

  const split = splitAttackInstances(config.attacks);
  const injected = injectAttacks(rng, profiles, split, attackWindow);
  logger.info({ split }, 'Injected attack patterns');

  const corpus = assembleCorpus(
    { momo: momoLegit, bank: bankLegit },
    ATTACK_PATTERNS.map((pattern) => injected[pattern.type])
  );
  const summary = summarizeCorpus(corpus);
  logger.info({ momo: summary.momo.total, bank: summary.bank.total }, 'Assembled corpus');

  return {
    profiles,
    corpus,
    summary,
    tiers,
    instances: {
      otp_phishing: injected.otp_phishing.instances.length,
      account_takeover: injected.account_takeover.instances.length,
      structured_drain: injected.structured_drain.instances.length,
      lateral_movement: injected.lateral_movement.instances.length,
    },
    attacks: {
      otp_phishing: injected.otp_phishing.instances,
      account_takeover: injected.account_takeover.instances,
      structured_drain: injected.structured_drain.instances,
      lateral_movement: injected.lateral_movement.instances,
    },
  };
}
