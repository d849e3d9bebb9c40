import { describe, it, expect } from 'vitest';
import { SeededRandom } from '../src/utils/random';
import { generateProfiles } from '../src/utils/profiles';
import { roundCurrency } from '../src/utils/baseline';
import {
  injectAccountTakeover,
  injectLateralMovement,
  injectOtpPhishing,
  injectStructuredDraining,
  splitAttackInstances,
} from '../src/utils/attacks';
import { attackStart } from '../src/utils/attacks/shared';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../src/utils/time';
import { InsufficientPopulationError } from '../src/utils/errors';
import { REFERENCE_TIME, makeProfile } from './helpers';

const window = { reference: REFERENCE_TIME, days: 30 };

function utcHour(timestamp: number): number {
  return new Date(timestamp).getUTCHours();
}

describe('splitAttackInstances', () => {
  it('splits evenly across the four patterns', () => {
    expect(splitAttackInstances(120)).toEqual({
      otp_phishing: 30,
      account_takeover: 30,
      structured_drain: 30,
      lateral_movement: 30,
    });
  });

  it('gives the remainder to the earliest patterns', () => {
    expect(splitAttackInstances(122)).toEqual({
      otp_phishing: 31,
      account_takeover: 31,
      structured_drain: 30,
      lateral_movement: 30,
    });
    expect(splitAttackInstances(3)).toEqual({
      otp_phishing: 1,
      account_takeover: 1,
      structured_drain: 1,
      lateral_movement: 0,
    });
  });
});

describe('injectOtpPhishing', () => {
  const rng = new SeededRandom(31);
  const profiles = generateProfiles(rng, 150);
  const result = injectOtpPhishing(rng, profiles, 30, window);

  it('emits one late-night USSD send per instance', () => {
    expect(result.instances).toHaveLength(30);
    expect(result.momo).toHaveLength(30);
    expect(result.bank).toHaveLength(0);

    for (const instance of result.instances) {
      const [record] = instance.momo;
      expect(instance.momo).toHaveLength(1);
      expect(record.sender_account).toBe(instance.victim.momo_account);
      expect(record.receiver_account).toBe(instance.attacker_account);
      expect(record.receiver_account).toMatch(/^MOMO-ATK-\d{5}$/);
      expect(record.amount_ghs).toBe(roundCurrency(instance.victim.typical_amount_ghs * 3.5));
      expect([22, 23]).toContain(utcHour(record.timestamp));
      expect(record.timestamp).toBeLessThanOrEqual(REFERENCE_TIME);
      expect(record.timestamp).toBeGreaterThanOrEqual(REFERENCE_TIME - 30 * DAY_MS);
      expect(record.channel).toBe('ussd');
      expect(record.merchant_category).toBe('unknown');
      expect(record.is_new_device).toBe(true);
      expect(record.otp_requested).toBe(true);
      expect(record.label).toBe(1);
      expect(record.attack_type).toBe('otp_phishing');
    }
  });

  it('scales a farmer-tier hit from their own baseline, not a fixed floor', () => {
    const farmer = makeProfile(0, { typical_amount_ghs: 400 });
    const [record] = injectOtpPhishing(new SeededRandom(2), [farmer], 1, window).momo;
    expect(farmer.personal_alert_threshold).toBe(1200);
    expect(record.amount_ghs).toBe(1400);
    expect(record.amount_ghs).toBeGreaterThan(farmer.personal_alert_threshold);
    expect(record.amount_ghs).toBeLessThan(10000);
  });

  it('fails when the population is smaller than the instance count', () => {
    const tiny = [makeProfile(0), makeProfile(1)];
    expect(() => injectOtpPhishing(new SeededRandom(2), tiny, 3, window)).toThrow(
      InsufficientPopulationError
    );
  });
});

describe('injectAccountTakeover', () => {
  const rng = new SeededRandom(37);
  const profiles = generateProfiles(rng, 150);
  const result = injectAccountTakeover(rng, profiles, 30, window);

  it('pairs a new-device MoMo transfer with a bank transfer 24-72h later', () => {
    expect(result.instances).toHaveLength(30);
    for (const instance of result.instances) {
      const [momo] = instance.momo;
      const [bank] = instance.bank;
      const delay = bank.timestamp - momo.timestamp;

      expect(delay).toBeGreaterThanOrEqual(24 * HOUR_MS);
      expect(delay).toBeLessThan(72 * HOUR_MS);
      expect(utcHour(momo.timestamp)).toBeGreaterThanOrEqual(1);
      expect(utcHour(momo.timestamp)).toBeLessThanOrEqual(5);
      expect(momo.is_new_device).toBe(true);
      expect(momo.channel).toBe('app');
      expect(bank.is_after_hours).toBe(true);
      expect(bank.channel).toBe('momo');
    }
  });

  it('links both legs through the victim accounts', () => {
    for (const instance of result.instances) {
      const [momo] = instance.momo;
      const [bank] = instance.bank;
      expect(instance.victim.bank_account).not.toBeNull();
      expect(momo.linked_bank_account).toBe(instance.victim.bank_account);
      expect(bank.account_id).toBe(instance.victim.bank_account);
      expect(bank.linked_momo_account).toBe(instance.victim.momo_account);
      expect(bank.counterparty_account).toBe(instance.victim.momo_account);
      expect(bank.amount_ghs).toBe(momo.amount_ghs);
      expect(momo.amount_ghs).toBe(roundCurrency(instance.victim.typical_amount_ghs * 3.5));
      expect(bank.balance_after_ghs).toBe(roundCurrency(bank.balance_before_ghs - bank.amount_ghs));
    }
  });

  it('rejects a population without enough bank holders', () => {
    const profiles = [makeProfile(0), makeProfile(1, { bank_account: null }), makeProfile(2)];
    try {
      injectAccountTakeover(new SeededRandom(4), profiles, 3, window);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientPopulationError);
      if (error instanceof InsufficientPopulationError) {
        expect(error.pattern).toBe('account_takeover');
        expect(error.required).toBe(3);
        expect(error.available).toBe(2);
      }
    }
  });

  it('returns nothing for zero instances even with no bank holders', () => {
    const unbanked = [makeProfile(0, { bank_account: null })];
    expect(injectAccountTakeover(new SeededRandom(4), unbanked, 0, window)).toEqual({
      instances: [],
      momo: [],
      bank: [],
    });
  });
});

describe('injectStructuredDraining', () => {
  const rng = new SeededRandom(41);
  const profiles = generateProfiles(rng, 150);
  const result = injectStructuredDraining(rng, profiles, 30, window);

  it('emits 3-8 paired hits per instance', () => {
    expect(result.instances).toHaveLength(30);
    for (const instance of result.instances) {
      expect(instance.bank.length).toBeGreaterThanOrEqual(3);
      expect(instance.bank.length).toBeLessThanOrEqual(8);
      expect(instance.momo).toHaveLength(instance.bank.length);
    }
  });

  it('keeps every hit in the 0.7-0.9 band of the personal threshold', () => {
    for (const instance of result.instances) {
      const threshold = instance.victim.personal_alert_threshold;
      for (const record of instance.bank) {
        expect(record.amount_ghs).toBeGreaterThanOrEqual(threshold * 0.7 - 0.005);
        expect(record.amount_ghs).toBeLessThanOrEqual(threshold * 0.9 + 0.005);
        expect(record.amount_ghs).toBeLessThan(threshold);
      }
    }
  });

  it('spaces hits 5-30 minutes apart and cashes out 1-10 minutes after each', () => {
    for (const instance of result.instances) {
      instance.bank.forEach((record, k) => {
        const cashOut = instance.momo[k];
        const lag = cashOut.timestamp - record.timestamp;
        expect(lag).toBeGreaterThanOrEqual(MINUTE_MS);
        expect(lag).toBeLessThanOrEqual(10 * MINUTE_MS);
        expect(cashOut.amount_ghs).toBe(record.amount_ghs);
        expect(cashOut.receiver_account).toBe(instance.attacker_account);
        expect(cashOut.transaction_type).toBe('withdraw');
        expect(cashOut.channel).toBe('agent');
        expect(cashOut.agent_id).toMatch(/^AGT-/);

        if (k > 0) {
          const gap = record.timestamp - instance.bank[k - 1].timestamp;
          expect(gap).toBeGreaterThanOrEqual(5 * MINUTE_MS);
          expect(gap).toBeLessThanOrEqual(30 * MINUTE_MS);
        }
      });
    }
  });

  it('decrements the bank balance cumulatively across hits', () => {
    for (const instance of result.instances) {
      instance.bank.forEach((record, k) => {
        expect(record.balance_after_ghs).toBe(roundCurrency(record.balance_before_ghs - record.amount_ghs));
        if (k > 0) {
          expect(record.balance_before_ghs).toBe(instance.bank[k - 1].balance_after_ghs);
        }
      });
    }
  });

  it('derives the after-hours flag from the hit hour', () => {
    for (const record of result.bank) {
      const hour = utcHour(record.timestamp);
      expect(record.is_after_hours).toBe(hour > 22 || hour < 6);
    }
  });
});

describe('injectLateralMovement', () => {
  const rng = new SeededRandom(43);
  const profiles = generateProfiles(rng, 150);
  const result = injectLateralMovement(rng, profiles, 30, window);

  it('opens with a small evening MoMo compromise', () => {
    for (const instance of result.instances) {
      const [stage1] = instance.momo;
      expect(stage1.amount_ghs).toBe(roundCurrency(instance.victim.typical_amount_ghs * 0.8));
      expect(stage1.amount_ghs).toBeLessThan(instance.victim.personal_alert_threshold);
      expect(utcHour(stage1.timestamp)).toBeGreaterThanOrEqual(18);
      expect(utcHour(stage1.timestamp)).toBeLessThanOrEqual(22);
      expect(stage1.otp_requested).toBe(true);
      expect(stage1.is_new_device).toBe(true);
      expect(stage1.transaction_type).toBe('send');
      expect(stage1.receiver_account).toBe(instance.attacker_account);
    }
  });

  it('drains the linked bank account 24-72h after the compromise', () => {
    for (const instance of result.instances) {
      const [stage1] = instance.momo;
      expect(instance.bank.length).toBeGreaterThanOrEqual(2);
      expect(instance.bank.length).toBeLessThanOrEqual(5);
      expect(instance.momo).toHaveLength(instance.bank.length + 1);

      for (const bank of instance.bank) {
        const delay = bank.timestamp - stage1.timestamp;
        expect(delay).toBeGreaterThanOrEqual(24 * HOUR_MS);
        expect(delay).toBeLessThan(72 * HOUR_MS);
        expect(utcHour(bank.timestamp)).toBeGreaterThanOrEqual(1);
        expect(utcHour(bank.timestamp)).toBeLessThanOrEqual(4);
        expect(bank.is_after_hours).toBe(true);
        expect(bank.amount_ghs).toBe(roundCurrency(instance.victim.typical_amount_ghs * 7.5));
        expect(bank.account_id).toBe(instance.victim.bank_account);
        expect(bank.linked_momo_account).toBe(stage1.sender_account);
        expect(stage1.linked_bank_account).toBe(bank.account_id);
      }
    }
  });

  it('cashes out each bank leg through an agent 2-15 minutes later', () => {
    for (const instance of result.instances) {
      instance.bank.forEach((bank, k) => {
        const withdraw = instance.momo[k + 1];
        const lag = withdraw.timestamp - bank.timestamp;
        expect(lag).toBeGreaterThanOrEqual(2 * MINUTE_MS);
        expect(lag).toBeLessThanOrEqual(15 * MINUTE_MS);
        expect(withdraw.transaction_type).toBe('withdraw');
        expect(withdraw.receiver_account).toBe(instance.attacker_account);
        expect(withdraw.amount_ghs).toBe(bank.amount_ghs);
        expect(withdraw.label).toBe(1);
        expect(withdraw.attack_type).toBe('lateral_movement');
      });
    }
  });
});

describe('attackStart', () => {
  const midday = Date.UTC(2024, 2, 1, 12);

  it('keeps hour-shifted starts inside a window ending mid-day', () => {
    const rng = new SeededRandom(5);
    const window = { reference: midday, days: 30 };

    for (let i = 0; i < 5000; i++) {
      const start = attackStart(rng, window, 1, 5);
      expect(start).toBeGreaterThanOrEqual(midday - 30 * DAY_MS);
      expect(start).toBeLessThanOrEqual(midday);
      expect(utcHour(start)).toBeGreaterThanOrEqual(1);
      expect(utcHour(start)).toBeLessThanOrEqual(5);
    }
  });

  it('holds for a one-day window on both sides of midnight', () => {
    const rng = new SeededRandom(6);
    const window = { reference: midday, days: 1 };

    for (let i = 0; i < 2000; i++) {
      const start = attackStart(rng, window, 22, 23);
      expect(start).toBeGreaterThanOrEqual(midday - DAY_MS);
      expect(start).toBeLessThanOrEqual(midday);
    }
  });

  it('keeps every ATO MoMo leg inside the window', () => {
    const rng = new SeededRandom(7);
    const profiles = generateProfiles(rng, 2000);
    const result = injectAccountTakeover(rng, profiles, 1500, { reference: midday, days: 30 });

    for (const record of result.momo) {
      expect(record.timestamp).toBeGreaterThanOrEqual(midday - 30 * DAY_MS);
      expect(record.timestamp).toBeLessThanOrEqual(midday);
    }
  });
});

describe('injectLateralMovement before 1970', () => {
  const rng = new SeededRandom(43);
  const profiles = generateProfiles(rng, 150);
  const result = injectLateralMovement(rng, profiles, 30, { reference: 0, days: 30 });

  it('keeps bank legs 24-72h after stage 1 at 01:00-04:59', () => {
    for (const instance of result.instances) {
      const [stage1] = instance.momo;
      expect(stage1.timestamp).toBeLessThan(0);

      for (const bank of instance.bank) {
        const delay = bank.timestamp - stage1.timestamp;
        expect(delay).toBeGreaterThanOrEqual(24 * HOUR_MS);
        expect(delay).toBeLessThan(72 * HOUR_MS);
        expect(utcHour(bank.timestamp)).toBeGreaterThanOrEqual(1);
        expect(utcHour(bank.timestamp)).toBeLessThanOrEqual(4);
      }
    }
  });
});
