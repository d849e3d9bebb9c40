import type { AttackInstance, InjectionResult } from '../../types/corpus';
import { InsufficientPopulationError } from '../errors';
import type { SeededRandom } from '../random';
import type { TimeWindow } from '../legit';
import { DAY_MS, atUtcHour, randomTimestamp } from '../time';

/**
 * Fail loudly when the victim pool cannot cover the requested instances
 */
export function requireVictims<T>(pattern: string, pool: readonly T[], count: number): void {
  if (count > 0 && pool.length < count) {
    throw new InsufficientPopulationError(pattern, count, pool.length);
  }
}

/**
 * Attack start time inside the attack window, moved to an hour in
 * [minHour, maxHour]. Stays inside the window at both ends.
 */
export function attackStart(
  rng: SeededRandom,
  window: TimeWindow,
  minHour?: number,
  maxHour?: number
): number {
  let timestamp = randomTimestamp(rng, window.reference, window.days);

  if (minHour !== undefined && maxHour !== undefined) {
    timestamp = atUtcHour(timestamp, rng.int(minHour, maxHour));
    if (timestamp > window.reference) {
      timestamp -= DAY_MS;
    } else if (timestamp < window.reference - window.days * DAY_MS) {
      timestamp += DAY_MS;
    }
  }

  return timestamp;
}

export function collectInstances(instances: AttackInstance[]): InjectionResult {
  return {
    instances,
    momo: instances.flatMap((i) => i.momo),
    bank: instances.flatMap((i) => i.bank),
  };
}
