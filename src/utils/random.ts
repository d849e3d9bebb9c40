import { IdSpaceExhaustedError, ConfigurationError } from './errors';

const MODULUS = 2147483647;
const MULTIPLIER = 16807;

/**
 * Seeded Random Context
 *
 * Park-Miller minimal standard generator. One instance is created per run and
 * passed explicitly to every generation function, so the draw order (and
 * therefore the output) is fixed by the sequence of calls.
 */
export class SeededRandom {
  private state: number;
  private readonly issued = new Map<string, Set<number>>();

  constructor(public readonly seed: number) {
    if (!Number.isInteger(seed) || seed < 1 || seed >= MODULUS) {
      throw new ConfigurationError(`Seed must be an integer in [1, ${MODULUS - 1}], got ${seed}`);
    }
    this.state = seed;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return (this.state - 1) / (MODULUS - 1);
  }

  /** Uniform float in [min, max) */
  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }

  /**
   * Categorical draw. Weights need not sum to 1.
   */
  weightedPick<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length === 0 || items.length !== weights.length) {
      throw new Error('Items and weights must be non-empty and the same length');
    }

    const total = weights.reduce((a, b) => a + b, 0);
    const target = this.next() * total;

    let cumulative = 0;
    for (let i = 0; i < items.length; i++) {
      cumulative += weights[i];
      if (target < cumulative) {
        return items[i];
      }
    }

    return items[items.length - 1];
  }

  /** Box-Muller transform, consumes two uniforms */
  normal(mean: number, stddev: number): number {
    const u1 = Math.max(1e-12, this.next());
    const u2 = this.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + stddev * z;
  }

  /** Lowercase hex string */
  hex(length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) {
      out += this.int(0, 15).toString(16);
    }
    return out;
  }

  /**
   * Integer in [min, max] never returned before for the same range
   */
  uniqueInt(min: number, max: number): number {
    const key = `${min}:${max}`;
    let used = this.issued.get(key);
    if (!used) {
      used = new Set<number>();
      this.issued.set(key, used);
    }

    if (used.size >= max - min + 1) {
      throw new IdSpaceExhaustedError(min, max);
    }

    let value = this.int(min, max);
    while (used.has(value)) {
      value = this.int(min, max);
    }
    used.add(value);
    return value;
  }
}
