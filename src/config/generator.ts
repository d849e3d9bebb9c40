import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigurationError } from '../utils/errors';

/**
 * Generator Configuration
 *
 * Population size, record counts and time window for a corpus run.
 * Defaults come from the environment; callers may override any field.
 */
export const GeneratorConfigSchema = Type.Object({
  /** Seed for the shared random context */
  seed: Type.Integer({ minimum: 1, maximum: 2147483646 }),
  customers: Type.Integer({ minimum: 1 }),
  momo_legit: Type.Integer({ minimum: 0 }),
  bank_legit: Type.Integer({ minimum: 0 }),
  /** Total attack instances, split across the four patterns */
  attacks: Type.Integer({ minimum: 0 }),
  /** Trailing window for legitimate traffic */
  window_days: Type.Integer({ minimum: 1, maximum: 3650 }),
  /** Trailing window in which attacks start */
  attack_window_days: Type.Integer({ minimum: 1, maximum: 3650 }),
  /** End of every window, Unix ms */
  reference_time: Type.Integer({ minimum: 0 }),
  output_dir: Type.String({ minLength: 1 }),
});

export type GeneratorConfig = Static<typeof GeneratorConfigSchema>;

export const DEFAULT_SEED = 42;
export const DEFAULT_CUSTOMERS = 500;
export const DEFAULT_MOMO_LEGIT = 8000;
export const DEFAULT_BANK_LEGIT = 4000;
export const DEFAULT_ATTACKS = 120;
export const DEFAULT_WINDOW_DAYS = 90;
export const DEFAULT_ATTACK_WINDOW_DAYS = 30;
export const DEFAULT_OUTPUT_DIR = 'data/synthetic';

/**
 * Start of the current UTC day. Runs on the same day share a reference time,
 * so a fixed seed reproduces the same files.
 */
export function startOfUtcDay(now: Date = new Date()): number {
  return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
}

export function defaultGeneratorConfig(): GeneratorConfig {
  return {
    seed: DEFAULT_SEED,
    customers: DEFAULT_CUSTOMERS,
    momo_legit: DEFAULT_MOMO_LEGIT,
    bank_legit: DEFAULT_BANK_LEGIT,
    attacks: DEFAULT_ATTACKS,
    window_days: DEFAULT_WINDOW_DAYS,
    attack_window_days: DEFAULT_ATTACK_WINDOW_DAYS,
    reference_time: startOfUtcDay(),
    output_dir: DEFAULT_OUTPUT_DIR,
  };
}

/**
 * Validate a candidate config, listing every failing field
 */
export function validateGeneratorConfig(value: unknown): GeneratorConfig {
  if (Value.Check(GeneratorConfigSchema, value)) {
    return value;
  }

  const details = [...Value.Errors(GeneratorConfigSchema, value)].map(
    (error) => `${error.path || '/'}: ${error.message}`
  );
  throw new ConfigurationError('Invalid generator configuration', details);
}

/**
 * Merge overrides over the defaults and validate
 */
export function resolveGeneratorConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  const merged: Record<string, unknown> = { ...defaultGeneratorConfig() };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return validateGeneratorConfig(merged);
}

function intFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

/**
 * Load config from environment variables (CORPUS_*)
 */
export function loadGeneratorConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  return resolveGeneratorConfig({
    seed: intFromEnv(env.CORPUS_SEED),
    customers: intFromEnv(env.CORPUS_CUSTOMERS),
    momo_legit: intFromEnv(env.CORPUS_MOMO_LEGIT),
    bank_legit: intFromEnv(env.CORPUS_BANK_LEGIT),
    attacks: intFromEnv(env.CORPUS_ATTACKS),
    window_days: intFromEnv(env.CORPUS_WINDOW_DAYS),
    attack_window_days: intFromEnv(env.CORPUS_ATTACK_WINDOW_DAYS),
    reference_time: env.CORPUS_REFERENCE_TIME ? Date.parse(env.CORPUS_REFERENCE_TIME) : undefined,
    output_dir: env.CORPUS_OUTPUT_DIR || undefined,
  });
}
