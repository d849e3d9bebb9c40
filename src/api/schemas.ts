import { Type, type Static } from '@sinclair/typebox';

/**
 * Generation request body. Every field is optional and falls back to the
 * environment defaults. Limits keep a single request bounded.
 */
export const GenerationRequestSchema = Type.Object({
  seed: Type.Optional(Type.Integer({ minimum: 1, maximum: 2147483646 })),
  customers: Type.Optional(Type.Integer({ minimum: 1, maximum: 5000 })),
  momo_legit: Type.Optional(Type.Integer({ minimum: 0, maximum: 50000 })),
  bank_legit: Type.Optional(Type.Integer({ minimum: 0, maximum: 50000 })),
  attacks: Type.Optional(Type.Integer({ minimum: 0, maximum: 2000 })),
  window_days: Type.Optional(Type.Integer({ minimum: 1, maximum: 3650 })),
  attack_window_days: Type.Optional(Type.Integer({ minimum: 1, maximum: 3650 })),
  /** End of the generation window, Unix ms */
  reference_time: Type.Optional(Type.Integer({ minimum: 0 })),
});

export type GenerationRequest = Static<typeof GenerationRequestSchema>;

/**
 * Channel path param
 */
export const ChannelParamsSchema = Type.Object({
  channel: Type.Union([Type.Literal('momo'), Type.Literal('bank')]),
});

const AttackCountsSchema = Type.Object({
  otp_phishing: Type.Number(),
  account_takeover: Type.Number(),
  structured_drain: Type.Number(),
  lateral_movement: Type.Number(),
});

export const ChannelSummarySchema = Type.Object({
  total: Type.Number(),
  legitimate: Type.Number(),
  fraudulent: Type.Number(),
  by_attack_type: AttackCountsSchema,
});

/**
 * Corpus summary response
 */
export const CorpusSummaryResponseSchema = Type.Object({
  summary: Type.Object({
    momo: ChannelSummarySchema,
    bank: ChannelSummarySchema,
  }),
  tiers: Type.Object({
    low: Type.Number(),
    middle: Type.Number(),
    high: Type.Number(),
  }),
  /** Attack instances per pattern */
  instances: AttackCountsSchema,
  config: Type.Object({
    seed: Type.Number(),
    customers: Type.Number(),
    momo_legit: Type.Number(),
    bank_legit: Type.Number(),
    attacks: Type.Number(),
    window_days: Type.Number(),
    attack_window_days: Type.Number(),
    reference_time: Type.Number(),
  }),
});

export type CorpusSummaryResponse = Static<typeof CorpusSummaryResponseSchema>;

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Array(Type.String())),
});
