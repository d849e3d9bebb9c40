/**
 * Corpus Types
 */

import type { CustomerProfile, TierDistribution } from './customer';
import type { AttackType, BankTransaction, MomoTransaction } from './transaction';

/** One injected attack with every record it produced */
export interface AttackInstance {
  attack_type: AttackType;
  victim: CustomerProfile;
  /** Fresh MOMO-ATK- account receiving the funds */
  attacker_account: string;
  momo: MomoTransaction[];
  bank: BankTransaction[];
}

export interface InjectionResult {
  instances: AttackInstance[];
  momo: MomoTransaction[];
  bank: BankTransaction[];
}

export interface Corpus {
  momo: MomoTransaction[];
  bank: BankTransaction[];
}

export interface ChannelSummary {
  total: number;
  legitimate: number;
  fraudulent: number;
  /** Record count per attack type */
  by_attack_type: Record<AttackType, number>;
}

export interface CorpusSummary {
  momo: ChannelSummary;
  bank: ChannelSummary;
}

export interface GeneratedCorpus {
  profiles: CustomerProfile[];
  corpus: Corpus;
  summary: CorpusSummary;
  tiers: TierDistribution;
  /** Attack instances injected per pattern */
  instances: Record<AttackType, number>;
  attacks: Record<AttackType, AttackInstance[]>;
}

export interface InvariantViolation {
  channel: 'momo' | 'bank' | 'profile';
  transaction_id: string;
  rule: string;
}
