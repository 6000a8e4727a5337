/**
 * Knowledge types - the typed statements the scoring engine ranks.
 */

export const KNOWLEDGE_TYPES = ['principle', 'rule', 'warning', 'claim', 'advice'] as const;

export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

/** Coarse three-step scale used for stakes and time pressure */
export type Level = 'low' | 'medium' | 'high';

export const LEVEL_ORDER: Readonly<Record<Level, number>> = {
  low: 0,
  medium: 1,
  high: 2,
};

/**
 * Where an entry came from.
 */
export interface Provenance {
  book: string;
  file?: string;
  chapter?: string;
}

/**
 * Mutable usage memory of an entry.
 *
 * Only the feedback loop and explicit reinforcement calls change it.
 */
export interface MemoryStats {
  reinforcementCount: number;
  penaltyCount: number;
  /** ISO timestamp of the last reinforcement */
  lastReinforcedAt?: string;
}

/**
 * Situations an entry is allowed to speak to.
 */
export interface Applicability {
  requiredDomains?: string[];
  excludedDomains?: string[];
  minStakes?: Level;
  maxTimePressure?: Level;
}

export interface KnowledgeEntry {
  readonly id: string;
  readonly domain: string;
  readonly type: KnowledgeType;
  readonly content: string;
  readonly provenance: Provenance;
  readonly memory: MemoryStats;
  readonly conceptTags?: readonly string[];
  readonly goalTags?: readonly string[];
  readonly applicability?: Applicability;
}

/**
 * One multiplier per knowledge type.
 * Learned values live in [0.7, 1.3].
 */
export type TypeWeights = Record<KnowledgeType, number>;

export const NEUTRAL_TYPE_WEIGHTS: Readonly<TypeWeights> = Object.freeze({
  principle: 1.0,
  rule: 1.0,
  warning: 1.0,
  claim: 1.0,
  advice: 1.0,
});

export const POSTURES = ['cautious', 'bold', 'analytical', 'creative', 'empathetic'] as const;

/** Reading stance an advisor brings to the knowledge base */
export type Posture = (typeof POSTURES)[number];

/**
 * Situation facts the applicability filter checks entries against.
 */
export interface ApplicabilityFrame {
  domains: string[];
  stakes?: Level;
  timePressure?: Level;
}
