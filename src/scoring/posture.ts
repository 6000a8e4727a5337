import type { KnowledgeType, Posture, TypeWeights } from '../types/knowledge.js';

/**
 * Base relevance multiplier per knowledge type.
 */
export const BASE_TYPE_WEIGHTS: Readonly<TypeWeights> = Object.freeze({
  principle: 1.0,
  rule: 1.1,
  warning: 1.05,
  claim: 0.95,
  advice: 0.9,
});

/**
 * How each posture tilts the reading of knowledge types.
 * Cautious and analytical readers lean on rules, creative and bold ones
 * on advice.
 */
export const POSTURE_TYPE_BIAS: Readonly<Record<Posture, Readonly<TypeWeights>>> = Object.freeze({
  cautious: { principle: 1.2, rule: 1.4, warning: 1.05, claim: 0.95, advice: 0.9 },
  bold: { principle: 1.0, rule: 0.7, warning: 0.9, claim: 1.0, advice: 1.3 },
  analytical: { principle: 1.4, rule: 1.3, warning: 1.05, claim: 0.95, advice: 0.9 },
  creative: { principle: 1.0, rule: 0.6, warning: 1.0, claim: 0.95, advice: 1.4 },
  empathetic: { principle: 1.3, rule: 0.8, warning: 1.05, claim: 0.95, advice: 1.2 },
});

export function postureBias(type: KnowledgeType, posture?: Posture): number {
  return posture ? POSTURE_TYPE_BIAS[posture][type] : 1.0;
}
