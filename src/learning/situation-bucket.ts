import type { BucketFeatures } from '../types/features.js';
import { IRREVERSIBILITY_CUTOFF } from './label-generator.js';

export type ReversibilityClass = 'irreversible' | 'reversible' | 'exploratory';
export type RiskClass = 'high' | 'medium' | 'low';

export function reversibilityClass(features: BucketFeatures): ReversibilityClass {
  if (features.decisionIrreversible > 0.5) return 'irreversible';
  if (features.decisionReversible > 0.5) return 'reversible';
  return 'exploratory';
}

export function riskClass(features: BucketFeatures): RiskClass {
  if (features.riskHigh > 0.5) return 'high';
  if (features.riskMedium > 0.5) return 'medium';
  return 'low';
}

/**
 * Coarse bucket key, e.g. "irreversible_high_h".
 *
 * Reversibility class, risk class, and whether the irreversibility score
 * is above 0.7 (h) or not (l).
 */
export function computeSituationHash(features: BucketFeatures): string {
  const irreversibility = features.irreversibilityScore > IRREVERSIBILITY_CUTOFF ? 'h' : 'l';
  return `${reversibilityClass(features)}_${riskClass(features)}_${irreversibility}`;
}
