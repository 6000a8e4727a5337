/**
 * Outcome labeling: turns a recorded outcome into bounded type weights.
 *
 * Every rule is scaled by the situation's severity, and every output is
 * clamped into [WEIGHT_FLOOR, WEIGHT_CEILING] before it leaves this file.
 */

import { clamp, clamp01 } from '../core/utils/math.js';
import type { DecisionOutcome } from '../types/outcome.js';
import type { ConstraintFeatures, KnowledgeUsage, SituationFeatures } from '../types/features.js';
import { KNOWLEDGE_TYPES, type TypeWeights } from '../types/knowledge.js';
import type { InterpretedOutcome } from './types.js';
import { WEIGHT_CEILING, WEIGHT_FLOOR } from './types.js';

export const LONG_RECOVERY_DAYS = 90;
export const HIGH_REGRET = 0.6;
export const IRREVERSIBILITY_CUTOFF = 0.7;

export function interpretOutcome(outcome: DecisionOutcome): InterpretedOutcome {
  return {
    success: outcome.success,
    regret: clamp01(outcome.regretScore),
    recoveryLong: outcome.recoveryTimeDays > LONG_RECOVERY_DAYS,
    secondaryDamage: outcome.secondaryDamage,
  };
}

/**
 * How much a decision of this shape should move the weights, in [0, 1].
 */
export function computeSeverity(
  situation: Pick<SituationFeatures, 'timePressure'>,
  constraints: Pick<ConstraintFeatures, 'irreversibilityScore' | 'downsideAsymmetry' | 'fragilityScore'>
): number {
  return clamp01(
    0.4 * constraints.irreversibilityScore +
      0.3 * constraints.downsideAsymmetry +
      0.2 * constraints.fragilityScore +
      0.1 * situation.timePressure
  );
}

/**
 * Clamp every field into the safety band.
 */
export function clampTypeWeights(weights: TypeWeights): TypeWeights {
  const clamped = { ...weights };
  for (const type of KNOWLEDGE_TYPES) {
    clamped[type] = clamp(weights[type], WEIGHT_FLOOR, WEIGHT_CEILING);
  }
  return clamped;
}

const used = (flag: number): boolean => flag > 0.5;

export function generateTypeWeights(
  situation: SituationFeatures,
  constraints: ConstraintFeatures,
  usage: KnowledgeUsage,
  outcome: InterpretedOutcome
): TypeWeights {
  const w: TypeWeights = { principle: 1.0, rule: 1.0, warning: 1.0, claim: 1.0, advice: 1.0 };
  const s = computeSeverity(situation, constraints);
  const irreversible =
    constraints.irreversibilityScore > IRREVERSIBILITY_CUTOFF || situation.decisionIrreversible > 0.5;

  if (!outcome.success) {
    if (irreversible) {
      w.warning += 0.3 * s;
      w.principle += 0.2 * s;
    }
    if (used(usage.usedRule) && irreversible) {
      w.rule -= 0.2 * s;
    }
    if (used(usage.usedAdvice)) {
      w.advice -= 0.3 * s;
    }
    if (situation.informationCompleteness < 0.5) {
      w.claim -= 0.1 * s;
    }
  } else {
    if (irreversible) {
      w.principle += 0.2 * s;
    }
    if (used(usage.usedWarning) && situation.horizonLong > 0.5) {
      w.warning += 0.2 * s;
    }
    if (used(usage.usedRule) && situation.riskHigh < 0.5) {
      w.rule += 0.2 * s;
    }
  }

  if (outcome.regret > HIGH_REGRET) {
    w.advice -= 0.2 * s;
    w.rule -= 0.1 * s;
  }
  if (outcome.recoveryLong) {
    w.warning += 0.2 * s;
    w.principle += 0.1 * s;
  }
  if (outcome.secondaryDamage) {
    w.principle -= 0.15 * s;
  }

  return clampTypeWeights(w);
}
