import { clamp01 } from '../core/utils/math.js';
import { containsAny } from '../core/utils/text-similarity.js';
import type { EvidenceItem } from '../types/advisor.js';
import type {
  BucketFeatures,
  ConstraintFeatures,
  DecisionFeatures,
  FeatureOverrides,
  KnowledgeUsage,
  SituationFeatures,
} from '../types/features.js';
import type { Level } from '../types/knowledge.js';
import type { SituationFrame } from '../types/understanding.js';

const IRREVERSIBLE_MARKERS = [
  'irreversible',
  'permanent',
  'forever',
  "can't undo",
  'no way back',
  'all-in',
  'burn bridges',
  'quit',
  'resign',
  'sign the contract',
];
const EXPLORATORY_MARKERS = ['explore', 'experiment', 'try out', 'pilot', 'test the waters', 'prototype'];
const CATASTROPHIC_MARKERS = ['bankruptcy', 'ruin', 'lose everything', 'death', 'total loss'];
const RISK_MARKERS = ['risk', 'risky', 'danger', 'loss', 'debt', 'expensive', 'uncertain'];
const LONG_HORIZON_MARKERS = ['years', 'long-term', 'career', 'future', 'decade', 'retirement', 'legacy'];
const SHORT_HORIZON_MARKERS = ['today', 'tonight', 'this week', 'tomorrow', 'right now'];
const URGENCY_MARKERS = ['now', 'immediately', 'asap', 'urgent', 'deadline', 'today'];
const OPTION_MARKERS = ['option', 'exit', 'backup', 'alternative', 'reversible', 'plan b'];
const UPSIDE_MARKERS = ['opportunity', 'upside', 'growth', 'promotion', 'profit', 'raise'];

const LEVEL_VALUE: Readonly<Record<Level, number>> = { low: 0.2, medium: 0.5, high: 0.9 };

export interface FeatureInput {
  text: string;
  frame: SituationFrame;
  stakes?: Level;
  timePressure?: Level;
  /** Knowledge cited by the council */
  evidence: readonly EvidenceItem[];
  overrides?: FeatureOverrides;
}

function situationFeatures(input: FeatureInput): SituationFeatures {
  const { text, frame } = input;

  const irreversible = containsAny(text, IRREVERSIBLE_MARKERS);
  const exploratory = !irreversible && containsAny(text, EXPLORATORY_MARKERS);
  const reversibility = irreversible
    ? { decisionIrreversible: 0.8, decisionReversible: 0.2, decisionExploratory: 0 }
    : exploratory
      ? { decisionIrreversible: 0, decisionReversible: 0.3, decisionExploratory: 0.7 }
      : { decisionIrreversible: 0.1, decisionReversible: 0.8, decisionExploratory: 0.1 };

  let risk: Level = 'low';
  if (input.stakes) risk = input.stakes;
  else if (containsAny(text, CATASTROPHIC_MARKERS)) risk = 'high';
  else if (containsAny(text, RISK_MARKERS)) risk = 'medium';

  let horizon: 'short' | 'medium' | 'long' = 'medium';
  if (containsAny(text, LONG_HORIZON_MARKERS)) horizon = 'long';
  else if (containsAny(text, SHORT_HORIZON_MARKERS)) horizon = 'short';

  const timePressure = input.timePressure
    ? LEVEL_VALUE[input.timePressure]
    : containsAny(text, URGENCY_MARKERS)
      ? 0.8
      : 0.3;

  return {
    ...reversibility,
    riskLow: risk === 'low' ? 1 : 0,
    riskMedium: risk === 'medium' ? 1 : 0,
    riskHigh: risk === 'high' ? 1 : 0,
    horizonShort: horizon === 'short' ? 1 : 0,
    horizonMedium: horizon === 'medium' ? 1 : 0,
    horizonLong: horizon === 'long' ? 1 : 0,
    timePressure,
    informationCompleteness: clamp01(frame.clarity),
  };
}

function constraintFeatures(
  text: string,
  frame: SituationFrame,
  situation: SituationFeatures
): ConstraintFeatures {
  const riskLevel = situation.riskHigh > 0.5 ? 0.9 : situation.riskMedium > 0.5 ? 0.5 : 0.2;
  const hasOptions = containsAny(text, OPTION_MARKERS);
  const catastrophic = containsAny(text, CATASTROPHIC_MARKERS);

  return {
    irreversibilityScore: situation.decisionIrreversible,
    fragilityScore: clamp01(0.6 * riskLevel + 0.4 * frame.emotionalLoad),
    optionalityLossScore: hasOptions ? 0.1 : situation.decisionIrreversible > 0.5 ? 0.8 : 0.3,
    downsideAsymmetry: catastrophic ? 0.9 : riskLevel >= 0.9 ? 0.6 : 0.3,
    upsideAsymmetry: containsAny(text, UPSIDE_MARKERS) ? 0.6 : 0.3,
    recoveryTimeLong: situation.decisionIrreversible > 0.5 && riskLevel >= 0.9 ? 1 : 0,
  };
}

export function knowledgeUsage(evidence: readonly EvidenceItem[]): KnowledgeUsage {
  const types = new Set(evidence.map((e) => e.type));
  return {
    usedPrinciple: types.has('principle') ? 1 : 0,
    usedRule: types.has('rule') ? 1 : 0,
    usedWarning: types.has('warning') ? 1 : 0,
    usedClaim: types.has('claim') ? 1 : 0,
    usedAdvice: types.has('advice') ? 1 : 0,
  };
}

/**
 * Derive decision features from the utterance, the situation frame and
 * the cited knowledge. Caller overrides replace derived values field by
 * field.
 */
export function extractFeatures(input: FeatureInput): DecisionFeatures {
  const situation: SituationFeatures = {
    ...situationFeatures(input),
    ...input.overrides?.situation,
  };
  const constraints: ConstraintFeatures = {
    ...constraintFeatures(input.text, input.frame, situation),
    ...input.overrides?.constraints,
  };
  return { situation, constraints, usage: knowledgeUsage(input.evidence) };
}

export function bucketFeaturesOf(features: Pick<DecisionFeatures, 'situation' | 'constraints'>): BucketFeatures {
  return {
    decisionIrreversible: features.situation.decisionIrreversible,
    decisionReversible: features.situation.decisionReversible,
    riskHigh: features.situation.riskHigh,
    riskMedium: features.situation.riskMedium,
    irreversibilityScore: features.constraints.irreversibilityScore,
  };
}
