/**
 * Decision features - the numeric description of a situation that the
 * learning loop buckets and labels. All values are in [0, 1].
 */

export interface SituationFeatures {
  decisionIrreversible: number;
  decisionReversible: number;
  decisionExploratory: number;
  riskLow: number;
  riskMedium: number;
  riskHigh: number;
  horizonShort: number;
  horizonMedium: number;
  horizonLong: number;
  timePressure: number;
  informationCompleteness: number;
}

export interface ConstraintFeatures {
  irreversibilityScore: number;
  fragilityScore: number;
  optionalityLossScore: number;
  downsideAsymmetry: number;
  upsideAsymmetry: number;
  recoveryTimeLong: number;
}

/** Which knowledge types informed the decision (> 0.5 means used) */
export interface KnowledgeUsage {
  usedPrinciple: number;
  usedRule: number;
  usedWarning: number;
  usedClaim: number;
  usedAdvice: number;
}

export interface DecisionFeatures {
  situation: SituationFeatures;
  constraints: ConstraintFeatures;
  usage: KnowledgeUsage;
}

/** Caller-supplied overrides for extracted features */
export interface FeatureOverrides {
  situation?: Partial<SituationFeatures>;
  constraints?: Partial<ConstraintFeatures>;
}

/** The fields the situation bucket is derived from */
export type BucketFeatures = Pick<
  SituationFeatures,
  'decisionIrreversible' | 'decisionReversible' | 'riskHigh' | 'riskMedium'
> &
  Pick<ConstraintFeatures, 'irreversibilityScore'>;
