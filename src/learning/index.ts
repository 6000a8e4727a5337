/**
 * Learning module exports.
 */

export type {
  InterpretedOutcome,
  TrainingSample,
  BucketPrior,
  PriorSnapshot,
  PriorPrediction,
  TrainResult,
  LearningConfig,
} from './types.js';
export {
  DEFAULT_LEARNING_CONFIG,
  WEIGHT_FLOOR,
  WEIGHT_CEILING,
  EMPTY_BUCKET_CONFIDENCE,
  MAX_BUCKET_CONFIDENCE,
} from './types.js';
export {
  interpretOutcome,
  computeSeverity,
  clampTypeWeights,
  generateTypeWeights,
} from './label-generator.js';
export { computeSituationHash, reversibilityClass, riskClass } from './situation-bucket.js';
export type { FeatureInput } from './feature-extractor.js';
export { extractFeatures, knowledgeUsage, bucketFeaturesOf } from './feature-extractor.js';
export type { JudgmentPriorDeps } from './judgment-prior.js';
export { JudgmentPrior, createJudgmentPrior, bucketConfidence, PRIOR_STORAGE_KEY } from './judgment-prior.js';
export type { FeedbackLoopDeps, RecordOutcomeOptions, FeedbackResult } from './feedback-loop.js';
export { FeedbackLoop, createFeedbackLoop, labelFor, MEMORY_STORAGE_KEY } from './feedback-loop.js';
