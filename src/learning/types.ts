import type { BucketFeatures } from '../types/features.js';
import type { TypeWeights } from '../types/knowledge.js';

/**
 * Outcome reduced to the signals the label rules read.
 */
export interface InterpretedOutcome {
  success: boolean;
  /** Clamped to [0, 1] */
  regret: number;
  /** Recovery took longer than 90 days */
  recoveryLong: boolean;
  secondaryDamage: boolean;
}

/**
 * One (situation, label) pair for training.
 */
export interface TrainingSample {
  features: BucketFeatures;
  weights: TypeWeights;
}

export interface BucketPrior {
  weights: TypeWeights;
  sampleCount: number;
}

/**
 * Immutable learned-prior cache. Replaced whole on every training run.
 */
export interface PriorSnapshot {
  version: number;
  /** ISO timestamp, null before the first training run */
  trainedAt: string | null;
  totalSamples: number;
  buckets: Readonly<Record<string, BucketPrior>>;
}

export interface PriorPrediction {
  bucket: string;
  weights: TypeWeights;
  confidence: number;
  sampleCount: number;
}

export interface TrainResult {
  trained: boolean;
  /** Why training was skipped */
  skipped?: 'insufficient_samples';
  sampleCount: number;
  buckets: number;
  persisted: boolean;
}

export interface LearningConfig {
  /** Ablation switch: every prediction reports zero confidence */
  disabled: boolean;
  /** Samples needed before an unforced training run */
  minSamples: number;
  /** Bucket confidence needed before learned weights apply */
  confidenceThreshold: number;
}

export const DEFAULT_LEARNING_CONFIG: LearningConfig = {
  disabled: false,
  minSamples: 5,
  confidenceThreshold: 0.6,
};

/** Safety band every learned weight is clamped into */
export const WEIGHT_FLOOR = 0.7;
export const WEIGHT_CEILING = 1.3;

/** Confidence of a bucket with no samples */
export const EMPTY_BUCKET_CONFIDENCE = 0.3;
export const MAX_BUCKET_CONFIDENCE = 0.95;

export const PRIOR_CACHE_VERSION = 1;
