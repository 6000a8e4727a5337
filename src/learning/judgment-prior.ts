import { z } from 'zod';
import { DateTime } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { BucketFeatures } from '../types/features.js';
import { KNOWLEDGE_TYPES, NEUTRAL_TYPE_WEIGHTS, type KnowledgeType, type TypeWeights } from '../types/knowledge.js';
import type { Storage } from '../storage/storage.js';
import type { TypeWeightSource } from '../scoring/scoring-engine.js';
import { SerialLock } from '../core/serial-lock.js';
import { errorMessage } from '../core/errors.js';
import { clampTypeWeights } from './label-generator.js';
import { computeSituationHash } from './situation-bucket.js';
import {
  DEFAULT_LEARNING_CONFIG,
  EMPTY_BUCKET_CONFIDENCE,
  MAX_BUCKET_CONFIDENCE,
  PRIOR_CACHE_VERSION,
  type BucketPrior,
  type LearningConfig,
  type PriorPrediction,
  type PriorSnapshot,
  type TrainResult,
  type TrainingSample,
} from './types.js';

export const PRIOR_STORAGE_KEY = 'learned-priors';

const typeWeightsSchema = z.object({
  principle: z.number(),
  rule: z.number(),
  warning: z.number(),
  claim: z.number(),
  advice: z.number(),
});

const priorSnapshotSchema = z.object({
  version: z.literal(PRIOR_CACHE_VERSION),
  trainedAt: z.string().nullable(),
  totalSamples: z.number().int().nonnegative(),
  buckets: z.record(
    z.string(),
    z.object({
      weights: typeWeightsSchema,
      sampleCount: z.number().int().positive(),
    })
  ),
});

const NO_BUCKETS: Readonly<Record<string, BucketPrior>> = Object.freeze({});

const EMPTY_SNAPSHOT: PriorSnapshot = Object.freeze({
  version: PRIOR_CACHE_VERSION,
  trainedAt: null,
  totalSamples: 0,
  buckets: NO_BUCKETS,
});

/**
 * Confidence in a bucket's weights given how many samples it was built
 * from: min(0.95, 0.5 + 0.1 * ln(1 + n)).
 */
export function bucketConfidence(sampleCount: number): number {
  return Math.min(MAX_BUCKET_CONFIDENCE, 0.5 + 0.1 * Math.log(1 + sampleCount));
}

function averageWeights(samples: readonly TrainingSample[]): TypeWeights {
  const sum: TypeWeights = { principle: 0, rule: 0, warning: 0, claim: 0, advice: 0 };
  for (const sample of samples) {
    for (const type of KNOWLEDGE_TYPES) {
      sum[type] += sample.weights[type];
    }
  }
  for (const type of KNOWLEDGE_TYPES) {
    sum[type] /= samples.length;
  }
  return clampTypeWeights(sum);
}

export interface JudgmentPriorDeps {
  storage: Storage;
  logger: Logger;
  config?: Partial<LearningConfig>;
}

/**
 * Per-bucket learned type weights.
 *
 * Readers see a frozen snapshot. Training builds a complete replacement
 * and swaps the reference, so a reader never observes a half-trained
 * cache. Training and reset go through one writer lock.
 */
export class JudgmentPrior implements TypeWeightSource {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly config: LearningConfig;
  private readonly writer = new SerialLock();
  private snapshot: PriorSnapshot = EMPTY_SNAPSHOT;

  constructor(deps: JudgmentPriorDeps) {
    this.storage = deps.storage;
    this.logger = deps.logger.child({ component: 'judgment-prior' });
    this.config = { ...DEFAULT_LEARNING_CONFIG, ...deps.config };
  }

  get disabled(): boolean {
    return this.config.disabled;
  }

  getSnapshot(): PriorSnapshot {
    return this.snapshot;
  }

  predict(features: BucketFeatures): PriorPrediction {
    const bucket = computeSituationHash(features);

    if (this.config.disabled) {
      return { bucket, weights: { ...NEUTRAL_TYPE_WEIGHTS }, confidence: 0, sampleCount: 0 };
    }

    const prior = this.snapshot.buckets[bucket];
    if (!prior) {
      return {
        bucket,
        weights: { ...NEUTRAL_TYPE_WEIGHTS },
        confidence: EMPTY_BUCKET_CONFIDENCE,
        sampleCount: 0,
      };
    }

    return {
      bucket,
      weights: { ...prior.weights },
      confidence: bucketConfidence(prior.sampleCount),
      sampleCount: prior.sampleCount,
    };
  }

  /**
   * Multiply each known type's score by the learned weight, when the
   * bucket is trusted. Otherwise the scores pass through unchanged.
   */
  applyBias(
    scores: Partial<Record<KnowledgeType, number>>,
    features: BucketFeatures,
    threshold: number = this.config.confidenceThreshold
  ): Partial<Record<KnowledgeType, number>> {
    const prediction = this.predict(features);
    if (prediction.confidence < threshold) {
      return { ...scores };
    }

    const biased: Partial<Record<KnowledgeType, number>> = {};
    for (const type of KNOWLEDGE_TYPES) {
      const value = scores[type];
      if (value !== undefined) {
        biased[type] = value * prediction.weights[type];
      }
    }
    return biased;
  }

  resolveTypeWeights(
    features: BucketFeatures,
    threshold: number = this.config.confidenceThreshold
  ): Readonly<TypeWeights> | undefined {
    const prediction = this.predict(features);
    return prediction.confidence >= threshold ? prediction.weights : undefined;
  }

  /**
   * Rebuild every bucket from the given samples.
   */
  train(samples: readonly TrainingSample[], options: { force?: boolean } = {}): Promise<TrainResult> {
    return this.writer.run(async (): Promise<TrainResult> => {
      if (!options.force && samples.length < this.config.minSamples) {
        this.logger.debug(
          { samples: samples.length, minSamples: this.config.minSamples },
          'Not enough samples to train'
        );
        return {
          trained: false,
          skipped: 'insufficient_samples',
          sampleCount: samples.length,
          buckets: Object.keys(this.snapshot.buckets).length,
          persisted: false,
        };
      }

      const grouped = new Map<string, TrainingSample[]>();
      for (const sample of samples) {
        const key = computeSituationHash(sample.features);
        const group = grouped.get(key);
        if (group) group.push(sample);
        else grouped.set(key, [sample]);
      }

      const buckets: Record<string, BucketPrior> = {};
      for (const [key, group] of grouped) {
        buckets[key] = Object.freeze({ weights: averageWeights(group), sampleCount: group.length });
      }

      const next: PriorSnapshot = Object.freeze({
        version: PRIOR_CACHE_VERSION,
        trainedAt: DateTime.utc().toISO(),
        totalSamples: samples.length,
        buckets: Object.freeze(buckets),
      });
      this.snapshot = next;

      const persisted = await this.persist(next);
      this.logger.info(
        { samples: samples.length, buckets: grouped.size, persisted },
        'Judgment prior trained'
      );

      return { trained: true, sampleCount: samples.length, buckets: grouped.size, persisted };
    });
  }

  /**
   * Load the persisted cache. A missing or invalid cache leaves the prior
   * empty.
   */
  async load(): Promise<boolean> {
    let raw: unknown;
    try {
      raw = await this.storage.load(PRIOR_STORAGE_KEY);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Learned prior cache unreadable');
      return false;
    }
    if (raw === null) return false;

    const parsed = priorSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Learned prior cache invalid, ignored');
      return false;
    }

    const buckets: Record<string, BucketPrior> = {};
    for (const [key, prior] of Object.entries(parsed.data.buckets)) {
      buckets[key] = Object.freeze({
        weights: clampTypeWeights(prior.weights),
        sampleCount: prior.sampleCount,
      });
    }
    this.snapshot = Object.freeze({
      version: PRIOR_CACHE_VERSION,
      trainedAt: parsed.data.trainedAt,
      totalSamples: parsed.data.totalSamples,
      buckets: Object.freeze(buckets),
    });
    this.logger.debug({ buckets: Object.keys(buckets).length }, 'Learned prior cache loaded');
    return true;
  }

  async reset(): Promise<void> {
    await this.writer.run(async () => {
      this.snapshot = EMPTY_SNAPSHOT;
      await this.storage.delete(PRIOR_STORAGE_KEY);
    });
  }

  private async persist(snapshot: PriorSnapshot): Promise<boolean> {
    try {
      await this.storage.save(PRIOR_STORAGE_KEY, snapshot);
      return true;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to persist learned prior');
      return false;
    }
  }
}

export function createJudgmentPrior(deps: JudgmentPriorDeps): JudgmentPrior {
  return new JudgmentPrior(deps);
}
