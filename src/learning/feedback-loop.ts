import type { Logger } from '../types/logger.js';
import type { DecisionOutcome } from '../types/outcome.js';
import type { TypeWeights } from '../types/knowledge.js';
import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import { memorySnapshotSchema, toMemoryStats, type MemorySnapshot } from '../knowledge/schema.js';
import type { DecisionLog, DecisionRecord } from '../storage/decision-log.js';
import type { Storage } from '../storage/storage.js';
import { SerialLock } from '../core/serial-lock.js';
import { errorMessage } from '../core/errors.js';
import { bucketFeaturesOf } from './feature-extractor.js';
import { generateTypeWeights, interpretOutcome } from './label-generator.js';
import type { JudgmentPrior } from './judgment-prior.js';
import type { TrainResult, TrainingSample } from './types.js';

export const MEMORY_STORAGE_KEY = 'knowledge-memory';

export interface FeedbackLoopDeps {
  log: DecisionLog;
  prior: JudgmentPrior;
  store: KnowledgeStore;
  /** Where knowledge memory stats persist; omitted means in-memory only */
  memoryStorage?: Storage;
  logger: Logger;
}

export interface RecordOutcomeOptions {
  /** Train even below the minimum sample count */
  forceTraining?: boolean;
  now?: Date;
}

export interface FeedbackResult {
  recorded: boolean;
  /** Type weights derived from this outcome, null when nothing was recorded */
  label: TypeWeights | null;
  retrained: boolean;
}

export function labelFor(record: DecisionRecord, outcome: DecisionOutcome): TypeWeights {
  const { situation, constraints, usage } = record.features;
  return generateTypeWeights(situation, constraints, usage, interpretOutcome(outcome));
}

/**
 * FeedbackLoop - turns real-world outcomes into knowledge memory updates
 * and a retrained judgment prior.
 *
 * The outcome itself is persisted by the decision log. Memory updates
 * apply once per decision; a corrected outcome only relabels.
 */
export class FeedbackLoop {
  private readonly log: DecisionLog;
  private readonly prior: JudgmentPrior;
  private readonly store: KnowledgeStore;
  private readonly memoryStorage: Storage | undefined;
  private readonly logger: Logger;
  private readonly writer = new SerialLock();

  constructor(deps: FeedbackLoopDeps) {
    this.log = deps.log;
    this.prior = deps.prior;
    this.store = deps.store;
    this.memoryStorage = deps.memoryStorage;
    this.logger = deps.logger.child({ component: 'feedback-loop' });
  }

  async recordOutcome(
    decisionKey: string,
    outcome: DecisionOutcome,
    options: RecordOutcomeOptions = {}
  ): Promise<FeedbackResult> {
    const now = options.now ?? new Date();
    const record = this.log.get(decisionKey);
    if (!record) {
      this.logger.warn({ decisionKey }, 'Outcome for unknown decision ignored');
      return { recorded: false, label: null, retrained: false };
    }

    // First-outcome check and log write run under one lock hold
    return this.writer.run(async () => {
      const firstOutcome = this.log.getOutcome(decisionKey) === undefined;
      const recorded = await this.log.recordOutcome(decisionKey, outcome, now);
      if (!recorded) {
        return { recorded: false, label: null, retrained: false };
      }

      const label = labelFor(record, outcome);

      if (firstOutcome && record.evidenceIds.length > 0) {
        for (const id of record.evidenceIds) {
          if (outcome.success) this.store.reinforce(id, now);
          else this.store.penalize(id);
        }
        await this.persistMemory();
      }

      const training = await this.trainFromLog(options.forceTraining ?? false);
      this.logger.info(
        {
          decisionKey,
          success: outcome.success,
          memoryUpdated: firstOutcome,
          retrained: training.trained,
        },
        'Outcome processed'
      );

      return { recorded: true, label, retrained: training.trained };
    });
  }

  /**
   * Retrain the prior from every decision that has an outcome.
   */
  retrain(force = false): Promise<TrainResult> {
    return this.writer.run(() => this.trainFromLog(force));
  }

  /**
   * Overlay persisted memory stats onto the store.
   * @returns Number of entries updated
   */
  async loadMemory(): Promise<number> {
    if (!this.memoryStorage) return 0;

    let raw: unknown;
    try {
      raw = await this.memoryStorage.load(MEMORY_STORAGE_KEY);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Knowledge memory unreadable');
      return 0;
    }
    if (raw === null) return 0;

    const parsed = memorySnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Knowledge memory invalid, ignored');
      return 0;
    }

    const snapshot: MemorySnapshot = {};
    for (const [id, stats] of Object.entries(parsed.data)) {
      snapshot[id] = toMemoryStats(stats);
    }
    const unknown = this.store.importMemory(snapshot);
    if (unknown.length > 0) {
      this.logger.debug({ unknown: unknown.length }, 'Memory stats for entries no longer loaded');
    }
    return Object.keys(snapshot).length - unknown.length;
  }

  private trainFromLog(force: boolean): Promise<TrainResult> {
    const samples: TrainingSample[] = this.log.withOutcomes().map(({ record, outcome }) => ({
      features: bucketFeaturesOf(record.features),
      weights: labelFor(record, outcome),
    }));
    return this.prior.train(samples, { force });
  }

  private async persistMemory(): Promise<void> {
    if (!this.memoryStorage) return;
    try {
      await this.memoryStorage.save(MEMORY_STORAGE_KEY, this.store.exportMemory());
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to persist knowledge memory');
    }
  }
}

export function createFeedbackLoop(deps: FeedbackLoopDeps): FeedbackLoop {
  return new FeedbackLoop(deps);
}
