import { DateTime } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { UnderstandingResult } from '../types/understanding.js';
import type { TextUnderstanding, UnderstandingContext } from '../ports/understanding.js';
import { errorMessage } from '../core/errors.js';

/**
 * Immutable result of a background situation analysis.
 */
export interface SituationSnapshot {
  /** Increases by one with every publication */
  readonly version: number;
  /** Utterance the analysis was run on */
  readonly text: string;
  readonly understanding: Readonly<UnderstandingResult>;
  /** ISO timestamp of publication */
  readonly at: string;
}

/**
 * SituationSnapshotStore - runs situation analysis off the decision path.
 *
 * schedule() returns immediately. When the analysis finishes its result
 * is published as a new frozen snapshot, unless a later request has
 * already published. Decisions read current() once and never wait.
 */
export class SituationSnapshotStore {
  private readonly logger: Logger;
  private snapshot: SituationSnapshot | undefined;
  private version = 0;
  private requested = 0;
  private publishedRequest = 0;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly understanding: TextUnderstanding,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'situation-snapshot' });
  }

  current(): SituationSnapshot | undefined {
    return this.snapshot;
  }

  schedule(text: string, context: UnderstandingContext): void {
    const request = ++this.requested;

    const task = this.analyze(request, text, context).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  /** Resolves when every scheduled analysis has settled */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async analyze(request: number, text: string, context: UnderstandingContext): Promise<void> {
    try {
      const understanding = await this.understanding.analyze(text, context);
      if (request < this.publishedRequest) {
        this.logger.debug({ request }, 'Stale situation analysis dropped');
        return;
      }
      this.publishedRequest = request;
      this.version++;
      this.snapshot = Object.freeze({
        version: this.version,
        text,
        understanding: Object.freeze(understanding),
        at: DateTime.utc().toISO() ?? new Date().toISOString(),
      });
      this.logger.debug({ version: this.version }, 'Situation snapshot published');
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Situation analysis failed');
    }
  }
}

export function createSituationSnapshotStore(
  understanding: TextUnderstanding,
  logger: Logger
): SituationSnapshotStore {
  return new SituationSnapshotStore(understanding, logger);
}
