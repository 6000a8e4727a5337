import { isJudge } from '../advisors/registry.js';
import { errorMessage, TimeoutError } from '../core/errors.js';
import { WorkerPool } from '../core/worker-pool.js';
import type { AdvisorContext, CouncilMemberId, JudgeId, Position } from '../types/advisor.js';
import type { CouncilRecommendation, OmittedAdvisor } from '../types/council.js';
import type { Logger } from '../types/logger.js';
import { aggregate } from './aggregator.js';

export interface CouncilConfig {
  /** Advisors evaluated at once */
  concurrency: number;
  /** Time budget per advisor in ms */
  advisorTimeoutMs: number;
}

const DEFAULT_CONFIG: CouncilConfig = {
  concurrency: 4,
  advisorTimeoutMs: 2_000,
};

/**
 * Where the council finds its members. AdvisorRegistry satisfies it.
 */
export interface MemberLookup {
  get(id: CouncilMemberId): { analyze(input: string, context: AdvisorContext): Position };
}

export interface CouncilSession {
  /** Voting positions that were counted */
  positions: ReadonlyMap<CouncilMemberId, Position>;
  /** Judge positions, audit only */
  judgePositions: ReadonlyMap<JudgeId, Position>;
  omitted: OmittedAdvisor[];
  recommendation: CouncilRecommendation;
}

/**
 * Council - convenes advisors and aggregates their votes.
 *
 * Members run through a bounded worker pool. A member that throws or
 * exceeds its time budget is left out of the vote and listed in
 * `omitted`; the rest of the council still decides.
 */
export class Council {
  private readonly logger: Logger;
  private readonly config: CouncilConfig;
  private readonly pool: WorkerPool;

  constructor(
    private readonly registry: MemberLookup,
    logger: Logger,
    config: Partial<CouncilConfig> = {}
  ) {
    this.logger = logger.child({ component: 'council' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.pool = new WorkerPool({
      concurrency: this.config.concurrency,
      taskTimeoutMs: this.config.advisorTimeoutMs,
    });
  }

  async convene(
    members: readonly CouncilMemberId[],
    input: string,
    context: AdvisorContext
  ): Promise<CouncilSession> {
    const results = await this.pool.map(members, (id) =>
      this.registry.get(id).analyze(input, context)
    );

    const positions = new Map<CouncilMemberId, Position>();
    const judgePositions = new Map<JudgeId, Position>();
    const omitted: OmittedAdvisor[] = [];

    results.forEach((result, index) => {
      const id = members[index];
      if (id === undefined) return;

      if (result.status === 'rejected') {
        const reason = result.reason instanceof TimeoutError ? 'timeout' : 'error';
        omitted.push({ id, reason, message: errorMessage(result.reason) });
        this.logger.warn({ advisor: id, reason, error: errorMessage(result.reason) }, 'Advisor omitted');
        return;
      }

      if (isJudge(id)) {
        judgePositions.set(id, result.value);
      } else {
        positions.set(id, result.value);
      }
    });

    const recommendation = aggregate(positions);

    this.logger.debug(
      {
        invoked: members.length,
        counted: positions.size,
        judges: judgePositions.size,
        omitted: omitted.length,
        outcome: recommendation.outcome,
        recommendation: recommendation.recommendation,
      },
      'Council convened'
    );

    return { positions, judgePositions, omitted, recommendation };
  }
}

/**
 * Factory function for creating a council.
 */
export function createCouncil(
  registry: MemberLookup,
  logger: Logger,
  config: Partial<CouncilConfig> = {}
): Council {
  return new Council(registry, logger, config);
}
