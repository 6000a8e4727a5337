import { JUDGES, VOTING_ADVISORS, type AdvisorId, type JudgeId } from '../types/advisor.js';
import type { CouncilRecommendation } from '../types/council.js';
import type { Level } from '../types/knowledge.js';
import type { DecisionMode } from '../types/mode.js';
import type { EmotionalMetrics, SituationFrame } from '../types/understanding.js';
import type { Logger } from '../types/logger.js';

export const WAR_COUNCIL: readonly AdvisorId[] = [
  'risk',
  'power',
  'grand_strategist',
  'technology',
  'timing',
];

/**
 * Meeting-mode lookup: situation domain to the advisors that speak for it.
 */
export const MEETING_DOMAIN_ADVISORS: Readonly<Record<string, readonly AdvisorId[]>> = {
  career: ['grand_strategist', 'psychology', 'timing'],
  financial: ['risk', 'optionality', 'data'],
  relationships: ['diplomacy', 'psychology', 'legitimacy'],
  health: ['psychology', 'timing', 'risk'],
  strategy: ['grand_strategist', 'intelligence', 'timing'],
  power: ['power', 'diplomacy', 'conflict'],
  ethics: ['legitimacy', 'truth', 'discipline'],
  innovation: ['technology', 'grand_strategist', 'risk'],
};

/** Fills a meeting up to its minimum size */
export const MEETING_PADDING: readonly AdvisorId[] = ['grand_strategist', 'intelligence', 'timing'];
export const MEETING_MIN = 3;
export const MEETING_MAX = 5;
export const MEETING_PER_DOMAIN = 2;

/** Agreement share darbar needs for each reading */
export const DARBAR_STRONG_SHARE = 0.8;
export const DARBAR_DISSENT_SHARE = 0.6;

export type ModeInterpretation =
  | 'direct_response'
  | 'aggressive_proceed'
  | 'defensive_hold_or_pivot'
  | 'red_line_block_override_needed'
  | 'strong_consensus_support'
  | 'strong_consensus_oppose'
  | 'mixed_consensus_with_tradeoffs'
  | 'strong_doctrine_aligned_consensus'
  | 'consensus_with_noted_dissent'
  | 'deep_disagreement_defer_decision'
  | 'red_line_blocks_recommendation';

export interface ModePlan {
  mode: DecisionMode;
  advisors: AdvisorId[];
  judges: JudgeId[];
  /** Quick mode answers directly without a council */
  skipCouncil: boolean;
}

export interface RoutingSituation {
  domains: readonly string[];
}

function meetingKeysFor(domain: string): string[] {
  const wanted = domain.trim().toLowerCase();
  if (!wanted) return [];
  if (wanted in MEETING_DOMAIN_ADVISORS) return [wanted];
  return Object.keys(MEETING_DOMAIN_ADVISORS).filter(
    (key) => key.includes(wanted) || wanted.includes(key)
  );
}

/**
 * Advisors for meeting mode: risk first, then up to two per active
 * domain, padded to at least three and capped at five.
 */
export function selectMeetingAdvisors(domains: readonly string[]): AdvisorId[] {
  const chosen: AdvisorId[] = ['risk'];
  const add = (id: AdvisorId): void => {
    if (chosen.length < MEETING_MAX && !chosen.includes(id)) chosen.push(id);
  };

  for (const domain of domains) {
    for (const key of meetingKeysFor(domain)) {
      const advisors = MEETING_DOMAIN_ADVISORS[key] ?? [];
      advisors.slice(0, MEETING_PER_DOMAIN).forEach(add);
    }
  }

  for (const id of MEETING_PADDING) {
    if (chosen.length >= MEETING_MIN) break;
    add(id);
  }

  return chosen;
}

/**
 * ModeRouter - maps (mode, situation) to the participating advisors and
 * reads council results the way each mode wants them read.
 *
 * The selected mode is its only state.
 */
export class ModeRouter {
  private readonly logger: Logger;
  private mode: DecisionMode;

  constructor(logger: Logger, defaultMode: DecisionMode = 'meeting') {
    this.logger = logger.child({ component: 'mode-router' });
    this.mode = defaultMode;
  }

  get currentMode(): DecisionMode {
    return this.mode;
  }

  setMode(mode: DecisionMode): void {
    if (mode !== this.mode) {
      this.logger.info({ from: this.mode, to: mode }, 'Mode changed');
    }
    this.mode = mode;
  }

  plan(mode: DecisionMode, situation: RoutingSituation): ModePlan {
    switch (mode) {
      case 'quick':
        return { mode, advisors: [], judges: [], skipCouncil: true };
      case 'war':
        return { mode, advisors: [...WAR_COUNCIL], judges: [], skipCouncil: false };
      case 'meeting':
        return {
          mode,
          advisors: selectMeetingAdvisors(situation.domains),
          judges: [],
          skipCouncil: false,
        };
      case 'darbar':
        return { mode, advisors: [...VOTING_ADVISORS], judges: [...JUDGES], skipCouncil: false };
    }
  }

  interpret(mode: DecisionMode, recommendation: CouncilRecommendation): ModeInterpretation {
    const { support, oppose, neutral, total } = recommendation.votes;
    const redLine = recommendation.redLineConcerns.length > 0;

    switch (mode) {
      case 'quick':
        return 'direct_response';
      case 'war':
        if (redLine) return 'red_line_block_override_needed';
        if (total > 0 && support >= oppose) return 'aggressive_proceed';
        return 'defensive_hold_or_pivot';
      case 'meeting':
        if (support > oppose + neutral) return 'strong_consensus_support';
        if (oppose > support + neutral) return 'strong_consensus_oppose';
        return 'mixed_consensus_with_tradeoffs';
      case 'darbar': {
        if (redLine) return 'red_line_blocks_recommendation';
        const agreement = total > 0 ? Math.max(support, oppose) / total : 0;
        if (agreement >= DARBAR_STRONG_SHARE) return 'strong_doctrine_aligned_consensus';
        if (agreement >= DARBAR_DISSENT_SHARE) return 'consensus_with_noted_dissent';
        return 'deep_disagreement_defer_decision';
      }
    }
  }

  /**
   * Mode the situation calls for, or the current mode when nothing does.
   */
  suggestMode(frame: SituationFrame, metrics: EmotionalMetrics, stakes?: Level): DecisionMode {
    if (metrics.modeThreshold >= 1.0) return 'war';
    if (frame.situationType === 'casual') return 'quick';
    if (frame.situationType === 'decision' && stakes === 'high') return 'darbar';
    return this.mode;
  }
}

/**
 * Factory function for creating a mode router.
 */
export function createModeRouter(logger: Logger, defaultMode?: DecisionMode): ModeRouter {
  return new ModeRouter(logger, defaultMode);
}
