import type { Doctrine } from '../advisors/doctrine.js';
import { containsAny, countOccurrences } from '../core/utils/text-similarity.js';
import type { CouncilMemberId, Position } from '../types/advisor.js';
import type { CouncilRecommendation } from '../types/council.js';
import type { Logger } from '../types/logger.js';

export type GateState =
  | 'constraint_check'
  | 'distortion_check'
  | 'pattern_check'
  | 'outcome_evaluation'
  | 'terminal';

export type FinalOutcome = 'accept' | 'accept_with_mitigation' | 'defer' | 'reject';

export type VerdictReason =
  | 'moralizing_language_forbidden'
  | 'emotional_distortion_detected'
  | 'pattern_recurrence_detected'
  | 'risk_red_line'
  | 'risk_veto'
  | 'consensus_support'
  | 'bounded_tradeoff_mitigated'
  | 'council_opposes'
  | 'council_deadlocked'
  | 'insufficient_confidence';

export interface Verdict {
  finalOutcome: FinalOutcome;
  reason: VerdictReason;
  /** States visited, in order, ending with terminal */
  trail: GateState[];
}

export const MORAL_TERMS = ['should', 'ought', 'right', 'wrong', 'evil', 'sin'] as const;

export const RATIONALIZATION_CONNECTIVES = [
  'but',
  'however',
  'despite',
  'still',
  'anyway',
  'regardless',
  'nevertheless',
  'although',
] as const;

/** Connectives tolerated before the reasoning counts as rationalizing */
export const MAX_CONNECTIVES = 2;
export const DISTORTION_CONFIDENCE = 0.7;
export const DISTORTION_STRENGTH = 0.3;

export interface FinalAuthorityConfig {
  riskThreshold: number;
}

const DEFAULT_CONFIG: FinalAuthorityConfig = {
  riskThreshold: 0.7,
};

type Step = { next: GateState } | { outcome: FinalOutcome; reason: VerdictReason };

/**
 * FinalAuthorityGate - last override pass over a council recommendation.
 *
 * A terminal state machine: constraint_check, distortion_check,
 * pattern_check, outcome_evaluation. Any check may end the run early with
 * a defer; outcome_evaluation always ends it.
 */
export class FinalAuthorityGate {
  private readonly logger: Logger;
  private readonly config: FinalAuthorityConfig;
  private readonly forbidsMoralizing: boolean;

  constructor(
    doctrine: Doctrine,
    logger: Logger,
    config: Partial<FinalAuthorityConfig> = {}
  ) {
    this.logger = logger.child({ component: 'final-authority' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.forbidsMoralizing = doctrine.mustNot.some((rule) => rule.toLowerCase().includes('moraliz'));
  }

  evaluate(
    recommendation: CouncilRecommendation,
    positions: ReadonlyMap<CouncilMemberId, Position>
  ): Verdict {
    const trail: GateState[] = [];
    let state: GateState = 'constraint_check';

    for (;;) {
      trail.push(state);
      const step = this.step(state, recommendation, positions);
      if ('next' in step) {
        state = step.next;
        continue;
      }

      trail.push('terminal');
      const verdict: Verdict = { finalOutcome: step.outcome, reason: step.reason, trail };
      this.logger.debug(
        { outcome: verdict.finalOutcome, reason: verdict.reason, decidedAt: state },
        'Final authority verdict'
      );
      return verdict;
    }
  }

  private step(
    state: GateState,
    rec: CouncilRecommendation,
    positions: ReadonlyMap<CouncilMemberId, Position>
  ): Step {
    switch (state) {
      case 'constraint_check':
        if (this.forbidsMoralizing && containsAny(rec.reasoning, MORAL_TERMS)) {
          return { outcome: 'defer', reason: 'moralizing_language_forbidden' };
        }
        return { next: 'distortion_check' };

      case 'distortion_check':
        if (rec.avgConfidence > DISTORTION_CONFIDENCE && rec.consensusStrength < DISTORTION_STRENGTH) {
          return { outcome: 'defer', reason: 'emotional_distortion_detected' };
        }
        return { next: 'pattern_check' };

      case 'pattern_check':
        if (countOccurrences(rec.reasoning, RATIONALIZATION_CONNECTIVES) > MAX_CONNECTIVES) {
          return { outcome: 'defer', reason: 'pattern_recurrence_detected' };
        }
        return { next: 'outcome_evaluation' };

      case 'outcome_evaluation':
        return this.evaluateOutcome(rec, positions);

      case 'terminal':
        // evaluate() never steps from terminal
        return { outcome: 'defer', reason: 'insufficient_confidence' };
    }
  }

  private evaluateOutcome(
    rec: CouncilRecommendation,
    positions: ReadonlyMap<CouncilMemberId, Position>
  ): Step {
    const { riskThreshold } = this.config;

    const risk = positions.get('risk');
    if (risk?.redLineTriggered) {
      return { outcome: 'reject', reason: 'risk_red_line' };
    }
    if (risk?.stance === 'oppose' && risk.confidence >= riskThreshold) {
      return { outcome: 'defer', reason: 'risk_veto' };
    }

    if (
      rec.outcome === 'consensus_reached' &&
      rec.recommendation === 'support' &&
      rec.avgConfidence >= riskThreshold
    ) {
      return { outcome: 'accept', reason: 'consensus_support' };
    }

    if (rec.outcome === 'bounded_risk_tradeoff' && rec.avgConfidence >= riskThreshold) {
      return { outcome: 'accept_with_mitigation', reason: 'bounded_tradeoff_mitigated' };
    }

    if (rec.recommendation === 'oppose') return { outcome: 'defer', reason: 'council_opposes' };
    if (rec.outcome === 'deadlocked') return { outcome: 'defer', reason: 'council_deadlocked' };
    return { outcome: 'defer', reason: 'insufficient_confidence' };
  }
}

/**
 * Factory function for creating the final-authority gate.
 */
export function createFinalAuthorityGate(
  doctrine: Doctrine,
  logger: Logger,
  config: Partial<FinalAuthorityConfig> = {}
): FinalAuthorityGate {
  return new FinalAuthorityGate(doctrine, logger, config);
}
