import type { CouncilMemberId } from './advisor.js';

export type CouncilOutcome = 'consensus_reached' | 'bounded_risk_tradeoff' | 'deadlocked';

export type Recommendation = 'support' | 'oppose' | 'defer' | 'support_with_caution';

export interface VoteTally {
  support: number;
  oppose: number;
  neutral: number;
  total: number;
}

/**
 * Council output for one decision. Derived only from the positions.
 */
export interface CouncilRecommendation {
  outcome: CouncilOutcome;
  recommendation: Recommendation;
  avgConfidence: number;
  consensusStrength: number;
  dissenters: CouncilMemberId[];
  redLineConcerns: string[];
  reasoning: string;
  votes: VoteTally;
}

export type OmissionReason = 'timeout' | 'error';

/** An advisor that did not return a position */
export interface OmittedAdvisor {
  id: CouncilMemberId;
  reason: OmissionReason;
  message: string;
}
