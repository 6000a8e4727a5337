import type { ApplicabilityFrame, KnowledgeType } from './knowledge.js';
import type { BucketFeatures } from './features.js';

/**
 * The voting council. Order here is the canonical roster order.
 */
export const VOTING_ADVISORS = [
  'adaptation',
  'conflict',
  'diplomacy',
  'data',
  'discipline',
  'grand_strategist',
  'intelligence',
  'timing',
  'risk',
  'power',
  'psychology',
  'technology',
  'legitimacy',
  'truth',
  'narrative',
  'sovereign',
  'optionality',
  'risk_resources',
  'war_mode',
] as const;

export type AdvisorId = (typeof VOTING_ADVISORS)[number];

/** Advisory-only members, recorded for audit but never counted */
export const JUDGES = ['tribunal'] as const;

export type JudgeId = (typeof JUDGES)[number];

export type CouncilMemberId = AdvisorId | JudgeId;

export type Stance = 'support' | 'oppose' | 'neutral';

/** Which evaluation step produced a position */
export type PositionSource = 'doctrine_prohibition' | 'doctrine_worldview' | 'heuristic';

/**
 * A ranked knowledge entry an advisor cites.
 */
export interface EvidenceItem {
  entryId: string;
  type: KnowledgeType;
  score: number;
  content: string;
}

/**
 * One advisor's stance on a decision.
 */
export interface Position {
  advisor: CouncilMemberId;
  domain: string;
  stance: Stance;
  /** 0-1 */
  confidence: number;
  reasoning: string;
  redLineTriggered: boolean;
  concerns: string[];
  recommendations: string[];
  source: PositionSource;
  evidence: EvidenceItem[];
}

/**
 * Shared read-only context handed to every advisor of one decision.
 */
export interface AdvisorContext {
  domains: readonly string[];
  domainConfidence: number;
  recentTurns: readonly string[];
  turnCount: number;
  frame?: ApplicabilityFrame;
  /** Used to look up the learned prior for knowledge scoring */
  bucketFeatures?: BucketFeatures;
  now?: Date;
}
