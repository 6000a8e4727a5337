import type { AdvisorContext, CouncilMemberId, Stance } from '../types/advisor.js';
import type { Posture } from '../types/knowledge.js';
import type { SynthesisResult } from '../scoring/scoring-engine.js';
import type { MarkerMatcher } from './lexicon.js';

/**
 * What a fallback heuristic concludes.
 */
export interface HeuristicVerdict {
  stance: Stance;
  confidence: number;
  reasoning: string;
  redLine?: boolean;
  concerns?: string[];
  recommendations?: string[];
}

export interface HeuristicInput {
  text: string;
  context: AdvisorContext;
  markers: MarkerMatcher;
  /** Knowledge the advisor retrieved for this input */
  knowledge: SynthesisResult;
}

/**
 * Static description of one council member.
 */
export interface AdvisorDefinition {
  id: CouncilMemberId;
  title: string;
  /** Knowledge domains this advisor reads */
  knowledgeDomains: readonly string[];
  posture: Posture;
  /** Lexicon sets the heuristic needs */
  markerSets: readonly string[];
  assess(input: HeuristicInput): HeuristicVerdict;
}

export function verdict(
  stance: Stance,
  confidence: number,
  reasoning: string,
  extra: Pick<HeuristicVerdict, 'redLine' | 'concerns' | 'recommendations'> = {}
): HeuristicVerdict {
  return { stance, confidence, reasoning, ...extra };
}
