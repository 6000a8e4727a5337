/**
 * Structured values produced by the external text-understanding service.
 */

export const SITUATION_TYPES = ['casual', 'emotional', 'decision', 'unclear'] as const;

export type SituationType = (typeof SITUATION_TYPES)[number];

export interface SituationFrame {
  situationType: SituationType;
  /** 0-1 */
  clarity: number;
  /** 0-1 */
  emotionalLoad: number;
}

export interface DomainClassification {
  domains: string[];
  /** 0-1 */
  confidence: number;
}

/**
 * Emotional metrics, all in [0, 1].
 *
 * `modeThreshold` at 1.0 asks for immediate war mode; `adviceThreshold`
 * signals whether deeper knowledge synthesis is wanted.
 */
export interface EmotionalMetrics {
  emotionalMaturity: number;
  volatility: number;
  stress: number;
  confidence: number;
  modeThreshold: number;
  adviceThreshold: number;
}

export interface UnderstandingResult {
  frame: SituationFrame;
  domains: DomainClassification;
  metrics: EmotionalMetrics;
  /** 'service' when the collaborator answered, 'heuristic' when the fallback did */
  source: 'service' | 'heuristic';
}
