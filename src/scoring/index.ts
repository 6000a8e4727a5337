/**
 * Scoring module exports (KIS).
 */

export {
  ScoringEngine,
  createScoringEngine,
  scoreEntry,
  score,
  findContradictions,
  candidateQuality,
  toEvidence,
  NEGATION_MARKERS,
  CONTRADICTION_SIMILARITY,
} from './scoring-engine.js';
export type {
  FactorBreakdown,
  ScoreRequest,
  ScoredEntry,
  Contradiction,
  TypeWeightSource,
  SynthesisQuery,
  SynthesisResult,
  ScoringEngineConfig,
} from './scoring-engine.js';
export {
  isApplicable,
  domainWeight,
  typeWeight,
  memoryWeight,
  contextWeight,
  goalWeight,
  entryAgeDays,
} from './factors.js';
export { BASE_TYPE_WEIGHTS, POSTURE_TYPE_BIAS, postureBias } from './posture.js';
