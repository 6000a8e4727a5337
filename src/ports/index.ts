/**
 * Ports - boundaries to collaborators outside the engine.
 */

export type {
  TextUnderstanding,
  UnderstandingService,
  UnderstandingContext,
  ResilientUnderstandingConfig,
} from './understanding.js';
export {
  HeuristicUnderstanding,
  ResilientUnderstanding,
  createUnderstanding,
  guessDomains,
  understandingPayloadSchema,
  NEUTRAL_FRAME,
  NEUTRAL_METRICS,
  HEURISTIC_DOMAIN_CONFIDENCE,
} from './understanding.js';
