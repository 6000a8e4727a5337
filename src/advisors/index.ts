/**
 * Advisor module exports.
 */

export { Advisor, PROHIBITION_CONFIDENCE, WORLDVIEW_SUPPORT_RATIO } from './advisor.js';
export type { AdvisorDeps } from './advisor.js';
export { AdvisorRegistry, createAdvisorRegistry, isJudge } from './registry.js';
export type { AdvisorRegistryDeps } from './registry.js';
export {
  DoctrineBook,
  DOCTRINE_IDS,
  EMPTY_DOCTRINE,
  doctrineSchema,
  loadDoctrineBook,
  toDoctrine,
} from './doctrine.js';
export type { Doctrine, DoctrineId } from './doctrine.js';
export { Lexicon, loadLexicon, parseLexicon, lexiconFileSchema } from './lexicon.js';
export type { MarkerMatcher } from './lexicon.js';
export { verdict } from './definition.js';
export type { AdvisorDefinition, HeuristicInput, HeuristicVerdict } from './definition.js';
export { VOTING_DEFINITIONS } from './voting-advisors.js';
export { JUDGE_DEFINITIONS } from './judges.js';
