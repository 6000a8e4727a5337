/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type {
  DecisionRecord,
  DecisionDraft,
  DecisionWithOutcome,
  DecisionStatistics,
  ModeStatistics,
  DecisionLogConfig,
} from './decision-log.js';
export {
  DecisionLog,
  createDecisionLog,
  decisionKeyFor,
  decisionRecordSchema,
  DECISION_LOG_FILE,
  OUTCOME_INDEX_KEY,
  HIGH_REGRET_THRESHOLD,
} from './decision-log.js';
