export {
  DecisionEngine,
  createDecisionEngine,
  type DecisionRequest,
  type DecisionResult,
  type DirectResponse,
  type CouncilDecision,
  type DecisionEngineDeps,
} from './decision-engine.js';

export {
  SituationSnapshotStore,
  createSituationSnapshotStore,
  type SituationSnapshot,
} from './situation-snapshot.js';

export {
  ClarificationSession,
  createClarificationSession,
  CLARIFYING_QUESTIONS,
  type ClarificationState,
  type ClarificationStep,
  type ClarificationConfig,
} from './clarification.js';
