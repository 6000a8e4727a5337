/**
 * Final-authority exports.
 */

export {
  FinalAuthorityGate,
  createFinalAuthorityGate,
  MORAL_TERMS,
  RATIONALIZATION_CONNECTIVES,
  MAX_CONNECTIVES,
} from './final-authority-gate.js';
export type {
  FinalAuthorityConfig,
  FinalOutcome,
  GateState,
  Verdict,
  VerdictReason,
} from './final-authority-gate.js';
