/**
 * Observed real-world result of a recorded decision.
 */
export interface DecisionOutcome {
  success: boolean;
  /** 0-1 */
  regretScore: number;
  recoveryTimeDays: number;
  secondaryDamage: boolean;
}

/**
 * Persisted outcome, at most one per decision key.
 */
export interface OutcomeRecord extends DecisionOutcome {
  decisionId: string;
  decisionKey: string;
  /** ISO timestamp of the latest write */
  timestamp: string;
}
