export const DECISION_MODES = ['quick', 'war', 'meeting', 'darbar'] as const;

/**
 * Routing policy: which advisors sit and how their votes are read.
 */
export type DecisionMode = (typeof DECISION_MODES)[number];

export function isDecisionMode(value: string): value is DecisionMode {
  return DECISION_MODES.some((mode) => mode === value);
}
