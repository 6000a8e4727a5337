import { mean } from '../core/utils/math.js';
import type { CouncilMemberId, Position } from '../types/advisor.js';
import type { CouncilRecommendation, Recommendation, VoteTally } from '../types/council.js';

/** Share of the council one side needs for consensus */
export const CONSENSUS_SHARE = 0.6;
export const RED_LINE_STRENGTH = 0.95;
export const DEFAULT_AVG_CONFIDENCE = 0.5;

export function tally(positions: Iterable<Position>): VoteTally {
  const votes: VoteTally = { support: 0, oppose: 0, neutral: 0, total: 0 };
  for (const position of positions) {
    votes[position.stance]++;
    votes.total++;
  }
  return votes;
}

function dissentersOf(
  positions: ReadonlyMap<CouncilMemberId, Position>,
  recommendation: Recommendation
): CouncilMemberId[] {
  const against =
    recommendation === 'oppose'
      ? 'support'
      : recommendation === 'support' || recommendation === 'support_with_caution'
        ? 'oppose'
        : undefined;
  if (!against) return [];
  return [...positions.values()].filter((p) => p.stance === against).map((p) => p.advisor);
}

/**
 * Reduce advisor positions to one recommendation.
 *
 * Rules, first match wins:
 * 1. any red line: consensus_reached / oppose (no counting)
 * 2. support > oppose and support >= 60% of total: consensus / support
 * 3. oppose > support and oppose >= 60% of total: consensus / oppose
 * 4. both sides present: bounded_risk_tradeoff / support_with_caution
 * 5. otherwise deadlocked / defer
 */
export function aggregate(
  positions: ReadonlyMap<CouncilMemberId, Position>
): CouncilRecommendation {
  const all = [...positions.values()];
  const votes = tally(all);
  const avgConfidence = mean(
    all.map((p) => p.confidence),
    DEFAULT_AVG_CONFIDENCE
  );

  const redLines = all.filter((p) => p.redLineTriggered);
  if (redLines.length > 0) {
    return {
      outcome: 'consensus_reached',
      recommendation: 'oppose',
      avgConfidence,
      consensusStrength: RED_LINE_STRENGTH,
      dissenters: dissentersOf(positions, 'oppose'),
      redLineConcerns: redLines.map((p) => `${p.advisor}: ${p.reasoning}`),
      reasoning: `RED LINE triggered by: ${redLines.map((p) => p.advisor).join(', ')}`,
      votes,
    };
  }

  const { support, oppose, neutral, total } = votes;
  const base = { avgConfidence, redLineConcerns: [], votes };

  if (support > oppose && support >= CONSENSUS_SHARE * total) {
    return {
      ...base,
      outcome: 'consensus_reached',
      recommendation: 'support',
      consensusStrength: support / total,
      dissenters: dissentersOf(positions, 'support'),
      reasoning: `Support consensus: ${String(support)}/${String(total)} advisors`,
    };
  }

  if (oppose > support && oppose >= CONSENSUS_SHARE * total) {
    return {
      ...base,
      outcome: 'consensus_reached',
      recommendation: 'oppose',
      consensusStrength: oppose / total,
      dissenters: dissentersOf(positions, 'oppose'),
      reasoning: `Oppose consensus: ${String(oppose)}/${String(total)} advisors`,
    };
  }

  if (support > 0 && oppose > 0) {
    return {
      ...base,
      outcome: 'bounded_risk_tradeoff',
      recommendation: 'support_with_caution',
      consensusStrength: Math.max(support, oppose) / total,
      dissenters: dissentersOf(positions, 'support_with_caution'),
      reasoning: `Split council: ${String(support)} support, ${String(oppose)} oppose, ${String(neutral)} neutral`,
    };
  }

  return {
    ...base,
    outcome: 'deadlocked',
    recommendation: 'defer',
    consensusStrength: 0,
    dissenters: [],
    reasoning:
      total === 0
        ? 'No advisors responded'
        : `No consensus: ${String(support)} support, ${String(oppose)} oppose, ${String(neutral)} neutral`,
  };
}
