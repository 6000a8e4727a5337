/**
 * The five KIS factors and the applicability pre-filter.
 *
 * Each factor is a pure function of the entry and the request so it can be
 * traced and tested on its own. The final score is their product.
 */

import { DateTime } from 'luxon';
import { extractKeywords, labelSimilarity } from '../core/utils/text-similarity.js';
import type {
  ApplicabilityFrame,
  KnowledgeEntry,
  MemoryStats,
  Posture,
  TypeWeights,
} from '../types/knowledge.js';
import { LEVEL_ORDER } from '../types/knowledge.js';
import { BASE_TYPE_WEIGHTS, postureBias } from './posture.js';

/** Domain weight for an entry outside the active domains */
export const INACTIVE_DOMAIN_WEIGHT = 0.25;
/** Domain weight floor for an active domain */
export const MIN_ACTIVE_DOMAIN_WEIGHT = 0.5;
export const PENALTY_DECAY = 0.3;
export const DEFAULT_AGE_DECAY_DAYS = 180;
export const MEMORY_WEIGHT_FLOOR = 0.01;

export const CONTEXT_WEIGHTS = {
  noSignal: 0.8,
  noMatch: 0.85,
  oneMatch: 1.2,
  manyMatches: 1.4,
} as const;

export const LONG_HORIZON_MARKERS = ['dependency', 'long-term', 'trajectory', 'control'] as const;
export const SHORT_TERM_MARKERS = ['temporary', 'short-term', 'relief'] as const;

export const GOAL_WEIGHTS = {
  longHorizon: 1.2,
  shortTerm: 0.7,
  neutral: 1.0,
} as const;

/**
 * False when the entry declares constraints the frame violates.
 * No frame, or no constraints, always passes.
 */
export function isApplicable(entry: KnowledgeEntry, frame?: ApplicabilityFrame): boolean {
  const constraints = entry.applicability;
  if (!frame || !constraints) return true;

  const frameDomains = frame.domains.map((d) => d.toLowerCase());

  if (constraints.requiredDomains && constraints.requiredDomains.length > 0) {
    if (frameDomains.length === 0) return false;
    const required = constraints.requiredDomains.map((r) => r.toLowerCase());
    const satisfied = required.some((r) => frameDomains.some((d) => d.includes(r)));
    if (!satisfied) return false;
  }

  if (constraints.excludedDomains) {
    const excluded = constraints.excludedDomains.map((e) => e.toLowerCase());
    if (excluded.some((e) => frameDomains.some((d) => d.includes(e)))) return false;
  }

  if (constraints.minStakes && frame.stakes) {
    if (LEVEL_ORDER[frame.stakes] < LEVEL_ORDER[constraints.minStakes]) return false;
  }

  if (constraints.maxTimePressure && frame.timePressure) {
    if (LEVEL_ORDER[frame.timePressure] > LEVEL_ORDER[constraints.maxTimePressure]) return false;
  }

  return true;
}

export function domainWeight(
  domain: string,
  activeDomains: readonly string[],
  domainConfidence: number,
  conceptTags?: readonly string[]
): number {
  const wanted = domain.toLowerCase();
  const active = activeDomains.some((d) => d.toLowerCase() === wanted);
  let weight = active ? Math.max(domainConfidence, MIN_ACTIVE_DOMAIN_WEIGHT) : INACTIVE_DOMAIN_WEIGHT;

  if (conceptTags && conceptTags.length > 0 && activeDomains.length > 0) {
    const similarity = labelSimilarity(conceptTags, activeDomains);
    // a zero confidence means "unknown", not "none"
    weight = Math.max(weight, similarity * (domainConfidence || 1));
  }

  return weight;
}

export function typeWeight(
  type: KnowledgeEntry['type'],
  posture?: Posture,
  learned?: Readonly<TypeWeights>
): number {
  return BASE_TYPE_WEIGHTS[type] * postureBias(type, posture) * (learned ? learned[type] : 1.0);
}

/**
 * Days since the last reinforcement, or undefined when never reinforced or
 * the timestamp is unreadable. Never negative.
 */
export function entryAgeDays(memory: MemoryStats, now: Date): number | undefined {
  if (!memory.lastReinforcedAt) return undefined;
  const last = DateTime.fromISO(memory.lastReinforcedAt);
  if (!last.isValid) return undefined;
  return Math.max(0, DateTime.fromJSDate(now).diff(last, 'days').days);
}

export function memoryWeight(
  reinforcementCount: number,
  penaltyCount: number,
  ageDays?: number,
  ageDecayDays: number = DEFAULT_AGE_DECAY_DAYS
): number {
  let weight = 1 + Math.log1p(Math.max(0, reinforcementCount));
  if (penaltyCount > 0) {
    weight *= Math.exp(-PENALTY_DECAY * penaltyCount);
  }
  if (ageDays !== undefined) {
    weight *= Math.exp(-ageDays / ageDecayDays);
  }
  return Math.max(weight, MEMORY_WEIGHT_FLOOR);
}

export function contextWeight(
  content: string,
  contextText: string,
  goalTags?: readonly string[]
): number {
  const keywords = extractKeywords(contextText);
  const lowered = content.toLowerCase();

  let weight: number;
  if (keywords.length === 0 || lowered.trim().length === 0) {
    weight = CONTEXT_WEIGHTS.noSignal;
  } else {
    const matches = keywords.filter((k) => lowered.includes(k)).length;
    if (matches >= 2) weight = CONTEXT_WEIGHTS.manyMatches;
    else if (matches === 1) weight = CONTEXT_WEIGHTS.oneMatch;
    else weight = CONTEXT_WEIGHTS.noMatch;
  }

  if (goalTags && goalTags.length > 0 && contextText.trim().length > 0) {
    const similarity = labelSimilarity(goalTags, [contextText]);
    weight = Math.max(weight, 0.5 + similarity * 0.5);
  }

  return weight;
}

export function goalWeight(content: string): number {
  const lowered = content.toLowerCase();
  if (LONG_HORIZON_MARKERS.some((m) => lowered.includes(m))) return GOAL_WEIGHTS.longHorizon;
  if (SHORT_TERM_MARKERS.some((m) => lowered.includes(m))) return GOAL_WEIGHTS.shortTerm;
  return GOAL_WEIGHTS.neutral;
}
