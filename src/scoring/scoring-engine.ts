import { FALLBACK_ENTRIES } from '../knowledge/fallback-entries.js';
import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import { clamp01, mean } from '../core/utils/math.js';
import { containsAny, labelSimilarity } from '../core/utils/text-similarity.js';
import type { EvidenceItem } from '../types/advisor.js';
import type { BucketFeatures } from '../types/features.js';
import type {
  ApplicabilityFrame,
  KnowledgeEntry,
  Posture,
  TypeWeights,
} from '../types/knowledge.js';
import type { Logger } from '../types/logger.js';
import {
  DEFAULT_AGE_DECAY_DAYS,
  contextWeight,
  domainWeight,
  entryAgeDays,
  goalWeight,
  isApplicable,
  memoryWeight,
  typeWeight,
} from './factors.js';

/**
 * Per-factor trace of one score.
 */
export interface FactorBreakdown {
  applicable: boolean;
  domain: number;
  type: number;
  memory: number;
  context: number;
  goal: number;
}

export interface ScoreRequest {
  activeDomains: readonly string[];
  domainConfidence: number;
  contextText: string;
  posture?: Posture;
  frame?: ApplicabilityFrame;
  /** Learned multipliers, only passed when the prior is confident */
  learnedTypeWeights?: Readonly<TypeWeights>;
  now?: Date;
  ageDecayDays?: number;
}

export interface ScoredEntry {
  entry: KnowledgeEntry;
  score: number;
  factors: FactorBreakdown;
}

/**
 * Score one entry: zero when inapplicable, else the product of the five
 * factors.
 */
export function scoreEntry(entry: KnowledgeEntry, request: ScoreRequest): ScoredEntry {
  if (!isApplicable(entry, request.frame)) {
    return {
      entry,
      score: 0,
      factors: { applicable: false, domain: 0, type: 0, memory: 0, context: 0, goal: 0 },
    };
  }

  const ageDays = entryAgeDays(entry.memory, request.now ?? new Date());
  const factors: FactorBreakdown = {
    applicable: true,
    domain: domainWeight(
      entry.domain,
      request.activeDomains,
      request.domainConfidence,
      entry.conceptTags
    ),
    type: typeWeight(entry.type, request.posture, request.learnedTypeWeights),
    memory: memoryWeight(
      entry.memory.reinforcementCount,
      entry.memory.penaltyCount,
      ageDays,
      request.ageDecayDays ?? DEFAULT_AGE_DECAY_DAYS
    ),
    context: contextWeight(entry.content, request.contextText, entry.goalTags),
    goal: goalWeight(entry.content),
  };

  const score = factors.domain * factors.type * factors.memory * factors.context * factors.goal;
  return { entry, score, factors };
}

/**
 * Relevance of an entry scored against `domain` as its domain.
 */
export function score(
  entry: KnowledgeEntry,
  domain: string,
  activeDomains: readonly string[],
  domainConfidence: number,
  contextText: string,
  posture?: Posture
): number {
  const request: ScoreRequest = { activeDomains, domainConfidence, contextText };
  if (posture) request.posture = posture;
  return scoreEntry({ ...entry, domain }, request).score;
}

export const NEGATION_MARKERS = ['not', 'never', 'avoid', "don't", 'do not'] as const;

/** Domain similarity at which two entries are compared for contradiction */
export const CONTRADICTION_SIMILARITY = 0.4;

export interface Contradiction {
  first: string;
  second: string;
  similarity: number;
}

/**
 * Pairs of same-area entries where exactly one side is negated.
 */
export function findContradictions(entries: readonly KnowledgeEntry[]): Contradiction[] {
  const found: Contradiction[] = [];
  const negated = entries.map((e) => containsAny(e.content, NEGATION_MARKERS));

  for (let i = 0; i < entries.length; i++) {
    for (let j = i + 1; j < entries.length; j++) {
      const a = entries[i];
      const b = entries[j];
      if (!a || !b) continue;
      const similarity = labelSimilarity([a.domain], [b.domain]);
      if (similarity < CONTRADICTION_SIMILARITY) continue;
      if (negated[i] !== negated[j]) {
        found.push({ first: a.id, second: b.id, similarity });
      }
    }
  }
  return found;
}

/**
 * Saturating 0-1 quality of a ranked selection.
 */
export function candidateQuality(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  const avg = mean(scores);
  return clamp01(avg / (1 + Math.abs(avg)));
}

/**
 * Source of learned type weights for a situation.
 */
export interface TypeWeightSource {
  resolveTypeWeights(features: BucketFeatures): Readonly<TypeWeights> | undefined;
}

export interface SynthesisQuery {
  activeDomains: readonly string[];
  domainConfidence: number;
  contextText: string;
  /** Knowledge domains to scan; defaults to the active domains */
  scanDomains?: readonly string[];
  posture?: Posture;
  frame?: ApplicabilityFrame;
  /** Situation used to look up learned type weights */
  bucketFeatures?: BucketFeatures;
  topK?: number;
  now?: Date;
}

export interface SynthesisResult {
  items: ScoredEntry[];
  candidateQuality: number;
  averageScore: number;
  contradictions: Contradiction[];
  totalScanned: number;
  booksScanned: string[];
  usedFallback: boolean;
  /** Learned weights applied, when the prior was confident */
  learnedTypeWeights?: Readonly<TypeWeights>;
}

export interface ScoringEngineConfig {
  topK: number;
  ageDecayDays: number;
}

const DEFAULT_CONFIG: ScoringEngineConfig = {
  topK: 5,
  ageDecayDays: DEFAULT_AGE_DECAY_DAYS,
};

/**
 * ScoringEngine - ranks knowledge for a query (KIS).
 *
 * Reads the store and, when wired, the learned prior. Never writes either.
 * An empty store is replaced by the builtin fallback entries.
 */
export class ScoringEngine {
  private readonly logger: Logger;
  private readonly config: ScoringEngineConfig;
  private priors: TypeWeightSource | undefined;

  constructor(
    private readonly store: KnowledgeStore,
    logger: Logger,
    config: Partial<ScoringEngineConfig> = {}
  ) {
    this.logger = logger.child({ component: 'scoring-engine' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Wire the learned prior consulted for type weights.
   */
  usePriors(source: TypeWeightSource): void {
    this.priors = source;
  }

  synthesize(query: SynthesisQuery): SynthesisResult {
    const { candidates, usedFallback } = this.candidates(query);
    const learned = query.bucketFeatures
      ? this.priors?.resolveTypeWeights(query.bucketFeatures)
      : undefined;

    const request: ScoreRequest = {
      activeDomains: query.activeDomains,
      domainConfidence: query.domainConfidence,
      contextText: query.contextText,
      ageDecayDays: this.config.ageDecayDays,
    };
    if (query.posture) request.posture = query.posture;
    if (query.frame) request.frame = query.frame;
    if (query.now) request.now = query.now;
    if (learned) request.learnedTypeWeights = learned;

    const scored = candidates.map((entry) => scoreEntry(entry, request));
    // Array.prototype.sort is stable: ties keep insertion order
    const ranked = scored
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, query.topK ?? this.config.topK);

    const scores = ranked.map((r) => r.score);
    const result: SynthesisResult = {
      items: ranked,
      candidateQuality: candidateQuality(scores),
      averageScore: mean(scores),
      contradictions: findContradictions(ranked.map((r) => r.entry)),
      totalScanned: candidates.length,
      booksScanned: [...new Set(candidates.map((c) => c.provenance.book))],
      usedFallback,
    };
    if (learned) result.learnedTypeWeights = learned;

    this.logger.debug(
      {
        scanned: result.totalScanned,
        selected: ranked.length,
        quality: result.candidateQuality,
        contradictions: result.contradictions.length,
        usedFallback,
        learned: learned !== undefined,
      },
      'Knowledge synthesized'
    );

    return result;
  }

  private candidates(query: SynthesisQuery): {
    candidates: readonly KnowledgeEntry[];
    usedFallback: boolean;
  } {
    if (this.store.size === 0) {
      return { candidates: FALLBACK_ENTRIES, usedFallback: true };
    }

    const domains = query.scanDomains ?? query.activeDomains;
    const inDomain = domains.length > 0 ? this.store.byDomains(domains) : [];
    return {
      candidates: inDomain.length > 0 ? inDomain : this.store.all(),
      usedFallback: false,
    };
  }
}

/**
 * Top n ranked items as citable evidence.
 */
export function toEvidence(items: readonly ScoredEntry[], n: number): EvidenceItem[] {
  return items.slice(0, n).map((item) => ({
    entryId: item.entry.id,
    type: item.entry.type,
    score: Number(item.score.toFixed(4)),
    content: item.entry.content,
  }));
}

/**
 * Factory function for creating a scoring engine.
 */
export function createScoringEngine(
  store: KnowledgeStore,
  logger: Logger,
  config: Partial<ScoringEngineConfig> = {}
): ScoringEngine {
  return new ScoringEngine(store, logger, config);
}
