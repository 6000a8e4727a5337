/**
 * Test factories for creating test data.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { KnowledgeEntry } from '../../src/types/knowledge.js';
import type { AdvisorId, CouncilMemberId, Position, Stance } from '../../src/types/advisor.js';
import { VOTING_ADVISORS } from '../../src/types/advisor.js';
import type { CouncilRecommendation } from '../../src/types/council.js';
import type { DecisionFeatures } from '../../src/types/features.js';
import type { Storage } from '../../src/storage/storage.js';
import type { DecisionDraft } from '../../src/storage/decision-log.js';
import { parseLexicon, type Lexicon } from '../../src/advisors/lexicon.js';

type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface MockLogger extends Logger {
  calls: Record<LogLevelName, unknown[][]>;
  reset: () => void;
  child: (bindings: Record<string, unknown>) => MockLogger;
}

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): MockLogger {
  const calls: Record<LogLevelName, unknown[][]> = {
    debug: [],
    info: [],
    warn: [],
    error: [],
  };

  const logger: MockLogger = {
    debug: vi.fn((...args: unknown[]) => {
      calls.debug.push(args);
    }),
    info: vi.fn((...args: unknown[]) => {
      calls.info.push(args);
    }),
    warn: vi.fn((...args: unknown[]) => {
      calls.warn.push(args);
    }),
    error: vi.fn((...args: unknown[]) => {
      calls.error.push(args);
    }),
    child: () => logger,
    calls,
    reset: () => {
      calls.debug = [];
      calls.info = [];
      calls.warn = [];
      calls.error = [];
      vi.clearAllMocks();
    },
  };

  return logger;
}

/** Message strings logged at a level */
export function loggedMessages(logger: MockLogger, level: LogLevelName): string[] {
  return logger.calls[level].map((args) => {
    const last = args[args.length - 1];
    return typeof last === 'string' ? last : '';
  });
}

/**
 * Create a knowledge entry with sensible defaults.
 */
export function createEntry(overrides: Partial<KnowledgeEntry> & { id: string }): KnowledgeEntry {
  return {
    domain: 'risk',
    type: 'principle',
    content: 'Protect the downside first.',
    provenance: { book: 'test-book' },
    memory: { reinforcementCount: 0, penaltyCount: 0 },
    ...overrides,
  };
}

/**
 * Create a position with sensible defaults.
 */
export function createPosition(
  advisor: CouncilMemberId,
  stance: Stance,
  confidence = 0.7,
  overrides: Partial<Position> = {}
): Position {
  return {
    advisor,
    domain: advisor,
    stance,
    confidence,
    reasoning: `${advisor} says ${stance}`,
    redLineTriggered: false,
    concerns: [],
    recommendations: [],
    source: 'heuristic',
    evidence: [],
    ...overrides,
  };
}

/**
 * Positions for the voting roster in order: the first `support` advisors
 * support, the next `oppose` oppose, the next `neutral` are neutral.
 */
export function createVotes(
  support: number,
  oppose: number,
  neutral: number,
  confidence = 0.7
): Map<CouncilMemberId, Position> {
  const stances: Stance[] = [
    ...Array.from({ length: support }, (): Stance => 'support'),
    ...Array.from({ length: oppose }, (): Stance => 'oppose'),
    ...Array.from({ length: neutral }, (): Stance => 'neutral'),
  ];
  const positions = new Map<CouncilMemberId, Position>();
  stances.forEach((stance, index) => {
    const advisor: AdvisorId | undefined = VOTING_ADVISORS[index];
    if (advisor) positions.set(advisor, createPosition(advisor, stance, confidence));
  });
  return positions;
}

export function createRecommendation(
  overrides: Partial<CouncilRecommendation> = {}
): CouncilRecommendation {
  return {
    outcome: 'consensus_reached',
    recommendation: 'support',
    avgConfidence: 0.8,
    consensusStrength: 0.8,
    dissenters: [],
    redLineConcerns: [],
    reasoning: 'Support consensus: 4/5 advisors',
    votes: { support: 4, oppose: 1, neutral: 0, total: 5 },
    ...overrides,
  };
}

export function createFeatures(
  overrides: {
    situation?: Partial<DecisionFeatures['situation']>;
    constraints?: Partial<DecisionFeatures['constraints']>;
    usage?: Partial<DecisionFeatures['usage']>;
  } = {}
): DecisionFeatures {
  return {
    situation: {
      decisionIrreversible: 0.1,
      decisionReversible: 0.8,
      decisionExploratory: 0.1,
      riskLow: 1,
      riskMedium: 0,
      riskHigh: 0,
      horizonShort: 0,
      horizonMedium: 1,
      horizonLong: 0,
      timePressure: 0.3,
      informationCompleteness: 0.5,
      ...overrides.situation,
    },
    constraints: {
      irreversibilityScore: 0.1,
      fragilityScore: 0.3,
      optionalityLossScore: 0.3,
      downsideAsymmetry: 0.3,
      upsideAsymmetry: 0.3,
      recoveryTimeLong: 0,
      ...overrides.constraints,
    },
    usage: {
      usedPrinciple: 0,
      usedRule: 0,
      usedWarning: 0,
      usedClaim: 0,
      usedAdvice: 0,
      ...overrides.usage,
    },
  };
}

export function createDecisionDraft(overrides: Partial<DecisionDraft> = {}): DecisionDraft {
  return {
    decisionId: 'd-1',
    timestamp: '2026-01-15T10:00:00.000Z',
    mode: 'meeting',
    text: 'Should I take the offer?',
    domains: ['career'],
    advisorsInvolved: ['risk', 'grand_strategist', 'psychology'],
    outcome: 'consensus_reached',
    recommendation: 'support',
    avgConfidence: 0.7,
    consensusStrength: 0.67,
    redLineConcerns: [],
    dissenters: ['psychology'],
    interpretation: 'strong_consensus_support',
    verdict: { finalOutcome: 'accept', reason: 'consensus_support' },
    features: createFeatures(),
    evidenceIds: [],
    ...overrides,
  };
}

/**
 * In-process Storage. Set `failSaves` to make every save throw.
 */
export class InMemoryStorage implements Storage {
  readonly data = new Map<string, unknown>();
  failSaves = false;

  load(key: string): Promise<unknown> {
    return Promise.resolve(this.data.has(key) ? structuredClone(this.data.get(key)) : null);
  }

  save(key: string, value: unknown): Promise<void> {
    if (this.failSaves) {
      return Promise.reject(new Error('disk full'));
    }
    this.data.set(key, structuredClone(value));
    return Promise.resolve();
  }

  delete(key: string): Promise<boolean> {
    return Promise.resolve(this.data.delete(key));
  }

  exists(key: string): Promise<boolean> {
    return Promise.resolve(this.data.has(key));
  }
}

export const LEXICON_PATH = fileURLToPath(new URL('../../data/advisors/lexicon.json', import.meta.url));

/** The shipped advisor lexicon */
export function loadTestLexicon(): Lexicon {
  return parseLexicon(JSON.parse(readFileSync(LEXICON_PATH, 'utf-8')));
}
