import { describe, it, expect } from 'vitest';
import {
  CLARIFYING_QUESTIONS,
  createClarificationSession,
} from '../../../src/decision/clarification.js';
import { KnowledgeStore } from '../../../src/knowledge/knowledge-store.js';
import { createScoringEngine } from '../../../src/scoring/scoring-engine.js';
import { InvalidStateError } from '../../../src/core/errors.js';
import { createEntry, createMockLogger } from '../../helpers/factories.js';

const scoring = createScoringEngine(
  new KnowledgeStore([createEntry({ id: 'k1', content: 'Protect savings before any decision.' })]),
  createMockLogger()
);
const query = { activeDomains: ['risk'], domainConfidence: 1 };

describe('ClarificationSession', () => {
  it('asks until the knowledge is good enough', () => {
    const session = createClarificationSession(scoring, query, createMockLogger(), {
      qualityThreshold: 0.5,
    });
    expect(session.currentState).toBe('idle');

    const first = session.start('hello there');
    expect(first).toMatchObject({
      state: 'awaiting_answer',
      question: CLARIFYING_QUESTIONS[0],
      round: 1,
    });
    expect(first.candidateQuality).toBeCloseTo(0.85 / 1.85);

    const second = session.answer('my savings');
    expect(second.state).toBe('satisfied');
    expect(second.question).toBeNull();
    expect(second.candidateQuality).toBeCloseTo(1.2 / 2.2);
    expect(session.accumulatedContext).toBe('hello there my savings');
  });

  it('is satisfied at once when the first context suffices', () => {
    const session = createClarificationSession(scoring, query, createMockLogger(), {
      qualityThreshold: 0.5,
    });

    expect(session.start('savings decision').state).toBe('satisfied');
  });

  it('gives up after the last allowed question', () => {
    const session = createClarificationSession(scoring, query, createMockLogger(), {
      qualityThreshold: 0.9,
      maxRounds: 2,
    });

    expect(session.start('hello').question).toBe(CLARIFYING_QUESTIONS[0]);
    expect(session.answer('still unsure').question).toBe(CLARIFYING_QUESTIONS[1]);
    const last = session.answer('no idea');

    expect(last).toMatchObject({ state: 'exhausted', question: null, round: 2 });
  });

  it('rejects calls out of order', () => {
    const session = createClarificationSession(scoring, query, createMockLogger(), {
      qualityThreshold: 0.5,
    });

    expect(() => session.answer('too early')).toThrow(InvalidStateError);
    session.start('savings decision');
    expect(() => session.start('again')).toThrow(
      'ClarificationSession cannot start in state satisfied'
    );
    expect(() => session.answer('late')).toThrow(InvalidStateError);
  });
});
