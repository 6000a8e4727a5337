import { describe, it, expect } from 'vitest';
import { DoctrineBook, toDoctrine } from '../../../src/advisors/doctrine.js';
import { createAdvisorRegistry, isJudge } from '../../../src/advisors/registry.js';
import { parseLexicon } from '../../../src/advisors/lexicon.js';
import { KnowledgeStore } from '../../../src/knowledge/knowledge-store.js';
import { createScoringEngine } from '../../../src/scoring/scoring-engine.js';
import { ConfigError } from '../../../src/core/errors.js';
import type { AdvisorContext } from '../../../src/types/advisor.js';
import type { Doctrine, DoctrineId } from '../../../src/advisors/doctrine.js';
import { createMockLogger, loadTestLexicon } from '../../helpers/factories.js';

function registryWith(doctrines: Partial<Record<DoctrineId, Doctrine>> = {}) {
  return createAdvisorRegistry({
    doctrines: new DoctrineBook(doctrines),
    lexicon: loadTestLexicon(),
    scoring: createScoringEngine(new KnowledgeStore(), createMockLogger()),
  });
}

const POWER_WORLDVIEW = toDoctrine(
  { worldview: { keywords: ['influence', 'authority', 'status', 'control'] } },
  'power'
);

const context = (overrides: Partial<AdvisorContext> = {}): AdvisorContext => ({
  domains: ['risk'],
  domainConfidence: 0.6,
  recentTurns: [],
  turnCount: 0,
  ...overrides,
});

describe('Advisor', () => {
  it('opposes with a red line when the input hits a doctrine prohibition', () => {
    const registry = registryWith({
      risk: toDoctrine({ prohibitions: ['Coin Flip'], worldview: { keywords: ['flip'] } }, 'risk'),
    });

    const position = registry.get('risk').analyze('Should we settle it on a coin flip?', context());

    expect(position).toMatchObject({
      advisor: 'risk',
      domain: 'risk',
      stance: 'oppose',
      confidence: 0.95,
      reasoning: 'Doctrine prohibits: Coin Flip',
      redLineTriggered: true,
      concerns: ['Prohibited by doctrine: Coin Flip'],
      source: 'doctrine_prohibition',
    });
  });

  it('supports when enough worldview keywords match', () => {
    const registry = registryWith({ power: POWER_WORLDVIEW });

    const position = registry.get('power').analyze('I want more influence and control', context());

    expect(position.stance).toBe('support');
    expect(position.confidence).toBeCloseTo(0.725);
    expect(position.reasoning).toBe('Aligned with Power worldview: influence, control');
    expect(position.source).toBe('doctrine_worldview');
  });

  it('stays neutral on a weak worldview match', () => {
    const registry = registryWith({ power: POWER_WORLDVIEW });

    const position = registry.get('power').analyze('Some influence would help', context());

    expect(position.stance).toBe('neutral');
    expect(position.confidence).toBeCloseTo(0.6125);
  });

  it('falls through to the keyword heuristic', () => {
    const position = registryWith().get('risk').analyze('There is a danger of total loss', context());

    expect(position).toMatchObject({
      stance: 'oppose',
      confidence: 0.95,
      reasoning: 'Catastrophic downside: total loss',
      redLineTriggered: true,
      source: 'heuristic',
    });
  });

  it('cites up to three knowledge items as evidence', () => {
    const position = registryWith().get('risk').analyze('Is this safe?', context());

    expect(position.evidence).toHaveLength(3);
    expect(position.evidence.every((e) => e.entryId.startsWith('fallback_'))).toBe(true);
  });

  it('reads earlier turns for a broken commitment', () => {
    const position = registryWith()
      .get('discipline')
      .analyze('I want to quit right now', context({ recentTurns: ['I made a plan last week'] }));

    expect(position.stance).toBe('oppose');
    expect(position.reasoning).toBe('Impulse contradicts an earlier commitment');
  });

  it('counts qualifiers across the conversation', () => {
    const position = registryWith()
      .get('narrative')
      .analyze('but fine', context({ recentTurns: ['yes, but', 'however'] }));

    expect(position.reasoning).toBe('Story keeps hedging (3 qualifiers)');
  });

  it('lets the tribunal oppose deflected blame', () => {
    const position = registryWith().get('tribunal').analyze('It is not my fault', context());

    expect(position.stance).toBe('oppose');
    expect(position.confidence).toBe(0.8);
  });
});

describe('AdvisorRegistry', () => {
  it('registers nineteen voting advisors and the tribunal', () => {
    const registry = registryWith();

    expect(registry.voting()).toHaveLength(19);
    expect(registry.judges()).toEqual(['tribunal']);
    expect(registry.all()).toHaveLength(20);
    expect(isJudge('tribunal')).toBe(true);
    expect(isJudge('risk')).toBe(false);
  });

  it('refuses a lexicon missing a marker set', () => {
    expect(() =>
      createAdvisorRegistry({
        doctrines: new DoctrineBook(),
        lexicon: parseLexicon({ version: 1, advisors: {} }),
        scoring: createScoringEngine(new KnowledgeStore(), createMockLogger()),
      })
    ).toThrow(new ConfigError('lexicon has no marker set adaptation.change'));
  });
});
