import { describe, it, expect } from 'vitest';
import { aggregate, tally } from '../../../src/council/aggregator.js';
import { createPosition, createVotes } from '../../helpers/factories.js';

describe('aggregate', () => {
  it('reaches support consensus at twelve of nineteen', () => {
    const result = aggregate(createVotes(12, 4, 3));

    expect(result.outcome).toBe('consensus_reached');
    expect(result.recommendation).toBe('support');
    expect(result.consensusStrength).toBeCloseTo(12 / 19);
    expect(result.avgConfidence).toBeCloseTo(0.7);
    expect(result.reasoning).toBe('Support consensus: 12/19 advisors');
    expect(result.dissenters).toEqual(['legitimacy', 'truth', 'narrative', 'sovereign']);
    expect(result.redLineConcerns).toEqual([]);
    expect(result.votes).toEqual({ support: 12, oppose: 4, neutral: 3, total: 19 });
  });

  it('lets a single red line override a supporting majority', () => {
    const positions = createVotes(12, 4, 3);
    positions.set(
      'risk',
      createPosition('risk', 'oppose', 0.95, {
        redLineTriggered: true,
        reasoning: 'Catastrophic downside: ruin',
      })
    );

    const result = aggregate(positions);

    expect(result.outcome).toBe('consensus_reached');
    expect(result.recommendation).toBe('oppose');
    expect(result.consensusStrength).toBe(0.95);
    expect(result.redLineConcerns).toEqual(['risk: Catastrophic downside: ruin']);
    expect(result.reasoning).toBe('RED LINE triggered by: risk');
    expect(result.dissenters).toHaveLength(11);
    expect(result.dissenters).not.toContain('risk');
  });

  it('reaches oppose consensus', () => {
    const result = aggregate(createVotes(2, 12, 5));

    expect(result.recommendation).toBe('oppose');
    expect(result.reasoning).toBe('Oppose consensus: 12/19 advisors');
    expect(result.dissenters).toEqual(['adaptation', 'conflict']);
  });

  it('reads a split council as a bounded tradeoff', () => {
    const result = aggregate(createVotes(8, 6, 5));

    expect(result.outcome).toBe('bounded_risk_tradeoff');
    expect(result.recommendation).toBe('support_with_caution');
    expect(result.consensusStrength).toBeCloseTo(8 / 19);
    expect(result.reasoning).toBe('Split council: 8 support, 6 oppose, 5 neutral');
    expect(result.dissenters).toEqual([
      'risk',
      'power',
      'psychology',
      'technology',
      'legitimacy',
      'truth',
    ]);
  });

  it('defers when one side is too small and the other absent', () => {
    const result = aggregate(createVotes(3, 0, 16));

    expect(result.outcome).toBe('deadlocked');
    expect(result.recommendation).toBe('defer');
    expect(result.consensusStrength).toBe(0);
    expect(result.dissenters).toEqual([]);
    expect(result.reasoning).toBe('No consensus: 3 support, 0 oppose, 16 neutral');
  });

  it('defers with default confidence when nobody voted', () => {
    const result = aggregate(new Map());

    expect(result.reasoning).toBe('No advisors responded');
    expect(result.avgConfidence).toBe(0.5);
    expect(result.votes.total).toBe(0);
  });
});

describe('tally', () => {
  it('counts stances', () => {
    expect(tally(createVotes(1, 2, 3).values())).toEqual({
      support: 1,
      oppose: 2,
      neutral: 3,
      total: 6,
    });
  });
});
