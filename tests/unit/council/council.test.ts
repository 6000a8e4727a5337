import { describe, it, expect } from 'vitest';
import { createCouncil } from '../../../src/council/council.js';
import type { MemberLookup } from '../../../src/council/council.js';
import type { CouncilMemberId, Stance } from '../../../src/types/advisor.js';
import { createMockLogger, createPosition, loggedMessages } from '../../helpers/factories.js';

const context = { domains: ['risk'], domainConfidence: 0.5, recentTurns: [], turnCount: 0 };

function lookup(stances: Partial<Record<CouncilMemberId, Stance>>): MemberLookup {
  return {
    get: (id) => ({
      analyze: () => {
        const stance = stances[id];
        if (!stance) throw new Error(`${id} unavailable`);
        return createPosition(id, stance);
      },
    }),
  };
}

describe('Council', () => {
  it('counts voting members and keeps judges apart', async () => {
    const council = createCouncil(
      lookup({ risk: 'support', data: 'support', power: 'oppose', tribunal: 'oppose' }),
      createMockLogger()
    );

    const session = await council.convene(['risk', 'data', 'power', 'tribunal'], 'text', context);

    expect([...session.positions.keys()]).toEqual(['risk', 'data', 'power']);
    expect([...session.judgePositions.keys()]).toEqual(['tribunal']);
    expect(session.recommendation.votes).toEqual({ support: 2, oppose: 1, neutral: 0, total: 3 });
    expect(session.recommendation.recommendation).toBe('support');
    expect(session.omitted).toEqual([]);
  });

  it('omits a failing member and still decides', async () => {
    const logger = createMockLogger();
    const council = createCouncil(lookup({ risk: 'oppose', timing: 'oppose' }), logger, {
      concurrency: 1,
    });

    const session = await council.convene(['risk', 'truth', 'timing'], 'text', context);

    expect(session.omitted).toEqual([{ id: 'truth', reason: 'error', message: 'truth unavailable' }]);
    expect(session.positions.size).toBe(2);
    expect(session.recommendation.recommendation).toBe('oppose');
    expect(loggedMessages(logger, 'warn')).toEqual(['Advisor omitted']);
  });

  it('omits a member that runs past its time budget', async () => {
    const base = lookup({ risk: 'oppose', timing: 'oppose', power: 'support' });
    const slowPower: MemberLookup = {
      get: (id) => {
        const member = base.get(id);
        if (id !== 'power') return member;
        return {
          analyze: (input, ctx) => {
            const until = Date.now() + 80;
            while (Date.now() < until) {
              // busy
            }
            return member.analyze(input, ctx);
          },
        };
      },
    };
    const council = createCouncil(slowPower, createMockLogger(), {
      concurrency: 1,
      advisorTimeoutMs: 20,
    });

    const session = await council.convene(['risk', 'power', 'timing'], 'text', context);

    expect(session.omitted).toEqual([
      { id: 'power', reason: 'timeout', message: 'Operation timed out after 20ms' },
    ]);
    expect([...session.positions.keys()]).toEqual(['risk', 'timing']);
    expect(session.recommendation.votes.support).toBe(0);
  });

  it('defers with nobody left to vote', async () => {
    const council = createCouncil(lookup({}), createMockLogger());

    const session = await council.convene(['risk'], 'text', context);

    expect(session.omitted).toHaveLength(1);
    expect(session.recommendation.reasoning).toBe('No advisors responded');
  });
});
