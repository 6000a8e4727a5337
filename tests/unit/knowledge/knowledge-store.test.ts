import { describe, it, expect } from 'vitest';
import { KnowledgeStore } from '../../../src/knowledge/knowledge-store.js';
import { KnowledgeLoadError } from '../../../src/core/errors.js';
import { createEntry } from '../../helpers/factories.js';

describe('KnowledgeStore', () => {
  const seed = (): KnowledgeStore =>
    new KnowledgeStore([
      createEntry({ id: 'r1', domain: 'risk' }),
      createEntry({ id: 's1', domain: 'strategy', type: 'rule' }),
      createEntry({ id: 'r2', domain: 'Risk', type: 'warning' }),
    ]);

  it('keeps insertion order and looks entries up by domain', () => {
    const store = seed();

    expect(store.size).toBe(3);
    expect(store.all().map((e) => e.id)).toEqual(['r1', 's1', 'r2']);
    expect(store.byDomain('risk').map((e) => e.id)).toEqual(['r1', 'r2']);
    expect(store.byDomains(['strategy', 'risk']).map((e) => e.id)).toEqual(['r1', 's1', 'r2']);
    expect(store.domains()).toEqual(['risk', 'strategy', 'Risk']);
  });

  it('rejects a duplicate id', () => {
    const store = seed();
    expect(() => store.add(createEntry({ id: 'r1' }))).toThrow(KnowledgeLoadError);
  });

  it('reinforces by replacing the entry', () => {
    const store = seed();
    const before = store.get('r1');

    const updated = store.reinforce('r1', new Date('2026-03-01T12:00:00Z'));

    expect(updated?.memory).toEqual({
      reinforcementCount: 1,
      penaltyCount: 0,
      lastReinforcedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(before?.memory.reinforcementCount).toBe(0);
    expect(store.get('r1')).toBe(updated);
  });

  it('penalizes and ignores unknown ids', () => {
    const store = seed();

    expect(store.penalize('s1')?.memory.penaltyCount).toBe(1);
    expect(store.penalize('missing')).toBeUndefined();
    expect(store.reinforce('missing')).toBeUndefined();
  });

  it('exports only entries with memory and imports them back', () => {
    const store = seed();
    store.reinforce('r1', new Date('2026-03-01T12:00:00Z'));
    store.penalize('r2');

    const snapshot = store.exportMemory();
    expect(Object.keys(snapshot)).toEqual(['r1', 'r2']);

    const fresh = seed();
    const unknown = fresh.importMemory({ ...snapshot, gone: { reinforcementCount: 2, penaltyCount: 0 } });

    expect(unknown).toEqual(['gone']);
    expect(fresh.get('r1')?.memory.reinforcementCount).toBe(1);
    expect(fresh.get('r2')?.memory.penaltyCount).toBe(1);
  });
});
