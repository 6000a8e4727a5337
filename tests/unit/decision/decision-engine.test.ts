import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDecisionEngine } from '../../../src/decision/decision-engine.js';
import type { DecisionResult } from '../../../src/decision/decision-engine.js';
import { createSituationSnapshotStore } from '../../../src/decision/situation-snapshot.js';
import type { SituationSnapshotStore } from '../../../src/decision/situation-snapshot.js';
import { DoctrineBook, EMPTY_DOCTRINE } from '../../../src/advisors/doctrine.js';
import { createAdvisorRegistry } from '../../../src/advisors/registry.js';
import { KnowledgeStore } from '../../../src/knowledge/knowledge-store.js';
import { createScoringEngine } from '../../../src/scoring/scoring-engine.js';
import { createCouncil } from '../../../src/council/council.js';
import { createModeRouter, WAR_COUNCIL } from '../../../src/modes/mode-router.js';
import { createFinalAuthorityGate } from '../../../src/authority/final-authority-gate.js';
import { HeuristicUnderstanding } from '../../../src/ports/understanding.js';
import type { TextUnderstanding } from '../../../src/ports/understanding.js';
import type { UnderstandingResult } from '../../../src/types/understanding.js';
import { createDecisionLog, decisionKeyFor } from '../../../src/storage/decision-log.js';
import type { DecisionLog } from '../../../src/storage/decision-log.js';
import { createMockLogger, InMemoryStorage, loadTestLexicon } from '../../helpers/factories.js';

const NOW = new Date('2026-03-01T09:00:00Z');

function councilOf(result: DecisionResult) {
  if (result.kind !== 'council') throw new Error(`expected a council decision, got ${result.kind}`);
  return result;
}

describe('DecisionEngine', () => {
  let dir: string;
  let log: DecisionLog;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'engine-decision-'));
    log = createDecisionLog({
      logPath: join(dir, 'decisions.jsonl'),
      storage: new InMemoryStorage(),
      logger: createMockLogger(),
    });
    await log.open();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const build = (
    options: {
      understanding?: TextUnderstanding;
      snapshots?: SituationSnapshotStore;
      decisionLog?: DecisionLog;
    } = {}
  ) => {
    const logger = createMockLogger();
    const scoring = createScoringEngine(new KnowledgeStore(), logger);
    const registry = createAdvisorRegistry({
      doctrines: new DoctrineBook(),
      lexicon: loadTestLexicon(),
      scoring,
    });
    return createDecisionEngine({
      understanding: options.understanding ?? new HeuristicUnderstanding(),
      router: createModeRouter(logger),
      council: createCouncil(registry, logger),
      gate: createFinalAuthorityGate(EMPTY_DOCTRINE, logger),
      log: options.decisionLog ?? log,
      ...(options.snapshots && { snapshots: options.snapshots }),
      logger,
    });
  };

  it('answers quick mode directly without advisors or a record', async () => {
    const result = await build().decide({ text: 'hi', mode: 'quick', decisionId: 'q-1' });

    expect(result).toMatchObject({
      kind: 'direct_response',
      decisionId: 'q-1',
      mode: 'quick',
      advisorsInvolved: [],
    });
    expect(log.size).toBe(0);
  });

  it('lets the risk red line reject a war decision and records it', async () => {
    const result = councilOf(
      await build().decide({
        text: 'Should we attack now? There is a danger of total loss.',
        mode: 'war',
        decisionId: 'd-42',
        now: NOW,
      })
    );

    expect(result.advisorsInvolved).toEqual([...WAR_COUNCIL]);
    expect(result.recommendation.recommendation).toBe('oppose');
    expect(result.recommendation.redLineConcerns).toEqual([
      'risk: Catastrophic downside: total loss',
    ]);
    expect(result.interpretation).toBe('red_line_block_override_needed');
    expect(result.verdict.finalOutcome).toBe('reject');
    expect(result.verdict.reason).toBe('risk_red_line');
    expect(result.features.situation.riskHigh).toBe(1);
    expect(result.features.situation.timePressure).toBe(0.8);

    const key = decisionKeyFor('d-42', '2026-03-01T09:00:00.000Z');
    expect(result.decisionKey).toBe(key);
    expect(result.recorded).toBe(true);
    expect(log.get(key)?.verdict).toEqual({ finalOutcome: 'reject', reason: 'risk_red_line' });
    expect(log.get(key)?.evidenceIds.length).toBeGreaterThan(0);
  });

  it('flags the knowledge types the council cited', async () => {
    const result = councilOf(await build().decide({ text: 'Quit now?', mode: 'war', now: NOW }));

    const cited = new Set(result.positions.flatMap((p) => p.evidence.map((e) => e.type)));
    expect(result.features.usage.usedPrinciple).toBe(cited.has('principle') ? 1 : 0);
    expect(result.features.usage.usedRule).toBe(cited.has('rule') ? 1 : 0);
  });

  it('convenes every advisor and the tribunal in darbar mode', async () => {
    const result = councilOf(await build().decide({ text: 'Let me think about it', mode: 'darbar' }));

    expect(result.advisorsInvolved).toHaveLength(20);
    expect(result.positions).toHaveLength(19);
    expect(result.judgePositions.map((p) => p.advisor)).toEqual(['tribunal']);
    expect(result.recommendation.votes.total).toBe(19);
  });

  it('picks meeting advisors from the understood domains', async () => {
    const heuristic = new HeuristicUnderstanding();
    const understanding: TextUnderstanding = {
      analyze: async (text) => ({
        ...(await heuristic.analyze(text)),
        domains: { domains: ['financial'], confidence: 0.9 },
      }),
    };

    const result = councilOf(await build({ understanding }).decide({ text: 'Move my money?' }));

    expect(result.mode).toBe('meeting');
    expect(result.advisorsInvolved).toEqual(['risk', 'optionality', 'grand_strategist']);
  });

  it('uses the situation snapshot taken for the same utterance', async () => {
    const snapshots = createSituationSnapshotStore(new HeuristicUnderstanding(), createMockLogger());
    snapshots.schedule('my job', { recentTurns: [] });
    await snapshots.idle();
    const analyze = vi.fn((text: string) => new HeuristicUnderstanding().analyze(text));

    await build({ understanding: { analyze }, snapshots }).decide({ text: 'my job', mode: 'quick' });
    expect(analyze).not.toHaveBeenCalled();

    await build({ understanding: { analyze }, snapshots }).decide({ text: 'my boss', mode: 'quick' });
    expect(analyze).toHaveBeenCalledTimes(1);
  });

  it('uses the background analysis started by observe on the next decision', async () => {
    const heuristic = new HeuristicUnderstanding();
    const analyze = vi.fn((text: string) => heuristic.analyze(text));
    const snapshots = createSituationSnapshotStore({ analyze }, createMockLogger());
    const engine = build({ understanding: { analyze }, snapshots });

    engine.observe('Should I sell the house?', ['we need cash']);
    await snapshots.idle();
    const result = await engine.decide({ text: 'Should I sell the house?', mode: 'quick' });

    expect(analyze).toHaveBeenCalledTimes(1);
    expect(snapshots.current()?.text).toBe('Should I sell the house?');
    expect(result.understanding).toEqual(snapshots.current()?.understanding);
  });

  describe('without an explicit mode', () => {
    const understandingWith = (
      frame: Partial<UnderstandingResult['frame']>,
      metrics: Partial<UnderstandingResult['metrics']> = {}
    ): TextUnderstanding => {
      const heuristic = new HeuristicUnderstanding();
      return {
        analyze: async (text) => {
          const base = await heuristic.analyze(text);
          return {
            ...base,
            frame: { ...base.frame, ...frame },
            metrics: { ...base.metrics, ...metrics },
          };
        },
      };
    };

    it('goes to war when the mode threshold is reached', async () => {
      const understanding = understandingWith({}, { modeThreshold: 1 });

      const result = councilOf(await build({ understanding }).decide({ text: 'They hit us again.' }));

      expect(result.mode).toBe('war');
      expect(result.advisorsInvolved).toEqual([...WAR_COUNCIL]);
    });

    it('answers casual talk directly', async () => {
      const understanding = understandingWith({ situationType: 'casual' });

      const result = await build({ understanding }).decide({ text: 'Nice weather today.' });

      expect(result.kind).toBe('direct_response');
    });

    it('convenes the darbar for a high-stakes decision', async () => {
      const understanding = understandingWith({ situationType: 'decision' });

      const result = councilOf(
        await build({ understanding }).decide({ text: 'Sell the company?', stakes: 'high' })
      );

      expect(result.mode).toBe('darbar');
    });
  });

  it('still answers when the decision cannot be recorded', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');
    const unwritable = createDecisionLog({
      logPath: join(blocker, 'decisions.jsonl'),
      storage: new InMemoryStorage(),
      logger: createMockLogger(),
    });

    const result = councilOf(
      await build({ decisionLog: unwritable }).decide({ text: 'Quit now?', mode: 'war' })
    );

    expect(result.recorded).toBe(false);
    expect(result.decisionKey).toBeNull();
  });
});
