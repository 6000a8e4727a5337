import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createContainer } from '../../../src/core/container.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../../../src/config/config-schema.js';
import { DECISION_LOG_FILE } from '../../../src/storage/decision-log.js';
import { createMockLogger, loggedMessages, type MockLogger } from '../../helpers/factories.js';

describe('createContainer', () => {
  let stateDir: string;
  let config: EngineConfig;
  let logger: MockLogger;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'engine-container-'));
    config = structuredClone(DEFAULT_CONFIG);
    config.paths.state = stateDir;
    logger = createMockLogger();
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  it('wires the full council from the bundled data', async () => {
    const container = await createContainer(config, { logger });

    expect(container.registry.voting()).toHaveLength(19);
    expect(container.registry.judges()).toEqual(['tribunal']);
    expect(container.knowledge.size).toBeGreaterThan(0);
    expect(container.decisionLog.size).toBe(0);
    expect(loggedMessages(logger, 'info')).toContain('Knowledge loaded');

    await container.shutdown();
  });

  it('records council decisions under the state directory and restores them', async () => {
    const first = await createContainer(config, { logger });
    const result = await first.engine.decide({
      text: 'Should we attack now? There is a danger of total loss.',
      mode: 'war',
      decisionId: 'c-1',
      now: new Date('2026-03-01T09:00:00Z'),
    });
    await first.shutdown();

    if (result.kind !== 'council') throw new Error(`expected a council decision, got ${result.kind}`);
    expect(result.recorded).toBe(true);
    expect(result.decisionKey).not.toBeNull();

    const lines = (await readFile(join(stateDir, DECISION_LOG_FILE), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);

    const second = await createContainer(config, { logger: createMockLogger() });
    expect(second.decisionLog.size).toBe(1);
    expect(second.decisionLog.has(result.decisionKey ?? '')).toBe(true);
    await second.shutdown();
  });

  it('answers quick mode without touching the log', async () => {
    const container = await createContainer(config, { logger });
    const result = await container.engine.decide({ text: 'hello', mode: 'quick' });

    expect(result.kind).toBe('direct_response');
    expect(container.decisionLog.size).toBe(0);
    await container.shutdown();
  });

  it('opens clarification sessions in the idle state', async () => {
    const container = await createContainer(config, { logger });
    const session = container.clarify(['risk'], 1);

    expect(session.currentState).toBe('idle');
    await container.shutdown();
  });

  it('logs shutdown', async () => {
    const container = await createContainer(config, { logger });
    await container.shutdown();

    expect(loggedMessages(logger, 'info').slice(-2)).toEqual([
      'Shutting down...',
      'Shutdown complete',
    ]);
  });
});
