import { describe, it, expect, vi } from 'vitest';
import {
  createUnderstanding,
  guessDomains,
  HeuristicUnderstanding,
} from '../../../src/ports/understanding.js';
import type { UnderstandingService } from '../../../src/ports/understanding.js';
import { createMockLogger, loggedMessages } from '../../helpers/factories.js';

const payload = {
  frame: { situationType: 'decision', clarity: 0.9, emotionalLoad: 0.2 },
  domains: { domains: ['career'], confidence: 0.85 },
  metrics: {
    emotionalMaturity: 0.7,
    volatility: 0.2,
    stress: 0.3,
    confidence: 0.8,
    modeThreshold: 0.1,
    adviceThreshold: 0.5,
  },
};

const context = { recentTurns: [] };

describe('guessDomains', () => {
  it('matches domain keywords as whole words', () => {
    expect(guessDomains('Should I quit my job and invest my savings?')).toEqual({
      domains: ['career', 'financial'],
      confidence: 0.4,
    });
    expect(guessDomains('Jobless thoughts').domains).toEqual([]);
  });
});

describe('HeuristicUnderstanding', () => {
  it('returns a neutral frame and neutral metrics', async () => {
    const result = await new HeuristicUnderstanding().analyze('Talk to my partner?');

    expect(result.source).toBe('heuristic');
    expect(result.frame).toEqual({ situationType: 'unclear', clarity: 0.5, emotionalLoad: 0 });
    expect(result.domains.domains).toEqual(['relationships']);
    expect(result.metrics.modeThreshold).toBe(0);
  });
});

describe('ResilientUnderstanding', () => {
  it('passes a valid service answer through', async () => {
    const service: UnderstandingService = { analyze: vi.fn(() => Promise.resolve(payload)) };
    const understanding = createUnderstanding(service, createMockLogger(), { timeoutMs: 1_000 });

    const result = await understanding.analyze('text', context);

    expect(result).toEqual({ ...payload, source: 'service' });
    expect(service.analyze).toHaveBeenCalledWith('text', context);
  });

  it('falls back on an invalid payload', async () => {
    const logger = createMockLogger();
    const service: UnderstandingService = {
      analyze: () => Promise.resolve({ ...payload, domains: { domains: ['career'], confidence: 3 } }),
    };

    const result = await createUnderstanding(service, logger, { timeoutMs: 1_000 }).analyze(
      'my boss',
      context
    );

    expect(result.source).toBe('heuristic');
    expect(result.domains.domains).toEqual(['career']);
    expect(loggedMessages(logger, 'warn')).toEqual([
      'Understanding service answered an invalid payload, using heuristics',
    ]);
  });

  it('falls back when the service rejects', async () => {
    const logger = createMockLogger();
    const service: UnderstandingService = {
      analyze: () => Promise.reject(new Error('unavailable')),
    };

    const result = await createUnderstanding(service, logger, { timeoutMs: 1_000 }).analyze('x', context);

    expect(result.source).toBe('heuristic');
    expect(loggedMessages(logger, 'warn')).toEqual(['Understanding service failed, using heuristics']);
  });

  it('falls back when the service is too slow', async () => {
    const service: UnderstandingService = { analyze: () => new Promise<unknown>(() => undefined) };

    const result = await createUnderstanding(service, createMockLogger(), { timeoutMs: 10 }).analyze(
      'x',
      context
    );

    expect(result.source).toBe('heuristic');
  });

  it('is the heuristic without a service', async () => {
    const result = await createUnderstanding(undefined, createMockLogger(), { timeoutMs: 10 }).analyze(
      'x',
      context
    );

    expect(result.source).toBe('heuristic');
  });
});
