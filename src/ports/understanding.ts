/**
 * Text Understanding Port
 *
 * The engine reads situation frames, domain classifications and emotional
 * metrics from an external service. Whatever that service returns is
 * validated before use; a failure, a timeout or a malformed answer falls
 * back to keyword heuristics and is never surfaced to the caller.
 */

import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import {
  SITUATION_TYPES,
  type DomainClassification,
  type EmotionalMetrics,
  type SituationFrame,
  type UnderstandingResult,
} from '../types/understanding.js';
import { withTimeout } from '../core/worker-pool.js';
import { errorMessage } from '../core/errors.js';
import { containsAny } from '../core/utils/text-similarity.js';

export interface UnderstandingContext {
  recentTurns: readonly string[];
}

/**
 * The engine-facing port. Implementations never reject.
 */
export interface TextUnderstanding {
  analyze(text: string, context: UnderstandingContext): Promise<UnderstandingResult>;
}

/**
 * An external analysis service. Its payload is untrusted.
 */
export interface UnderstandingService {
  analyze(text: string, context: UnderstandingContext): Promise<unknown>;
}

const unit = z.number().min(0).max(1);

export const understandingPayloadSchema = z.object({
  frame: z.object({
    situationType: z.enum(SITUATION_TYPES),
    clarity: unit,
    emotionalLoad: unit,
  }),
  domains: z.object({
    domains: z.array(z.string().min(1)),
    confidence: unit,
  }),
  metrics: z.object({
    emotionalMaturity: unit,
    volatility: unit,
    stress: unit,
    confidence: unit,
    modeThreshold: unit,
    adviceThreshold: unit,
  }),
});

const DOMAIN_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  career: ['job', 'career', 'promotion', 'boss', 'quit', 'resign', 'hire', 'salary'],
  financial: ['money', 'invest', 'investment', 'loan', 'debt', 'savings', 'stock', 'mortgage'],
  relationships: ['partner', 'friend', 'family', 'marriage', 'relationship', 'divorce'],
  health: ['health', 'doctor', 'sleep', 'exercise', 'illness', 'burnout'],
  strategy: ['strategy', 'plan', 'competitor', 'market', 'position'],
  power: ['power', 'influence', 'leverage', 'control', 'authority'],
  ethics: ['ethical', 'lie', 'fraud', 'honest', 'cheat', 'moral'],
  innovation: ['startup', 'technology', 'product', 'innovation', 'prototype'],
};

export const HEURISTIC_DOMAIN_CONFIDENCE = 0.4;

export const NEUTRAL_FRAME: Readonly<SituationFrame> = Object.freeze({
  situationType: 'unclear',
  clarity: 0.5,
  emotionalLoad: 0,
});

export const NEUTRAL_METRICS: Readonly<EmotionalMetrics> = Object.freeze({
  emotionalMaturity: 0.5,
  volatility: 0.5,
  stress: 0.5,
  confidence: 0.5,
  modeThreshold: 0,
  adviceThreshold: 0,
});

export function guessDomains(text: string): DomainClassification {
  const domains = Object.entries(DOMAIN_KEYWORDS)
    .filter(([, keywords]) => containsAny(text, keywords))
    .map(([domain]) => domain);
  return { domains, confidence: HEURISTIC_DOMAIN_CONFIDENCE };
}

/**
 * Keyword fallback: a domain guess, a neutral frame and neutral metrics.
 */
export class HeuristicUnderstanding implements TextUnderstanding {
  analyze(text: string): Promise<UnderstandingResult> {
    return Promise.resolve({
      frame: { ...NEUTRAL_FRAME },
      domains: guessDomains(text),
      metrics: { ...NEUTRAL_METRICS },
      source: 'heuristic',
    });
  }
}

export interface ResilientUnderstandingConfig {
  timeoutMs: number;
}

/**
 * Wraps an external service with validation, a timeout and the heuristic
 * fallback. Without a service it is the heuristic.
 */
export class ResilientUnderstanding implements TextUnderstanding {
  private readonly logger: Logger;
  private readonly fallback = new HeuristicUnderstanding();

  constructor(
    private readonly service: UnderstandingService | undefined,
    logger: Logger,
    private readonly config: ResilientUnderstandingConfig
  ) {
    this.logger = logger.child({ component: 'understanding' });
  }

  async analyze(text: string, context: UnderstandingContext): Promise<UnderstandingResult> {
    if (!this.service) {
      return this.fallback.analyze(text);
    }

    let payload: unknown;
    try {
      payload = await withTimeout(this.service.analyze(text, context), this.config.timeoutMs);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Understanding service failed, using heuristics');
      return this.fallback.analyze(text);
    }

    const parsed = understandingPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(
        { issues: parsed.error.issues.map((i) => i.path.join('.')) },
        'Understanding service answered an invalid payload, using heuristics'
      );
      return this.fallback.analyze(text);
    }

    return { ...parsed.data, source: 'service' };
  }
}

export function createUnderstanding(
  service: UnderstandingService | undefined,
  logger: Logger,
  config: ResilientUnderstandingConfig
): TextUnderstanding {
  return new ResilientUnderstanding(service, logger, config);
}
