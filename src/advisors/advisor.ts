import { findMarkers } from '../core/utils/text-similarity.js';
import { clamp01 } from '../core/utils/math.js';
import type { ScoringEngine, SynthesisQuery, SynthesisResult } from '../scoring/scoring-engine.js';
import { toEvidence } from '../scoring/scoring-engine.js';
import type { AdvisorContext, CouncilMemberId, Position } from '../types/advisor.js';
import type { Posture } from '../types/knowledge.js';
import type { AdvisorDefinition } from './definition.js';
import type { Doctrine } from './doctrine.js';
import type { Lexicon, MarkerMatcher } from './lexicon.js';

export const PROHIBITION_CONFIDENCE = 0.95;
/** Match ratio above which a worldview match turns into support */
export const WORLDVIEW_SUPPORT_RATIO = 0.3;
export const WORLDVIEW_MAX_CONFIDENCE = 0.95;

export interface AdvisorDeps {
  doctrine: Doctrine;
  lexicon: Lexicon;
  scoring: ScoringEngine;
  /** Knowledge items attached to each position */
  evidenceCount: number;
}

/**
 * One council member.
 *
 * analyze() is synchronous and only reads shared state, so many advisors
 * can evaluate the same decision concurrently. Evaluation order:
 * doctrine prohibition, doctrine worldview, then the member's own
 * keyword heuristic.
 */
export class Advisor {
  readonly id: CouncilMemberId;
  readonly title: string;
  readonly posture: Posture;
  private readonly markers: MarkerMatcher;

  constructor(
    private readonly definition: AdvisorDefinition,
    private readonly deps: AdvisorDeps
  ) {
    this.id = definition.id;
    this.title = definition.title;
    this.posture = definition.posture;
    this.markers = deps.lexicon.matcherFor(definition.id);
  }

  get knowledgeDomains(): readonly string[] {
    return this.definition.knowledgeDomains;
  }

  analyze(input: string, context: AdvisorContext): Position {
    const knowledge = this.consultKnowledge(input, context);
    const evidence = toEvidence(knowledge.items, this.deps.evidenceCount);

    const prohibited = this.matchProhibition(input);
    if (prohibited !== undefined) {
      return this.position({
        stance: 'oppose',
        confidence: PROHIBITION_CONFIDENCE,
        reasoning: `Doctrine prohibits: ${prohibited}`,
        redLineTriggered: true,
        concerns: [`Prohibited by doctrine: ${prohibited}`],
        recommendations: [],
        source: 'doctrine_prohibition',
        evidence,
      });
    }

    const keywords = this.deps.doctrine.worldviewKeywords;
    if (keywords.length > 0) {
      const matched = findMarkers(input, keywords);
      if (matched.length > 0) {
        const ratio = matched.length / keywords.length;
        return this.position({
          stance: ratio > WORLDVIEW_SUPPORT_RATIO ? 'support' : 'neutral',
          confidence: Math.min(WORLDVIEW_MAX_CONFIDENCE, 0.5 + ratio * 0.45),
          reasoning: `Aligned with ${this.title} worldview: ${matched.join(', ')}`,
          redLineTriggered: false,
          concerns: [],
          recommendations: [],
          source: 'doctrine_worldview',
          evidence,
        });
      }
    }

    const result = this.definition.assess({
      text: input,
      context,
      markers: this.markers,
      knowledge,
    });

    return this.position({
      stance: result.stance,
      confidence: clamp01(result.confidence),
      reasoning: result.reasoning,
      redLineTriggered: result.redLine ?? false,
      concerns: result.concerns ?? [],
      recommendations: result.recommendations ?? [],
      source: 'heuristic',
      evidence,
    });
  }

  private matchProhibition(input: string): string | undefined {
    const lowered = input.toLowerCase();
    return this.deps.doctrine.prohibitions.find((p) => lowered.includes(p.toLowerCase()));
  }

  private consultKnowledge(input: string, context: AdvisorContext): SynthesisResult {
    const query: SynthesisQuery = {
      activeDomains: [...new Set([...context.domains, ...this.definition.knowledgeDomains])],
      domainConfidence: context.domainConfidence,
      contextText: input,
      scanDomains: this.definition.knowledgeDomains,
      posture: this.definition.posture,
    };
    if (context.frame) query.frame = context.frame;
    if (context.bucketFeatures) query.bucketFeatures = context.bucketFeatures;
    if (context.now) query.now = context.now;
    return this.deps.scoring.synthesize(query);
  }

  private position(fields: Omit<Position, 'advisor' | 'domain'>): Position {
    return { advisor: this.id, domain: this.id, ...fields };
  }
}
