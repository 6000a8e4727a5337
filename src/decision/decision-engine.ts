import { randomUUID } from 'node:crypto';
import { DateTime } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { AdvisorContext, CouncilMemberId, Position } from '../types/advisor.js';
import type { CouncilRecommendation, OmittedAdvisor } from '../types/council.js';
import type { DecisionFeatures, FeatureOverrides } from '../types/features.js';
import type { Level } from '../types/knowledge.js';
import type { DecisionMode } from '../types/mode.js';
import type { UnderstandingResult } from '../types/understanding.js';
import type { Council } from '../council/council.js';
import type { ModeInterpretation, ModePlan, ModeRouter } from '../modes/mode-router.js';
import type { FinalAuthorityGate, Verdict } from '../authority/final-authority-gate.js';
import type { TextUnderstanding } from '../ports/understanding.js';
import type { DecisionLog } from '../storage/decision-log.js';
import { bucketFeaturesOf, extractFeatures, knowledgeUsage } from '../learning/feature-extractor.js';
import { createDecisionTrace, withTraceContext } from '../core/trace-context.js';
import type { SituationSnapshotStore } from './situation-snapshot.js';

export interface DecisionRequest {
  text: string;
  recentTurns?: readonly string[];
  /** Overrides the router's current mode */
  mode?: DecisionMode;
  features?: FeatureOverrides;
  stakes?: Level;
  timePressure?: Level;
  now?: Date;
  decisionId?: string;
}

export interface DirectResponse {
  kind: 'direct_response';
  decisionId: string;
  mode: 'quick';
  advisorsInvolved: [];
  understanding: UnderstandingResult;
}

export interface CouncilDecision {
  kind: 'council';
  decisionId: string;
  /** Log key for reporting the outcome, null when not recorded */
  decisionKey: string | null;
  recorded: boolean;
  mode: Exclude<DecisionMode, 'quick'>;
  advisorsInvolved: CouncilMemberId[];
  positions: Position[];
  judgePositions: Position[];
  omitted: OmittedAdvisor[];
  recommendation: CouncilRecommendation;
  interpretation: ModeInterpretation;
  verdict: Verdict;
  features: DecisionFeatures;
  understanding: UnderstandingResult;
}

export type DecisionResult = DirectResponse | CouncilDecision;

export interface DecisionEngineDeps {
  understanding: TextUnderstanding;
  router: ModeRouter;
  council: Council;
  gate: FinalAuthorityGate;
  log: DecisionLog;
  snapshots?: SituationSnapshotStore;
  logger: Logger;
}

/**
 * DecisionEngine - one pass from utterance to gated, recorded verdict.
 *
 * understanding -> mode -> council -> interpretation -> final authority
 * -> features -> decision log. Quick mode stops after understanding.
 * Without an explicit mode the router suggests one from the situation.
 */
export class DecisionEngine {
  private readonly deps: DecisionEngineDeps;
  private readonly logger: Logger;

  constructor(deps: DecisionEngineDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'decision-engine' });
  }

  decide(request: DecisionRequest): Promise<DecisionResult> {
    const decisionId = request.decisionId ?? randomUUID();
    return withTraceContext(createDecisionTrace(decisionId), () => this.run(decisionId, request));
  }

  /**
   * Start analysing an utterance in the background so that a later
   * decide() on the same text can use the published snapshot.
   * Without a snapshot store this does nothing.
   */
  observe(text: string, recentTurns: readonly string[] = []): void {
    this.deps.snapshots?.schedule(text, { recentTurns });
  }

  private async run(decisionId: string, request: DecisionRequest): Promise<DecisionResult> {
    const { router } = this.deps;
    const recentTurns = request.recentTurns ?? [];
    const now = request.now ?? new Date();

    const understanding = await this.understand(request.text, recentTurns);
    const mode =
      request.mode ?? router.suggestMode(understanding.frame, understanding.metrics, request.stakes);
    if (!request.mode && mode !== router.currentMode) {
      this.logger.debug(
        { decisionId, mode, currentMode: router.currentMode },
        'Mode suggested by situation'
      );
    }

    if (mode === 'quick') {
      this.logger.debug({ decisionId }, 'Quick mode, answering directly');
      return { kind: 'direct_response', decisionId, mode, advisorsInvolved: [], understanding };
    }

    const plan: ModePlan = router.plan(mode, { domains: understanding.domains.domains });
    const members: CouncilMemberId[] = [...plan.advisors, ...plan.judges];

    const baseFeatures = extractFeatures({
      text: request.text,
      frame: understanding.frame,
      evidence: [],
      ...(request.stakes && { stakes: request.stakes }),
      ...(request.timePressure && { timePressure: request.timePressure }),
      ...(request.features && { overrides: request.features }),
    });

    const context: AdvisorContext = {
      domains: understanding.domains.domains,
      domainConfidence: understanding.domains.confidence,
      recentTurns,
      turnCount: recentTurns.length,
      bucketFeatures: bucketFeaturesOf(baseFeatures),
      now,
      frame: {
        domains: understanding.domains.domains,
        ...(request.stakes && { stakes: request.stakes }),
        ...(request.timePressure && { timePressure: request.timePressure }),
      },
    };

    const session = await this.deps.council.convene(members, request.text, context);
    const interpretation = router.interpret(mode, session.recommendation);
    const verdict = this.deps.gate.evaluate(session.recommendation, session.positions);

    const positions = [...session.positions.values()];
    const evidence = positions.flatMap((p) => p.evidence);
    const features: DecisionFeatures = { ...baseFeatures, usage: knowledgeUsage(evidence) };

    const record = await this.deps.log.append({
      decisionId,
      timestamp: DateTime.fromJSDate(now).toUTC().toISO() ?? now.toISOString(),
      mode,
      text: request.text,
      domains: understanding.domains.domains,
      advisorsInvolved: members,
      outcome: session.recommendation.outcome,
      recommendation: session.recommendation.recommendation,
      avgConfidence: session.recommendation.avgConfidence,
      consensusStrength: session.recommendation.consensusStrength,
      redLineConcerns: session.recommendation.redLineConcerns,
      dissenters: session.recommendation.dissenters,
      interpretation,
      verdict: { finalOutcome: verdict.finalOutcome, reason: verdict.reason },
      features,
      evidenceIds: [...new Set(evidence.map((e) => e.entryId))],
    });

    this.logger.info(
      {
        decisionId,
        mode,
        recommendation: session.recommendation.recommendation,
        finalOutcome: verdict.finalOutcome,
        recorded: record !== null,
      },
      'Decision made'
    );

    return {
      kind: 'council',
      decisionId,
      decisionKey: record?.decisionKey ?? null,
      recorded: record !== null,
      mode,
      advisorsInvolved: members,
      positions,
      judgePositions: [...session.judgePositions.values()],
      omitted: session.omitted,
      recommendation: session.recommendation,
      interpretation,
      verdict,
      features,
      understanding,
    };
  }

  /**
   * Use the published snapshot when it was taken for this utterance,
   * otherwise ask the port.
   */
  private async understand(text: string, recentTurns: readonly string[]): Promise<UnderstandingResult> {
    const snapshot = this.deps.snapshots?.current();
    if (snapshot && snapshot.text === text) {
      this.logger.debug({ version: snapshot.version }, 'Using situation snapshot');
      return snapshot.understanding;
    }
    return this.deps.understanding.analyze(text, { recentTurns });
  }
}

export function createDecisionEngine(deps: DecisionEngineDeps): DecisionEngine {
  return new DecisionEngine(deps);
}
