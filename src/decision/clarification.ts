import type { Logger } from '../types/logger.js';
import type { ScoringEngine, SynthesisQuery } from '../scoring/scoring-engine.js';
import { InvalidStateError } from '../core/errors.js';

export type ClarificationState =
  | 'idle'
  | 'rescoring'
  | 'asking'
  | 'awaiting_answer'
  | 'satisfied'
  | 'exhausted';

export interface ClarificationConfig {
  /** Candidate quality at which the knowledge is good enough */
  qualityThreshold: number;
  /** Questions asked before giving up */
  maxRounds: number;
}

const DEFAULT_CONFIG: ClarificationConfig = {
  qualityThreshold: 0.6,
  maxRounds: 3,
};

export const CLARIFYING_QUESTIONS = [
  'What outcome matters most to you here, and over what time frame?',
  'What happens if this goes wrong, and could you undo it?',
  'Which alternatives have you already considered?',
] as const;

export interface ClarificationStep {
  state: ClarificationState;
  /** Set while awaiting an answer */
  question: string | null;
  candidateQuality: number;
  /** Questions asked so far */
  round: number;
}

/**
 * ClarificationSession - asks follow-up questions until the knowledge
 * retrieved for the accumulated context is good enough.
 *
 * idle -> rescoring -> satisfied
 *                   -> asking -> awaiting_answer -> rescoring ...
 *                   -> exhausted (maxRounds questions asked)
 */
export class ClarificationSession {
  private readonly logger: Logger;
  private readonly config: ClarificationConfig;
  private state: ClarificationState = 'idle';
  private round = 0;
  private context = '';
  private question: string | null = null;
  private quality = 0;

  constructor(
    private readonly scoring: ScoringEngine,
    private readonly query: Omit<SynthesisQuery, 'contextText'>,
    logger: Logger,
    config: Partial<ClarificationConfig> = {}
  ) {
    this.logger = logger.child({ component: 'clarification' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get currentState(): ClarificationState {
    return this.state;
  }

  get accumulatedContext(): string {
    return this.context;
  }

  start(text: string): ClarificationStep {
    if (this.state !== 'idle') {
      throw new InvalidStateError('ClarificationSession', this.state, 'start');
    }
    this.context = text;
    return this.rescore();
  }

  answer(text: string): ClarificationStep {
    if (this.state !== 'awaiting_answer') {
      throw new InvalidStateError('ClarificationSession', this.state, 'answer');
    }
    this.context = `${this.context} ${text}`.trim();
    return this.rescore();
  }

  private rescore(): ClarificationStep {
    this.state = 'rescoring';
    this.question = null;
    this.quality = this.scoring.synthesize({ ...this.query, contextText: this.context }).candidateQuality;

    if (this.quality >= this.config.qualityThreshold) {
      this.state = 'satisfied';
    } else if (this.round >= this.config.maxRounds) {
      this.state = 'exhausted';
    } else {
      this.state = 'asking';
      this.question = CLARIFYING_QUESTIONS[this.round % CLARIFYING_QUESTIONS.length] ?? null;
      this.round++;
      this.state = 'awaiting_answer';
    }

    this.logger.debug(
      { state: this.state, round: this.round, quality: this.quality },
      'Clarification rescored'
    );
    return this.step();
  }

  private step(): ClarificationStep {
    return {
      state: this.state,
      question: this.question,
      candidateQuality: this.quality,
      round: this.round,
    };
  }
}

export function createClarificationSession(
  scoring: ScoringEngine,
  query: Omit<SynthesisQuery, 'contextText'>,
  logger: Logger,
  config?: Partial<ClarificationConfig>
): ClarificationSession {
  return new ClarificationSession(scoring, query, logger, config);
}
