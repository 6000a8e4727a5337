import { z } from 'zod';
import { DECISION_MODES, type DecisionMode } from '../types/mode.js';

export const CONFIG_FILE_VERSION = 1;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

/**
 * Schema of data/config/engine.json.
 * Every field is optional; defaults fill the gaps.
 */
export const engineConfigFileSchema = z
  .object({
    version: z.number().int().positive(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS),
        pretty: z.boolean(),
        maxFiles: positiveInt,
      })
      .partial(),
    scoring: z
      .object({
        topK: positiveInt,
        ageDecayDays: z.number().positive(),
      })
      .partial(),
    council: z
      .object({
        concurrency: positiveInt,
        advisorTimeoutMs: positiveInt,
        evidencePerAdvisor: z.number().int().min(0),
      })
      .partial(),
    modes: z
      .object({
        defaultMode: z.enum(DECISION_MODES),
      })
      .partial(),
    authority: z
      .object({
        riskThreshold: unit,
      })
      .partial(),
    learning: z
      .object({
        disabled: z.boolean(),
        minSamples: positiveInt,
        confidenceThreshold: unit,
      })
      .partial(),
    clarification: z
      .object({
        qualityThreshold: unit,
        maxRounds: positiveInt,
      })
      .partial(),
    upstream: z
      .object({
        timeoutMs: positiveInt,
      })
      .partial(),
  })
  .partial();

export type EngineConfigFile = z.infer<typeof engineConfigFileSchema>;

/**
 * Fully resolved configuration after defaults, file and environment.
 */
export interface EngineConfig {
  paths: {
    /** Root data directory */
    data: string;
    config: string;
    knowledge: string;
    doctrine: string;
    /** Decision log, outcome index, learned priors, memory stats */
    state: string;
    logs: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };
  scoring: {
    /** Entries kept by ranking */
    topK: number;
    /** Age in days at which memory weight has decayed by 1/e */
    ageDecayDays: number;
  };
  council: {
    /** Advisors evaluated at once */
    concurrency: number;
    advisorTimeoutMs: number;
    /** Knowledge items attached to each position */
    evidencePerAdvisor: number;
  };
  modes: {
    defaultMode: DecisionMode;
  };
  authority: {
    riskThreshold: number;
  };
  learning: {
    /** Ablation switch: priors report zero confidence */
    disabled: boolean;
    /** Samples needed before an unforced training run */
    minSamples: number;
    /** Bucket confidence needed before learned weights apply */
    confidenceThreshold: number;
  };
  clarification: {
    qualityThreshold: number;
    maxRounds: number;
  };
  upstream: {
    timeoutMs: number;
  };
}

export const DEFAULT_CONFIG: EngineConfig = {
  paths: {
    data: 'data',
    config: 'data/config',
    knowledge: 'data/knowledge',
    doctrine: 'data/doctrine',
    state: 'data/state',
    logs: 'data/logs',
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  scoring: {
    topK: 5,
    ageDecayDays: 180,
  },
  council: {
    concurrency: 4,
    advisorTimeoutMs: 2_000,
    evidencePerAdvisor: 3,
  },
  modes: {
    defaultMode: 'meeting',
  },
  authority: {
    riskThreshold: 0.7,
  },
  learning: {
    disabled: false,
    minSamples: 5,
    confidenceThreshold: 0.6,
  },
  clarification: {
    qualityThreshold: 0.6,
    maxRounds: 3,
  },
  upstream: {
    timeoutMs: 5_000,
  },
};
