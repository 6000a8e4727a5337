import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { dirname } from 'node:path';
import { z } from 'zod';
import { DateTime } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { DecisionOutcome, OutcomeRecord } from '../types/outcome.js';
import { DECISION_MODES, type DecisionMode } from '../types/mode.js';
import { SerialLock } from '../core/serial-lock.js';
import { errorMessage } from '../core/errors.js';
import type { Storage } from './storage.js';

export const DECISION_LOG_FILE = 'decisions.jsonl';
export const OUTCOME_INDEX_KEY = 'outcome-index';
const OUTCOME_INDEX_VERSION = 1;

/** Regret above this counts as a high-regret outcome */
export const HIGH_REGRET_THRESHOLD = 0.6;

const unit = z.number().min(0).max(1);

const featuresSchema = z.object({
  situation: z.object({
    decisionIrreversible: z.number(),
    decisionReversible: z.number(),
    decisionExploratory: z.number(),
    riskLow: z.number(),
    riskMedium: z.number(),
    riskHigh: z.number(),
    horizonShort: z.number(),
    horizonMedium: z.number(),
    horizonLong: z.number(),
    timePressure: z.number(),
    informationCompleteness: z.number(),
  }),
  constraints: z.object({
    irreversibilityScore: z.number(),
    fragilityScore: z.number(),
    optionalityLossScore: z.number(),
    downsideAsymmetry: z.number(),
    upsideAsymmetry: z.number(),
    recoveryTimeLong: z.number(),
  }),
  usage: z.object({
    usedPrinciple: z.number(),
    usedRule: z.number(),
    usedWarning: z.number(),
    usedClaim: z.number(),
    usedAdvice: z.number(),
  }),
});

export const decisionRecordSchema = z.object({
  decisionId: z.string().min(1),
  decisionKey: z.string().min(1),
  timestamp: z.string(),
  mode: z.enum(DECISION_MODES),
  text: z.string(),
  domains: z.array(z.string()),
  advisorsInvolved: z.array(z.string()),
  outcome: z.enum(['consensus_reached', 'bounded_risk_tradeoff', 'deadlocked']),
  recommendation: z.enum(['support', 'oppose', 'defer', 'support_with_caution']),
  avgConfidence: unit,
  consensusStrength: unit,
  redLineConcerns: z.array(z.string()),
  dissenters: z.array(z.string()),
  interpretation: z.string(),
  verdict: z.object({
    finalOutcome: z.enum(['accept', 'accept_with_mitigation', 'defer', 'reject']),
    reason: z.string(),
  }),
  features: featuresSchema,
  /** Knowledge entries cited as evidence, reinforced or penalized by the outcome */
  evidenceIds: z.array(z.string()),
});

export type DecisionRecord = z.infer<typeof decisionRecordSchema>;

/** What the caller supplies; the log assigns the key */
export type DecisionDraft = Omit<DecisionRecord, 'decisionKey'>;

export const decisionOutcomeSchema = z.object({
  success: z.boolean(),
  regretScore: unit,
  recoveryTimeDays: z.number().finite().nonnegative(),
  secondaryDamage: z.boolean(),
});

const outcomeRecordSchema = decisionOutcomeSchema.extend({
  decisionId: z.string(),
  decisionKey: z.string(),
  timestamp: z.string(),
});

/** Entries are checked one by one so a bad entry drops only itself */
const outcomeIndexSchema = z.object({
  version: z.literal(OUTCOME_INDEX_VERSION),
  outcomes: z.record(z.string(), z.unknown()),
});

export interface DecisionWithOutcome {
  record: DecisionRecord;
  outcome: OutcomeRecord;
}

export interface ModeStatistics {
  decisions: number;
  outcomes: number;
  successes: number;
  successRate: number;
  averageRegret: number;
}

export interface DecisionStatistics {
  total: number;
  withOutcomes: number;
  successes: number;
  successRate: number;
  highRegret: number;
  secondaryDamage: number;
  byMode: Partial<Record<DecisionMode, ModeStatistics>>;
}

export function decisionKeyFor(decisionId: string, timestamp: string): string {
  const digest = createHash('sha256').update(decisionId + timestamp).digest('hex');
  return `dec_${decisionId}_${digest.slice(0, 8)}`;
}

export interface DecisionLogConfig {
  /** Path of the append-only JSONL file */
  logPath: string;
  /** Holds the outcome index */
  storage: Storage;
  logger: Logger;
}

/**
 * DecisionLog - append-only decision records plus a keyed outcome index.
 *
 * Decision lines are never rewritten. Outcomes are upserted into a
 * separate document, at most one per decision key. All writes go through
 * a single writer; in-memory state only changes after the write lands.
 */
export class DecisionLog {
  private readonly logPath: string;
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly writer = new SerialLock();

  private records = new Map<string, DecisionRecord>();
  private outcomes: Readonly<Record<string, OutcomeRecord>> = {};
  /** The file ends mid-line; the next append starts on a fresh one */
  private tornTail = false;

  constructor(config: DecisionLogConfig) {
    this.logPath = config.logPath;
    this.storage = config.storage;
    this.logger = config.logger.child({ component: 'decision-log' });
  }

  /**
   * Rebuild in-memory state from disk.
   */
  async open(): Promise<void> {
    await this.writer.run(async () => {
      this.records = await this.readRecords();
      this.outcomes = await this.readOutcomes();
      this.logger.info(
        { decisions: this.records.size, outcomes: Object.keys(this.outcomes).length },
        'Decision log opened'
      );
    });
  }

  private async readRecords(): Promise<Map<string, DecisionRecord>> {
    const records = new Map<string, DecisionRecord>();

    let content: string;
    try {
      content = await readFile(this.logPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return records;
      }
      throw error;
    }

    this.tornTail = content.length > 0 && !content.endsWith('\n');

    const lines = content.split('\n');
    lines.forEach((line, index) => {
      if (line.trim() === '') return;
      const record = this.parseLine(line);
      if (record) {
        records.set(record.decisionKey, record);
      } else {
        this.logger.warn({ line: index + 1 }, 'Skipping unreadable decision log line');
      }
    });

    return records;
  }

  private parseLine(line: string): DecisionRecord | null {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = decisionRecordSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  private async readOutcomes(): Promise<Record<string, OutcomeRecord>> {
    const raw = await this.storage.load(OUTCOME_INDEX_KEY);
    if (raw === null) return {};

    const parsed = outcomeIndexSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Outcome index invalid, starting empty');
      return {};
    }

    const outcomes: Record<string, OutcomeRecord> = {};
    for (const [decisionKey, value] of Object.entries(parsed.data.outcomes)) {
      const entry = outcomeRecordSchema.safeParse(value);
      if (entry.success && entry.data.decisionKey === decisionKey) {
        outcomes[decisionKey] = entry.data;
      } else {
        this.logger.warn({ decisionKey }, 'Skipping invalid outcome');
      }
    }
    return outcomes;
  }

  /**
   * Append a decision.
   * @returns The stored record, or null if the write failed
   */
  append(draft: DecisionDraft): Promise<DecisionRecord | null> {
    return this.writer.run(async () => {
      const record: DecisionRecord = {
        ...draft,
        decisionKey: decisionKeyFor(draft.decisionId, draft.timestamp),
      };
      const prefix = this.tornTail ? '\n' : '';

      try {
        await mkdir(dirname(this.logPath), { recursive: true });
        await appendFile(this.logPath, `${prefix}${JSON.stringify(record)}\n`, 'utf-8');
      } catch (error) {
        this.logger.error(
          { decisionId: draft.decisionId, error: errorMessage(error) },
          'Failed to append decision'
        );
        return null;
      }

      this.tornTail = false;
      this.records.set(record.decisionKey, record);
      this.logger.debug({ decisionKey: record.decisionKey }, 'Decision recorded');
      return record;
    });
  }

  /**
   * Upsert the outcome of a recorded decision.
   * @returns false for an unknown key, an invalid outcome or a failed write
   */
  recordOutcome(decisionKey: string, outcome: DecisionOutcome, at: Date = new Date()): Promise<boolean> {
    return this.writer.run(async () => {
      const record = this.records.get(decisionKey);
      if (!record) {
        this.logger.warn({ decisionKey }, 'Outcome for unknown decision');
        return false;
      }

      const valid = decisionOutcomeSchema.safeParse(outcome);
      if (!valid.success) {
        this.logger.warn(
          { decisionKey, issues: valid.error.issues.map((issue) => issue.path.join('.')) },
          'Invalid outcome rejected'
        );
        return false;
      }

      const entry: OutcomeRecord = {
        decisionId: record.decisionId,
        decisionKey,
        timestamp: DateTime.fromJSDate(at).toUTC().toISO() ?? at.toISOString(),
        ...valid.data,
      };
      const next = { ...this.outcomes, [decisionKey]: entry };

      try {
        await this.storage.save(OUTCOME_INDEX_KEY, { version: OUTCOME_INDEX_VERSION, outcomes: next });
      } catch (error) {
        this.logger.error({ decisionKey, error: errorMessage(error) }, 'Failed to record outcome');
        return false;
      }

      this.outcomes = next;
      return true;
    });
  }

  get(decisionKey: string): DecisionRecord | undefined {
    return this.records.get(decisionKey);
  }

  has(decisionKey: string): boolean {
    return this.records.has(decisionKey);
  }

  getOutcome(decisionKey: string): OutcomeRecord | undefined {
    return this.outcomes[decisionKey];
  }

  get size(): number {
    return this.records.size;
  }

  /** Decisions that have an outcome, in append order */
  withOutcomes(): DecisionWithOutcome[] {
    const result: DecisionWithOutcome[] = [];
    for (const record of this.records.values()) {
      const outcome = this.outcomes[record.decisionKey];
      if (outcome) result.push({ record, outcome });
    }
    return result;
  }

  statistics(): DecisionStatistics {
    const paired = this.withOutcomes();
    const successes = paired.filter((p) => p.outcome.success).length;

    const byMode: Partial<Record<DecisionMode, ModeStatistics>> = {};
    for (const mode of DECISION_MODES) {
      const decisions = [...this.records.values()].filter((r) => r.mode === mode).length;
      if (decisions === 0) continue;

      const modeOutcomes = paired.filter((p) => p.record.mode === mode);
      const modeSuccesses = modeOutcomes.filter((p) => p.outcome.success).length;
      const regretSum = modeOutcomes.reduce((sum, p) => sum + p.outcome.regretScore, 0);
      byMode[mode] = {
        decisions,
        outcomes: modeOutcomes.length,
        successes: modeSuccesses,
        successRate: modeOutcomes.length > 0 ? modeSuccesses / modeOutcomes.length : 0,
        averageRegret: modeOutcomes.length > 0 ? regretSum / modeOutcomes.length : 0,
      };
    }

    return {
      total: this.records.size,
      withOutcomes: paired.length,
      successes,
      successRate: paired.length > 0 ? successes / paired.length : 0,
      highRegret: paired.filter((p) => p.outcome.regretScore > HIGH_REGRET_THRESHOLD).length,
      secondaryDamage: paired.filter((p) => p.outcome.secondaryDamage).length,
      byMode,
    };
  }
}

export function createDecisionLog(config: DecisionLogConfig): DecisionLog {
  return new DecisionLog(config);
}
