import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import { createLogger, type LoggerConfig } from './logger.js';
import { loadConfig, type EngineConfig } from '../config/index.js';
import { loadKnowledgeDirectory, type KnowledgeStore } from '../knowledge/index.js';
import { createScoringEngine, type ScoringEngine } from '../scoring/index.js';
import {
  loadDoctrineBook,
  loadLexicon,
  createAdvisorRegistry,
  type AdvisorRegistry,
  type DoctrineBook,
} from '../advisors/index.js';
import { createCouncil, type Council } from '../council/index.js';
import { createModeRouter, type ModeRouter } from '../modes/index.js';
import { createFinalAuthorityGate, type FinalAuthorityGate } from '../authority/index.js';
import {
  createJudgmentPrior,
  createFeedbackLoop,
  type JudgmentPrior,
  type FeedbackLoop,
} from '../learning/index.js';
import {
  createJSONStorage,
  createDecisionLog,
  DECISION_LOG_FILE,
  type DecisionLog,
  type Storage,
} from '../storage/index.js';
import {
  createUnderstanding,
  type TextUnderstanding,
  type UnderstandingService,
} from '../ports/index.js';
import {
  createDecisionEngine,
  createSituationSnapshotStore,
  createClarificationSession,
  type ClarificationSession,
  type DecisionEngine,
  type SituationSnapshotStore,
} from '../decision/index.js';

export const LEXICON_FILE = join('advisors', 'lexicon.json');

export interface ContainerOptions {
  /** Directory holding engine.json (default: data/config) */
  configPath?: string;
  /** Use this logger instead of building one from config */
  logger?: Logger;
  /** External text-understanding service; heuristics only when absent */
  understandingService?: UnderstandingService;
}

/**
 * Container holding all engine dependencies.
 */
export interface Container {
  logger: Logger;
  config: EngineConfig;
  knowledge: KnowledgeStore;
  scoring: ScoringEngine;
  doctrines: DoctrineBook;
  registry: AdvisorRegistry;
  council: Council;
  router: ModeRouter;
  gate: FinalAuthorityGate;
  understanding: TextUnderstanding;
  snapshots: SituationSnapshotStore;
  storage: Storage;
  decisionLog: DecisionLog;
  prior: JudgmentPrior;
  feedback: FeedbackLoop;
  engine: DecisionEngine;
  /** New clarification session over the given domains */
  clarify: (domains: readonly string[], domainConfidence: number) => ClarificationSession;
  /** Wait for background work to settle */
  shutdown: () => Promise<void>;
}

/**
 * Wire the engine from a resolved configuration and restore persisted
 * state: knowledge memory, learned priors, decision log.
 */
export async function createContainer(
  config: EngineConfig,
  options: ContainerOptions = {}
): Promise<Container> {
  const loggerConfig: Partial<LoggerConfig> = {
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: config.logging.level,
    pretty: config.logging.pretty,
  };
  const logger: Logger = options.logger ?? createLogger(loggerConfig);

  const { store: knowledge, entriesLoaded, entriesSkipped } = await loadKnowledgeDirectory(
    config.paths.knowledge,
    logger
  );
  logger.info({ entriesLoaded, entriesSkipped }, 'Knowledge loaded');

  const scoring = createScoringEngine(knowledge, logger, config.scoring);
  const doctrines = await loadDoctrineBook(config.paths.doctrine, logger);
  const lexicon = await loadLexicon(join(config.paths.data, LEXICON_FILE));

  const registry = createAdvisorRegistry({
    doctrines,
    lexicon,
    scoring,
    evidenceCount: config.council.evidencePerAdvisor,
  });
  const council = createCouncil(registry, logger, {
    concurrency: config.council.concurrency,
    advisorTimeoutMs: config.council.advisorTimeoutMs,
  });
  const router = createModeRouter(logger, config.modes.defaultMode);
  const gate = createFinalAuthorityGate(doctrines.authority, logger, config.authority);

  const storage = createJSONStorage(config.paths.state, { logger });
  const decisionLog = createDecisionLog({
    logPath: join(config.paths.state, DECISION_LOG_FILE),
    storage,
    logger,
  });
  await decisionLog.open();

  const prior = createJudgmentPrior({ storage, logger, config: config.learning });
  await prior.load();
  scoring.usePriors(prior);

  const feedback = createFeedbackLoop({
    log: decisionLog,
    prior,
    store: knowledge,
    memoryStorage: storage,
    logger,
  });
  const restored = await feedback.loadMemory();
  if (restored > 0) {
    logger.info({ entries: restored }, 'Knowledge memory restored');
  }

  const understanding = createUnderstanding(options.understandingService, logger, {
    timeoutMs: config.upstream.timeoutMs,
  });
  const snapshots = createSituationSnapshotStore(understanding, logger);

  const engine = createDecisionEngine({
    understanding,
    router,
    council,
    gate,
    log: decisionLog,
    snapshots,
    logger,
  });

  const clarify = (domains: readonly string[], domainConfidence: number): ClarificationSession =>
    createClarificationSession(
      scoring,
      { activeDomains: domains, domainConfidence },
      logger,
      config.clarification
    );

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await snapshots.idle();
    logger.info('Shutdown complete');
  };

  return {
    logger,
    config,
    knowledge,
    scoring,
    doctrines,
    registry,
    council,
    router,
    gate,
    understanding,
    snapshots,
    storage,
    decisionLog,
    prior,
    feedback,
    engine,
    clarify,
    shutdown,
  };
}

/**
 * Load configuration, then wire the engine.
 */
export async function createContainerAsync(options: ContainerOptions = {}): Promise<Container> {
  const config = await loadConfig(options.configPath);
  return createContainer(config, options);
}
