import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, errorMessage } from '../core/errors.js';
import { isDecisionMode } from '../types/mode.js';
import type { EngineConfig, EngineConfigFile, LogLevel } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  engineConfigFileSchema,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'engine.json';

/**
 * ConfigLoader - merges configuration from several sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/engine.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: EngineConfigFile | null = null;
  private readonly warnings: string[] = [];

  constructor(configPath = DEFAULT_CONFIG.paths.config, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  async load(): Promise<EngineConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /** Raw validated config file, for debugging */
  getLoadedConfigFile(): EngineConfigFile | null {
    return this.loadedConfig;
  }

  /** Non-fatal problems noticed during load (version skew, ignored env values) */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<EngineConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new ConfigError(`cannot read ${filePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = engineConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`${filePath} failed validation: ${issues}`);
    }

    const file = parsed.data;
    if (file.version !== undefined && file.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(file.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return file;
  }

  private mergeConfigFile(config: EngineConfig, file: EngineConfigFile): void {
    // Logging
    if (file.logging) {
      if (file.logging.level !== undefined) config.logging.level = file.logging.level;
      if (file.logging.pretty !== undefined) config.logging.pretty = file.logging.pretty;
      if (file.logging.maxFiles !== undefined) config.logging.maxFiles = file.logging.maxFiles;
    }

    // Scoring
    if (file.scoring) {
      if (file.scoring.topK !== undefined) config.scoring.topK = file.scoring.topK;
      if (file.scoring.ageDecayDays !== undefined) {
        config.scoring.ageDecayDays = file.scoring.ageDecayDays;
      }
    }

    // Council
    if (file.council) {
      if (file.council.concurrency !== undefined) {
        config.council.concurrency = file.council.concurrency;
      }
      if (file.council.advisorTimeoutMs !== undefined) {
        config.council.advisorTimeoutMs = file.council.advisorTimeoutMs;
      }
      if (file.council.evidencePerAdvisor !== undefined) {
        config.council.evidencePerAdvisor = file.council.evidencePerAdvisor;
      }
    }

    // Modes
    if (file.modes?.defaultMode !== undefined) {
      config.modes.defaultMode = file.modes.defaultMode;
    }

    // Authority
    if (file.authority?.riskThreshold !== undefined) {
      config.authority.riskThreshold = file.authority.riskThreshold;
    }

    // Learning
    if (file.learning) {
      if (file.learning.disabled !== undefined) config.learning.disabled = file.learning.disabled;
      if (file.learning.minSamples !== undefined) {
        config.learning.minSamples = file.learning.minSamples;
      }
      if (file.learning.confidenceThreshold !== undefined) {
        config.learning.confidenceThreshold = file.learning.confidenceThreshold;
      }
    }

    // Clarification
    if (file.clarification) {
      if (file.clarification.qualityThreshold !== undefined) {
        config.clarification.qualityThreshold = file.clarification.qualityThreshold;
      }
      if (file.clarification.maxRounds !== undefined) {
        config.clarification.maxRounds = file.clarification.maxRounds;
      }
    }

    // Upstream
    if (file.upstream?.timeoutMs !== undefined) {
      config.upstream.timeoutMs = file.upstream.timeoutMs;
    }
  }

  private mergeEnvironment(config: EngineConfig): void {
    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      const level = LOG_LEVELS.find((l): l is LogLevel => l === logLevel);
      if (level) {
        config.logging.level = level;
      } else {
        this.warnings.push(`Ignoring unknown LOG_LEVEL "${logLevel}"`);
      }
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.knowledge = join(dataPath, 'knowledge');
      config.paths.doctrine = join(dataPath, 'doctrine');
      config.paths.state = join(dataPath, 'state');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }

    const mode = this.env['ENGINE_MODE'];
    if (mode) {
      if (isDecisionMode(mode)) {
        config.modes.defaultMode = mode;
      } else {
        this.warnings.push(`Ignoring unknown ENGINE_MODE "${mode}"`);
      }
    }

    const riskThreshold = this.parseNumber('RISK_THRESHOLD');
    if (riskThreshold !== undefined && riskThreshold >= 0 && riskThreshold <= 1) {
      config.authority.riskThreshold = riskThreshold;
    }

    const timeout = this.parseNumber('ADVISOR_TIMEOUT_MS');
    if (timeout !== undefined && timeout > 0) {
      config.council.advisorTimeoutMs = timeout;
    }

    const disabled = this.env['LEARNING_DISABLED'];
    if (disabled !== undefined) {
      config.learning.disabled = disabled === 'true' || disabled === '1';
    }
  }

  private parseNumber(name: string): number | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      this.warnings.push(`Ignoring non-numeric ${name} "${raw}"`);
      return undefined;
    }
    return value;
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<EngineConfig> {
  return createConfigLoader(configPath).load();
}
