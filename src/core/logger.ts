import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
  /** Also write a plain-text log file under logDir */
  toFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

const LOG_PREFIX = 'engine-';

function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty log files and everything beyond the newest maxFiles.
 */
function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      process.stderr.write(`log cleanup failed for ${file.path}: ${String(error)}\n`);
    }
  }
}

/**
 * Pino mixin that copies the active trace context into every record.
 * Fields passed explicitly to a log call win over these.
 */
function createTraceMixin(): () => Record<string, unknown> {
  const TRACE_KEYS = ['traceId', 'decisionId', 'spanId'] as const;

  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = {};
    for (const key of TRACE_KEYS) {
      const value = ctx[key];
      if (value) {
        result[key] = value;
      }
    }
    return result;
  };
}

/**
 * Create the engine logger.
 *
 * Console output goes through pino-pretty in development and raw JSON to
 * stdout otherwise. A second target writes a plain-text file under logDir,
 * rotated to the newest maxFiles.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({ target: 'pino-pretty', level, options: { colorize: true } });
  } else {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  }

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, maxFiles);
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
