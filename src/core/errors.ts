/**
 * Engine Error Types
 *
 * Typed error classes with a code discriminator so boundaries can decide
 * which failures fall back and which propagate.
 */

export type EngineErrorCode =
  | 'CONFIG_INVALID'
  | 'DOCTRINE_INVALID'
  | 'KNOWLEDGE_INVALID'
  | 'ADVISOR_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UNKNOWN_DECISION'
  | 'INVALID_STATE';

/**
 * Base engine error.
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/**
 * Configuration file present but invalid.
 * Not recoverable - fix the file.
 */
export class ConfigError extends EngineError {
  constructor(message: string) {
    super(`Config: ${message}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/**
 * Doctrine document failed validation.
 */
export class DoctrineError extends EngineError {
  constructor(
    public readonly doctrineId: string,
    message: string
  ) {
    super(`Doctrine ${doctrineId}: ${message}`, 'DOCTRINE_INVALID');
    this.name = 'DoctrineError';
  }
}

/**
 * Knowledge entry rejected (duplicate id, bad shape).
 */
export class KnowledgeLoadError extends EngineError {
  constructor(message: string) {
    super(`Knowledge: ${message}`, 'KNOWLEDGE_INVALID');
    this.name = 'KnowledgeLoadError';
  }
}

/**
 * An advisor threw while analyzing. The council records it and moves on.
 */
export class AdvisorError extends EngineError {
  constructor(
    public readonly advisorId: string,
    message: string
  ) {
    super(`Advisor ${advisorId}: ${message}`, 'ADVISOR_FAILED');
    this.name = 'AdvisorError';
  }
}

/**
 * Disk write or read failed.
 */
export class PersistenceError extends EngineError {
  constructor(message: string) {
    super(`Persistence: ${message}`, 'PERSISTENCE_FAILED');
    this.name = 'PersistenceError';
  }
}

/**
 * Text-understanding service failed or answered garbage.
 * Always handled by the heuristic fallback.
 */
export class UpstreamError extends EngineError {
  constructor(message: string) {
    super(`Upstream: ${message}`, 'UPSTREAM_UNAVAILABLE');
    this.name = 'UpstreamError';
  }
}

/**
 * Operation referenced a decision key that was never recorded.
 */
export class UnknownDecisionError extends EngineError {
  constructor(public readonly decisionKey: string) {
    super(`Unknown decision ${decisionKey}`, 'UNKNOWN_DECISION');
    this.name = 'UnknownDecisionError';
  }
}

/**
 * State machine driven from a state that does not accept the call.
 */
export class InvalidStateError extends EngineError {
  constructor(machine: string, state: string, operation: string) {
    super(`${machine} cannot ${operation} in state ${state}`, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

/**
 * Operation exceeded its time budget.
 */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Error message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
