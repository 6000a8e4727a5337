/**
 * Logger interface used across the engine.
 *
 * Mirrors the subset of Pino's API the engine calls, so components take a
 * Logger instead of depending on pino directly.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional bindings (usually `{ component }`) */
  child(bindings: Record<string, unknown>): Logger;
}
