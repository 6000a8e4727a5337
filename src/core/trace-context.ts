/**
 * Trace context for decisions.
 *
 * Every decision runs inside withTraceContext so that all log lines written
 * while it is in flight carry its traceId and decisionId, including lines
 * from advisors running concurrently in the worker pool.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID */
  traceId: string;
  /** Decision being evaluated, when there is one */
  decisionId?: string;
  /** Current span */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run fn with the given trace context; async descendants inherit it.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * The active trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * New span ID, nested under parent when given (e.g. "root_ab12cd34").
 */
export function generateChildSpan(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

/**
 * Trace context rooted at a decision.
 */
export function createDecisionTrace(decisionId: string): TraceContext {
  return {
    traceId: decisionId,
    decisionId,
    spanId: generateChildSpan(),
  };
}
