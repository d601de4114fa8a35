/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context so every log line written while an
 * interaction or a tick is in flight carries the same identifiers.
 *
 * - Each inbound message is its own trace root (traceId = message id)
 * - Each tick gets a correlationId shared by everything it processes
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID - the message id for interactions, the tick id for housekeeping */
  traceId: string;
  /** Batch grouping ID (everything run by the same tick) */
  correlationId?: string;
  /** Current span ID */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit it.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a span ID, nested under a parent when given.
 */
export function generateSpanId(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

/**
 * Create a trace context rooted at the given id.
 */
export function createTraceContext(id: string, correlationId?: string): TraceContext {
  const parent = getTraceContext();
  const context: TraceContext = {
    traceId: id,
    spanId: generateSpanId(parent?.spanId),
  };
  const correlation = correlationId ?? parent?.correlationId;
  if (correlation !== undefined) {
    context.correlationId = correlation;
  }
  return context;
}
