/**
 * Trace and span scoping.
 *
 * The current span travels as an explicit `TelemetryContext` argument: every
 * scope hands its action a new context value and never mutates the one it was
 * given. Concurrent tasks holding different contexts cannot see each other's
 * spans.
 */

import { getCurrentTimeNanoseconds, type Clock } from './clock.js';
import { closeDatum, emptyDatum, MetadataContainer, type Datum } from './datum.js';
import { newIdentifier } from './identifier.js';
import type { MetricValue } from './metric.js';
import type { SpanQueue } from './queue.js';

export interface TelemetryContext {
  readonly datum: Datum;
  readonly queue: SpanQueue;
  readonly clock: Clock;
}

export type Action<T> = (context: TelemetryContext) => T | Promise<T>;

export interface ContextOptions {
  serviceName?: string;
  clock?: Clock;
}

export function createContext(queue: SpanQueue, options: ContextOptions = {}): TelemetryContext {
  return {
    datum: { ...emptyDatum(), serviceName: options.serviceName },
    queue,
    clock: options.clock ?? getCurrentTimeNanoseconds,
  };
}

/**
 * Start a new trace with a randomly generated identifier.
 */
export function beginTrace<T>(context: TelemetryContext, action: Action<T>): Promise<T> {
  return usingTrace(context, newIdentifier(), undefined, action);
}

/**
 * Begin a trace using an identifier supplied from outside: a job id, a
 * correlation id from a load balancer, or the trace of an enclosing service.
 * When continuing another service's trace, pass its span as `parentSpanId`.
 *
 * The root placeholder created here is never enqueued; only spans opened
 * with `encloseSpan` inside it are.
 */
export async function usingTrace<T>(
  context: TelemetryContext,
  traceId: string,
  parentSpanId: string | undefined,
  action: Action<T>
): Promise<T> {
  const datum: Datum = {
    ...emptyDatum(),
    trace: { traceId },
    parentSpanId,
    serviceName: context.datum.serviceName,
  };

  return await action({ ...context, datum });
}

/**
 * Run `action` inside a new span named `name`, a child of the current one.
 *
 * The span is closed and enqueued when the action settles, whether it
 * returned or threw; an error is rethrown unchanged after the span is queued.
 */
export async function encloseSpan<T>(context: TelemetryContext, name: string, action: Action<T>): Promise<T> {
  const parent = context.datum;
  const spanId = newIdentifier();
  const start = context.clock();

  const datum: Datum = {
    ...parent,
    spanId,
    name,
    startTime: start,
    duration: undefined,
    parentSpanId: parent.spanId ?? parent.parentSpanId,
    metadata: parent.metadata.snapshot(),
  };

  try {
    return await action({ ...context, datum });
  } finally {
    context.queue.enqueue(closeDatum(datum, context.clock()));
  }
}

/**
 * Attach metadata to the current span. Later values for the same key win.
 */
export function telemetry(context: TelemetryContext, values: readonly MetricValue[]): void {
  const metadata = context.datum.metadata;
  for (const { key, value } of values) {
    metadata.insert(key, value);
  }
}

/**
 * Record a point-in-time event in the current trace. It has no span
 * identifier and no duration of its own, and is parented on the current span.
 */
export function sendEvent(context: TelemetryContext, name: string, values: readonly MetricValue[]): void {
  const current = context.datum;
  const metadata = new MetadataContainer(current.metadata.entries());
  for (const { key, value } of values) {
    metadata.insert(key, value);
  }

  context.queue.enqueue(Object.freeze({
    name,
    startTime: context.clock(),
    trace: current.trace,
    parentSpanId: current.spanId ?? current.parentSpanId,
    serviceName: current.serviceName,
    metadata,
  }));
}
