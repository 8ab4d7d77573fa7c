/**
 * Span Telemetry
 *
 * Traces and nested spans with per-span metadata, queued on completion and
 * forwarded in batches to a pluggable observability backend.
 */

export * from './telemetry/identifier.js';
export * from './telemetry/clock.js';
export * from './telemetry/datum.js';
export * from './telemetry/metric.js';
export * from './telemetry/queue.js';
export * from './telemetry/context.js';
export * from './exporters/exporter.js';
export * from './exporters/honeycomb.js';
export * from './exporters/console.js';
export * from './logging/logger.js';
export * from './runtime/config.js';
export * from './runtime/terminate.js';
export * from './runtime/drain.js';
export * from './runtime/program.js';

export const VERSION = '0.1.0';
