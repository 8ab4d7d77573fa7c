/**
 * Console Exporter - writes each span as a JSON line on standard output.
 * For local development; nothing to configure.
 */

import { formatTimestamp } from '../telemetry/clock.js';
import type { Datum, MetricScalar } from '../telemetry/datum.js';
import type { Exporter, Forwarder } from './exporter.js';

export interface ConsoleRecord {
  time: string;
  name: string;
  trace_id?: string;
  span_id?: string;
  parent_id?: string;
  service_name?: string;
  duration_ms?: number;
  metadata: Record<string, MetricScalar>;
}

export function toConsoleRecord(datum: Datum): ConsoleRecord {
  return {
    time: formatTimestamp(datum.startTime),
    name: datum.name,
    ...(datum.trace && { trace_id: datum.trace.traceId }),
    ...(datum.spanId !== undefined && { span_id: datum.spanId }),
    ...(datum.parentSpanId !== undefined && { parent_id: datum.parentSpanId }),
    ...(datum.serviceName !== undefined && { service_name: datum.serviceName }),
    ...(datum.duration !== undefined && { duration_ms: Number(datum.duration) / 1e6 }),
    metadata: datum.metadata.toRecord(),
  };
}

export class ConsoleForwarder implements Forwarder {
  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  async forward(datums: readonly Datum[]): Promise<void> {
    for (const datum of datums) {
      this.write(JSON.stringify(toConsoleRecord(datum)));
    }
  }
}

export const consoleExporter: Exporter = {
  codename: 'console',
  setupConfig: config => config,
  setupAction: () => new ConsoleForwarder(),
};
