/**
 * Telemetry Logger - Structured diagnostics for the delivery pipeline
 *
 * The SDK must never fault the host application, so everything that goes
 * wrong after startup ends up here instead of in a thrown error.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogEventSchema = z.enum([
  'telemetry.exporter_selected',
  'telemetry.batch_sent', 'telemetry.batch_failed',
  'telemetry.item_rejected', 'telemetry.unexpected_response',
  'telemetry.drain_failed',
  'custom',
]);
export type LogEvent = z.infer<typeof LogEventSchema>;

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  event: LogEvent;
  service: string;
  message?: string;
  metadata?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
}

export const LoggerConfigSchema = z.object({
  serviceName: z.string().default('span-telemetry'),
  minLevel: LogLevelSchema.default('info'),
  redactFields: z.array(z.string()).default(['apiKey', 'x-honeycomb-team', 'password', 'secret', 'token', 'authorization']),
  output: z.enum(['console', 'callback']).default('console'),
  onLog: z.custom<(entry: LogEntry) => void>(value => typeof value === 'function').optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

export const LogEntryInputSchema = z.object({
  event: LogEventSchema,
  level: LogLevelSchema.optional(),
  message: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  error: z.object({ name: z.string(), message: z.string(), stack: z.string().optional() }).optional(),
});

export type LogEntryInput = z.infer<typeof LogEntryInputSchema>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function describeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) return { name: error.name, message: error.message, stack: error.stack };
  return { name: 'Error', message: String(error) };
}

export class TelemetryLogger {
  private readonly config: LoggerConfig;
  private logCount = 0;

  constructor(config: LoggerConfigInput = {}) {
    this.config = LoggerConfigSchema.parse(config);
  }

  private generateId(): string {
    return `log_${Date.now().toString(36)}_${(++this.logCount).toString(36).padStart(4, '0')}`;
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.config.redactFields.some(f => key.toLowerCase().includes(f.toLowerCase()))) result[key] = '[REDACTED]';
      else if (isPlainRecord(value)) result[key] = this.redact(value);
      else result[key] = value;
    }
    return result;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  log(input: LogEntryInput): LogEntry | null {
    const parsed = LogEntryInputSchema.parse(input);
    const level = parsed.level ?? 'info';
    if (!this.shouldLog(level)) return null;

    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: new Date().toISOString(),
      level,
      event: parsed.event,
      service: this.config.serviceName,
      ...(parsed.message !== undefined && { message: parsed.message }),
      ...(parsed.metadata && { metadata: this.redact(parsed.metadata) }),
      ...(parsed.error && { error: parsed.error }),
    };

    if (this.config.output === 'callback' && this.config.onLog) this.deliver(this.config.onLog, entry);
    else console.error(JSON.stringify(entry));

    return entry;
  }

  /** A sink that throws falls back to stderr; logging never raises. */
  private deliver(sink: (entry: LogEntry) => void, entry: LogEntry): void {
    try {
      sink(entry);
    } catch (error) {
      console.error(JSON.stringify({ ...entry, sinkError: describeError(error) }));
    }
  }

  debug(event: LogEvent, message: string, metadata?: Record<string, unknown>) {
    return this.log({ event, level: 'debug', message, metadata });
  }

  info(event: LogEvent, message: string, metadata?: Record<string, unknown>) {
    return this.log({ event, level: 'info', message, metadata });
  }

  warn(event: LogEvent, message: string, metadata?: Record<string, unknown>) {
    return this.log({ event, level: 'warn', message, metadata });
  }

  error(event: LogEvent, message: string, error?: unknown, metadata?: Record<string, unknown>) {
    return this.log({
      event, level: 'error', message, metadata,
      error: error === undefined ? undefined : describeError(error),
    });
  }

  child(bindings: Record<string, unknown>) {
    const parent = this;
    return {
      info: (message: string, metadata?: Record<string, unknown>) => parent.info('custom', message, { ...bindings, ...metadata }),
      warn: (message: string, metadata?: Record<string, unknown>) => parent.warn('custom', message, { ...bindings, ...metadata }),
    };
  }

  getStats() {
    return { logCount: this.logCount, serviceName: this.config.serviceName, minLevel: this.config.minLevel };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let defaultLogger: TelemetryLogger | null = null;
export function getDefaultLogger(): TelemetryLogger { return defaultLogger || (defaultLogger = new TelemetryLogger()); }
export function configureDefaultLogger(config: LoggerConfigInput): void { defaultLogger = new TelemetryLogger(config); }
