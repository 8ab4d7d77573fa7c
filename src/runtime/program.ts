/**
 * Program runtime: wires configuration, the selected exporter, the span
 * queue and its drain loop around the application's main action.
 */

import { CommanderError } from 'commander';
import { z } from 'zod';
import { TelemetryConfigError, type Exporter, type Forwarder } from '../exporters/exporter.js';
import { getDefaultLogger, type TelemetryLogger } from '../logging/logger.js';
import { createContext, type Action } from '../telemetry/context.js';
import type { Clock } from '../telemetry/clock.js';
import { SpanQueue } from '../telemetry/queue.js';
import { ConfigSurface, type ProgramParameters } from './config.js';
import { SpanDrain } from './drain.js';
import { terminate } from './terminate.js';

export const TELEMETRY_OPTION = 'telemetry';

export const ProgramOptionsSchema = z.object({
  programName: z.string().min(1).default('program'),
  serviceName: z.string().min(1).optional(),
  flushIntervalMs: z.number().int().positive().default(1000),
  maxBatchSize: z.number().int().positive().default(100),
});

export type ProgramOptionsInput = z.input<typeof ProgramOptionsSchema>;

export interface ExecuteOptions extends ProgramOptionsInput {
  exporters?: readonly Exporter[];
  /** User arguments; defaults to `process.argv.slice(2)`. */
  argv?: readonly string[];
  env?: Readonly<Record<string, string | undefined>>;
  logger?: TelemetryLogger;
  clock?: Clock;
}

export function configure(exporters: readonly Exporter[], programName?: string): ConfigSurface {
  const codenames = exporters.map(e => e.codename).join(', ');
  const config = new ConfigSurface(programName).appendOption(
    `--${TELEMETRY_OPTION} [exporter]`,
    `Turn on telemetry. Tracing data and metrics from events will be forwarded via the specified exporter. Valid values are ${codenames || '(none)'}.`
  );
  return exporters.reduce((acc, exporter) => exporter.setupConfig(acc), config);
}

/**
 * Select the exporter named by `--telemetry` and run its setup. Returns
 * undefined when telemetry was not requested.
 *
 * Misconfiguration terminates the process with the reserved exit status
 * before any span can be recorded.
 */
export function initializeTelemetry(
  exporters: readonly Exporter[],
  parameters: ProgramParameters,
  logger: TelemetryLogger
): Forwarder | undefined {
  const selected = parameters.options[TELEMETRY_OPTION];
  if (selected === undefined) return undefined;

  try {
    const exporter = exporters.find(e => e.codename === selected);
    if (typeof selected !== 'string' || !exporter) {
      throw new TelemetryConfigError(
        `error: Unknown telemetry exporter "${String(selected)}"; expected one of: ${exporters.map(e => e.codename).join(', ')}.`,
        'UNKNOWN_EXPORTER',
        { selected }
      );
    }

    const forwarder = exporter.setupAction({ parameters, logger });
    logger.debug('telemetry.exporter_selected', `Telemetry forwarded via ${exporter.codename}`, { exporter: exporter.codename });
    return forwarder;
  } catch (error) {
    if (error instanceof TelemetryConfigError) terminate(error.message);
    throw error;
  }
}

function resolveParameters(config: ConfigSurface, argv: readonly string[], env: Readonly<Record<string, string | undefined>>): ProgramParameters {
  try {
    return config.resolve(argv, env);
  } catch (error) {
    if (error instanceof CommanderError) terminate(`error: ${error.message.replace(/^error: /, '')}`);
    throw error;
  }
}

/**
 * Run `main` with a root telemetry context. The queue is fully drained to
 * the forwarder before this returns or rethrows.
 *
 * @example
 * ```typescript
 * await execute(
 *   ctx => beginTrace(ctx, ctx => encloseSpan(ctx, 'handle', async ctx => {
 *     telemetry(ctx, [metric('user.id', userId)]);
 *     return handle(userId);
 *   })),
 *   { exporters: [honeycombExporter, consoleExporter], serviceName: 'burger-service' }
 * );
 * ```
 */
export async function execute<T>(main: Action<T>, options: ExecuteOptions = {}): Promise<T> {
  const { exporters = [], argv = process.argv.slice(2), env = process.env, logger = getDefaultLogger(), clock } = options;
  const settings = ProgramOptionsSchema.parse({
    programName: options.programName,
    serviceName: options.serviceName,
    flushIntervalMs: options.flushIntervalMs,
    maxBatchSize: options.maxBatchSize,
  });

  const config = configure(exporters, settings.programName);
  const parameters = resolveParameters(config, argv, env);
  const forwarder = initializeTelemetry(exporters, parameters, logger);

  const queue = new SpanQueue();
  const drain = new SpanDrain(queue, forwarder, settings, logger);
  const context = createContext(queue, { serviceName: settings.serviceName, clock });

  drain.start();
  try {
    return await main(context);
  } finally {
    await drain.stop();
  }
}
