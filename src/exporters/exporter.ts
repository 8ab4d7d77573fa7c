/**
 * Exporters - pluggable telemetry backends
 *
 * An Exporter is selected by codename. It declares the options and
 * environment variables it needs, then builds its Forwarder once at startup.
 */

import type { TelemetryLogger } from '../logging/logger.js';
import type { ConfigSurface, ProgramParameters } from '../runtime/config.js';
import type { Datum } from '../telemetry/datum.js';

export interface Forwarder {
  /**
   * Deliver a batch of closed spans. Invoked once per batch, never
   * concurrently. Delivery problems are logged rather than thrown.
   */
  forward(datums: readonly Datum[]): Promise<void>;
}

export interface SetupContext {
  parameters: ProgramParameters;
  logger: TelemetryLogger;
}

export interface Exporter {
  readonly codename: string;
  readonly setupConfig: (config: ConfigSurface) => ConfigSurface;
  /**
   * Validate configuration eagerly.
   *
   * @throws TelemetryConfigError when a required setting is absent or empty
   */
  readonly setupAction: (setup: SetupContext) => Forwarder;
}

export type TelemetryConfigErrorCode =
  | 'MISSING_API_KEY'
  | 'EMPTY_API_KEY'
  | 'MISSING_DATASET'
  | 'EMPTY_DATASET'
  | 'UNKNOWN_EXPORTER';

export class TelemetryConfigError extends Error {
  constructor(
    message: string,
    public readonly code: TelemetryConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TelemetryConfigError';
  }
}
