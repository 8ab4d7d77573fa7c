/**
 * Honeycomb Exporter - batched delivery to the Honeycomb events API
 *
 * Enable with
 *
 * ```
 * $ export HONEYCOMB_TEAM="<api key>"
 * $ burger-service --telemetry=honeycomb --dataset=prod-restaurant-001
 * ```
 *
 * Spans are encoded per https://docs.honeycomb.io/getting-data-in/tracing/send-trace-data/
 * and posted to the batch endpoint. Delivery is best effort: no retries.
 */

import { z } from 'zod';
import type { TelemetryLogger } from '../logging/logger.js';
import type { ConfigSurface } from '../runtime/config.js';
import { formatTimestamp } from '../telemetry/clock.js';
import type { Datum, MetricScalar } from '../telemetry/datum.js';
import { TelemetryConfigError, type Exporter, type Forwarder, type SetupContext } from './exporter.js';

export const HONEYCOMB_TEAM_VARIABLE = 'HONEYCOMB_TEAM';
export const DATASET_OPTION = 'dataset';

export const HoneycombConfigSchema = z.object({
  apiKey: z.string().min(1),
  dataset: z.string().min(1),
  baseUrl: z.string().url().default('https://api.honeycomb.io'),
  timeoutMs: z.number().int().positive().default(10000),
});

export type HoneycombConfig = z.infer<typeof HoneycombConfigSchema>;
export type HoneycombConfigInput = z.input<typeof HoneycombConfigSchema>;

export interface HoneycombEvent {
  time: string;
  data: Record<string, MetricScalar>;
}

const AcceptedSchema = z.object({ status: z.literal(202) }).strict();
const BatchResponseSchema = z.array(z.unknown());

const MAX_LOGGED_BODY = 1024;

/**
 * Reserved fields are written after user metadata, in this order, so they
 * win over any user key of the same name.
 */
export function encodeDatum(datum: Datum): HoneycombEvent {
  const data = new Map<string, MetricScalar>(datum.metadata.entries());
  const traceId = datum.trace?.traceId;

  data.set('name', datum.name);

  if (datum.spanId !== undefined) data.set('trace.span_id', datum.spanId);
  else if (traceId !== undefined) data.set('meta.annotation_type', 'span_event');

  if (datum.parentSpanId !== undefined) data.set('trace.parent_id', datum.parentSpanId);
  if (traceId !== undefined) data.set('trace.trace_id', traceId);
  if (datum.serviceName !== undefined) data.set('service_name', datum.serviceName);
  if (datum.duration !== undefined) data.set('duration_ms', Number(datum.duration) / 1e6);

  return {
    time: formatTimestamp(datum.startTime),
    data: Object.fromEntries(data),
  };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

export class HoneycombForwarder implements Forwarder {
  private readonly config: HoneycombConfig;

  constructor(config: HoneycombConfigInput, private readonly logger: TelemetryLogger) {
    this.config = HoneycombConfigSchema.parse(config);
  }

  get endpoint(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/1/batch/${encodeURIComponent(this.config.dataset)}`;
  }

  async forward(datums: readonly Datum[]): Promise<void> {
    if (datums.length === 0) return;
    const events = datums.map(encodeDatum);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'X-Honeycomb-Team': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(events),
        signal: controller.signal,
      });
      body = await readBody(response);
    } catch (error) {
      this.logger.error('telemetry.batch_failed', 'Failed to post to Honeycomb', error, {
        dataset: this.config.dataset, count: events.length,
      });
      return;
    } finally {
      clearTimeout(timeout);
    }

    if (response.status !== 200) {
      this.logger.error('telemetry.batch_failed', 'Failed to post to Honeycomb', undefined, {
        dataset: this.config.dataset,
        count: events.length,
        status: response.status,
        statusText: response.statusText,
        body: body.slice(0, MAX_LOGGED_BODY),
      });
      return;
    }

    this.handleAcknowledgements(body, events.length);
  }

  /**
   * A 200 response carries one `{"status":202}` per submitted event, in
   * submission order. Anything else is logged item by item.
   */
  private handleAcknowledgements(body: string, count: number): void {
    const parsed = BatchResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      this.logger.warn('telemetry.unexpected_response', 'Unexpected response from Honeycomb', {
        dataset: this.config.dataset, body: body.slice(0, MAX_LOGGED_BODY),
      });
      return;
    }

    let rejected = 0;
    parsed.data.forEach((item, index) => {
      if (AcceptedSchema.safeParse(item).success) return;
      rejected++;
      this.logger.warn('telemetry.item_rejected', 'Honeycomb did not accept event', {
        dataset: this.config.dataset, index, item: JSON.stringify(item),
      });
    });

    this.logger.debug('telemetry.batch_sent', 'Posted batch to Honeycomb', {
      dataset: this.config.dataset, count, accepted: parsed.data.length - rejected, rejected,
    });
  }
}

function setupHoneycombConfig(config: ConfigSurface): ConfigSurface {
  return config
    .appendVariable(HONEYCOMB_TEAM_VARIABLE, 'The API key used to permit writes to Honeycomb.')
    .appendOption(
      `--${DATASET_OPTION} [name]`,
      "The name of the dataset within your Honeycomb account that this program's telemetry will be written to."
    );
}

function setupHoneycombAction({ parameters, logger }: SetupContext): Forwarder {
  const apiKey = parameters.environment[HONEYCOMB_TEAM_VARIABLE];
  if (apiKey === undefined) {
    throw new TelemetryConfigError(
      `error: Need to supply an API key in the ${HONEYCOMB_TEAM_VARIABLE} environment variable.`,
      'MISSING_API_KEY'
    );
  }
  if (apiKey.trim() === '') {
    throw new TelemetryConfigError(
      `error: Need to actually supply a value in ${HONEYCOMB_TEAM_VARIABLE} environment variable.`,
      'EMPTY_API_KEY'
    );
  }

  const dataset = parameters.options[DATASET_OPTION];
  if (dataset === undefined) {
    throw new TelemetryConfigError(
      `error: Need to specify the dataset that metrics will be written to via --${DATASET_OPTION}.`,
      'MISSING_DATASET'
    );
  }
  if (typeof dataset !== 'string' || dataset.trim() === '') {
    throw new TelemetryConfigError(
      `error: Need to actually supply a value to the --${DATASET_OPTION} option.`,
      'EMPTY_DATASET'
    );
  }

  return new HoneycombForwarder({ apiKey, dataset }, logger);
}

export const honeycombExporter: Exporter = {
  codename: 'honeycomb',
  setupConfig: setupHoneycombConfig,
  setupAction: setupHoneycombAction,
};
