import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  encodeDatum,
  honeycombExporter,
  HoneycombForwarder,
  HONEYCOMB_TEAM_VARIABLE,
} from '../../src/exporters/honeycomb.js';
import { TelemetryConfigError } from '../../src/exporters/exporter.js';
import { TelemetryLogger, type LogEntry } from '../../src/logging/logger.js';
import { ConfigSurface, type ProgramParameters } from '../../src/runtime/config.js';
import { closeDatum, emptyDatum, MetadataContainer, type Datum } from '../../src/telemetry/datum.js';

const START = 1655736683544826062n;

function span(overrides: Partial<Datum> = {}): Datum {
  return closeDatum(
    { ...emptyDatum(), name: 'checkout', spanId: 's1', trace: { traceId: 't1' }, startTime: START, ...overrides },
    START + 1_500_000n
  );
}

function capture() {
  const entries: LogEntry[] = [];
  const logger = new TelemetryLogger({ output: 'callback', onLog: entry => { entries.push(entry); } });
  return { entries, logger };
}

describe('encodeDatum', () => {
  it('encodes a span with reserved fields', () => {
    const datum = span({
      parentSpanId: 'p1',
      serviceName: 'burger-service',
      metadata: new MetadataContainer([['user', 'alice']]),
    });

    expect(encodeDatum(datum)).toEqual({
      time: '2022-06-20T14:51:23.544826062Z',
      data: {
        user: 'alice',
        name: 'checkout',
        'trace.span_id': 's1',
        'trace.parent_id': 'p1',
        'trace.trace_id': 't1',
        service_name: 'burger-service',
        duration_ms: 1.5,
      },
    });
  });

  it('lets reserved fields win over user metadata', () => {
    const datum = span({
      serviceName: 'real-service',
      metadata: new MetadataContainer([
        ['name', 'user-name'],
        ['trace.span_id', 'spoofed'],
        ['service_name', 'user-service'],
        ['duration_ms', 'slow'],
      ]),
    });

    const { data } = encodeDatum(datum);
    expect(data.name).toBe('checkout');
    expect(data['trace.span_id']).toBe('s1');
    expect(data.service_name).toBe('real-service');
    expect(data.duration_ms).toBe(1.5);
  });

  it('marks trace events without a span id as span events', () => {
    const event: Datum = { ...emptyDatum(), name: 'cache.miss', trace: { traceId: 't1' }, startTime: START };
    const { data } = encodeDatum(event);

    expect(data['meta.annotation_type']).toBe('span_event');
    expect('trace.span_id' in data).toBe(false);
    expect('duration_ms' in data).toBe(false);
    expect(data['trace.trace_id']).toBe('t1');
  });

  it('omits the span event marker when the span id is present', () => {
    const { data } = encodeDatum(span());
    expect(data['trace.span_id']).toBe('s1');
    expect('meta.annotation_type' in data).toBe(false);
  });

  it('adds no trace fields for a datum outside any trace', () => {
    const loose: Datum = { ...emptyDatum(), name: 'startup', startTime: START };
    expect(encodeDatum(loose).data).toEqual({ name: 'startup' });
  });
});

describe('HoneycombForwarder', () => {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('[]', { status: 200 }));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('posts the encoded batch to the dataset endpoint', async () => {
    fetchMock.mockResolvedValueOnce(new Response('[{"status":202},{"status":202}]', { status: 200 }));
    const { entries, logger } = capture();
    const batch = [span({ name: 'one', spanId: 'a' }), span({ name: 'two', spanId: 'b' })];

    await new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward(batch);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.honeycomb.io/1/batch/test-dataset');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'X-Honeycomb-Team': 'test-key', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual(batch.map(encodeDatum));
    expect(entries).toEqual([]);
  });

  it('logs only the items that were not accepted', async () => {
    fetchMock.mockResolvedValueOnce(new Response('[{"status":202},{"status":500},{"status":202}]', { status: 200 }));
    const { entries, logger } = capture();
    const forwarder = new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger);

    await expect(forwarder.forward([span(), span(), span()])).resolves.toBeUndefined();

    expect(entries).toHaveLength(1);
    expect(entries[0].event).toBe('telemetry.item_rejected');
    expect(entries[0].metadata).toEqual({ dataset: 'test-dataset', index: 1, item: '{"status":500}' });
  });

  it('resolves when the log sink returns a value or throws', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const returning = new TelemetryLogger({ output: 'callback', onLog: entry => entries.push(entry) });
    const throwing = new TelemetryLogger({ output: 'callback', onLog: () => { throw new Error('log sink down'); } });
    fetchMock.mockImplementation(async () => new Response('[{"status":500}]', { status: 200 }));

    await expect(new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, returning).forward([span()])).resolves.toBeUndefined();
    await expect(new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, throwing).forward([span()])).resolves.toBeUndefined();

    expect(entries.map(e => e.event)).toEqual(['telemetry.item_rejected']);
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it('accepts only exactly {"status":202}', async () => {
    fetchMock.mockResolvedValueOnce(new Response('[{"status":202,"error":"x"},"ok",{"status":202}]', { status: 200 }));
    const { entries, logger } = capture();

    await new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward([span(), span(), span()]);

    expect(entries.map(e => e.metadata?.index)).toEqual([0, 1]);
  });

  it('logs a failed delivery on a non-200 status and returns normally', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Service Unavailable', { status: 503, statusText: 'Service Unavailable' }));
    const { entries, logger } = capture();

    await expect(
      new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward([span()])
    ).resolves.toBeUndefined();

    expect(entries).toHaveLength(1);
    expect(entries[0].event).toBe('telemetry.batch_failed');
    expect(entries[0].level).toBe('error');
    expect(entries[0].metadata).toEqual({
      dataset: 'test-dataset',
      count: 1,
      status: 503,
      statusText: 'Service Unavailable',
      body: 'Service Unavailable',
    });
  });

  it('logs an unexpected 200 body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"unknown"}', { status: 200 }));
    const { entries, logger } = capture();

    await new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward([span()]);

    expect(entries.map(e => e.event)).toEqual(['telemetry.unexpected_response']);
    expect(entries[0].metadata?.body).toBe('{"error":"unknown"}');
  });

  it('logs network failures instead of throwing', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const { entries, logger } = capture();

    await expect(
      new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward([span()])
    ).resolves.toBeUndefined();

    expect(entries).toHaveLength(1);
    expect(entries[0].event).toBe('telemetry.batch_failed');
    expect(entries[0].error?.message).toBe('fetch failed');
  });

  it('sends nothing for an empty batch', async () => {
    const { logger } = capture();
    await new HoneycombForwarder({ apiKey: 'test-key', dataset: 'test-dataset' }, logger).forward([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('escapes the dataset and honours a base URL override', () => {
    const { logger } = capture();
    const forwarder = new HoneycombForwarder(
      { apiKey: 'test-key', dataset: 'my dataset', baseUrl: 'http://localhost:8080/' },
      logger
    );
    expect(forwarder.endpoint).toBe('http://localhost:8080/1/batch/my%20dataset');
  });

  it('logs the API key only in redacted form', () => {
    const { entries, logger } = capture();
    logger.info('custom', 'config', { 'X-Honeycomb-Team': 'test-key' });
    expect(entries[0].metadata).toEqual({ 'X-Honeycomb-Team': '[REDACTED]' });
  });
});

describe('honeycombExporter', () => {
  function parameters(environment: Record<string, string>, options: ProgramParameters['options']): ProgramParameters {
    return { environment, options };
  }

  function setupError(params: ProgramParameters): TelemetryConfigError {
    const { logger } = capture();
    try {
      honeycombExporter.setupAction({ parameters: params, logger });
    } catch (error) {
      if (error instanceof TelemetryConfigError) return error;
      throw error;
    }
    throw new Error('setup did not fail');
  }

  it('declares its variable and option', () => {
    const config = honeycombExporter.setupConfig(new ConfigSurface());
    expect(honeycombExporter.codename).toBe('honeycomb');
    expect(config.listVariables().map(v => v.name)).toEqual([HONEYCOMB_TEAM_VARIABLE]);
    expect(config.listOptions().map(o => o.flags)).toEqual(['--dataset [name]']);
  });

  it('requires the API key', () => {
    const error = setupError(parameters({}, { dataset: 'prod' }));
    expect(error.code).toBe('MISSING_API_KEY');
    expect(error.message).toBe('error: Need to supply an API key in the HONEYCOMB_TEAM environment variable.');
  });

  it('rejects an empty API key', () => {
    expect(setupError(parameters({ HONEYCOMB_TEAM: '' }, { dataset: 'prod' })).code).toBe('EMPTY_API_KEY');
  });

  it('requires the dataset', () => {
    const error = setupError(parameters({ HONEYCOMB_TEAM: 'test-key' }, {}));
    expect(error.code).toBe('MISSING_DATASET');
    expect(error.message).toBe('error: Need to specify the dataset that metrics will be written to via --dataset.');
  });

  it('rejects a dataset option given without a value', () => {
    expect(setupError(parameters({ HONEYCOMB_TEAM: 'test-key' }, { dataset: true })).code).toBe('EMPTY_DATASET');
    expect(setupError(parameters({ HONEYCOMB_TEAM: 'test-key' }, { dataset: '' })).code).toBe('EMPTY_DATASET');
  });

  it('builds a forwarder when configured', () => {
    const { logger } = capture();
    const forwarder = honeycombExporter.setupAction({
      parameters: parameters({ HONEYCOMB_TEAM: 'test-key' }, { dataset: 'prod-restaurant-001' }),
      logger,
    });
    expect(forwarder).toBeInstanceOf(HoneycombForwarder);
    expect(forwarder instanceof HoneycombForwarder && forwarder.endpoint).toBe('https://api.honeycomb.io/1/batch/prod-restaurant-001');
  });
});
