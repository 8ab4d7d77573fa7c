/**
 * Span and trace records.
 *
 * A Datum is open while `duration` is unset. Closing produces a frozen copy
 * that owns a snapshot of its metadata; that copy is what gets enqueued.
 */

export type MetricScalar = string | number | boolean;

export interface Trace {
  readonly traceId: string;
}

/**
 * Per-span metadata. Children are seeded with a snapshot of their parent's
 * container at the moment they open, after which the two never see each
 * other's writes.
 */
export class MetadataContainer {
  private readonly values: Map<string, MetricScalar>;

  constructor(seed?: Iterable<readonly [string, MetricScalar]>) {
    this.values = new Map(seed);
  }

  insert(key: string, value: MetricScalar): void {
    this.values.set(key, value);
  }

  get(key: string): MetricScalar | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): Array<[string, MetricScalar]> {
    return [...this.values];
  }

  snapshot(): MetadataContainer {
    return new MetadataContainer(this.values);
  }

  toRecord(): Record<string, MetricScalar> {
    return Object.fromEntries(this.values);
  }
}

export interface Datum {
  /** Unset for the synthetic root placeholder and for span events. */
  readonly spanId?: string;
  readonly name: string;
  /** Nanoseconds since epoch. */
  readonly startTime: bigint;
  /** Nanoseconds; set exactly once, on close. */
  readonly duration?: bigint;
  readonly trace?: Trace;
  readonly parentSpanId?: string;
  readonly serviceName?: string;
  readonly metadata: MetadataContainer;
}

export function emptyDatum(): Datum {
  return {
    name: '',
    startTime: 0n,
    metadata: new MetadataContainer(),
  };
}

export function isClosed(datum: Datum): boolean {
  return datum.duration !== undefined;
}

export function traceIdOf(datum: Datum): string | undefined {
  return datum.trace?.traceId;
}

export function closeDatum(datum: Datum, finish: bigint): Datum {
  return Object.freeze({
    ...datum,
    duration: finish - datum.startTime,
    metadata: datum.metadata.snapshot(),
  });
}
