/**
 * The single consumer of the span queue: periodically, and once more at
 * shutdown, hands batches to the active forwarder.
 */

import { z } from 'zod';
import type { Forwarder } from '../exporters/exporter.js';
import type { TelemetryLogger } from '../logging/logger.js';
import type { SpanQueue } from '../telemetry/queue.js';

export const DrainOptionsSchema = z.object({
  flushIntervalMs: z.number().int().positive(),
  maxBatchSize: z.number().int().positive(),
});

export type DrainOptions = z.infer<typeof DrainOptionsSchema>;

export class SpanDrain {
  private pending: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private forwarded = 0;
  private discarded = 0;
  private readonly options: DrainOptions;

  constructor(
    private readonly queue: SpanQueue,
    private readonly forwarder: Forwarder | undefined,
    options: DrainOptions,
    private readonly logger: TelemetryLogger
  ) {
    this.options = DrainOptionsSchema.parse(options);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.flush(), this.options.flushIntervalMs);
    // the drain loop alone must not keep the process alive
    this.timer.unref();
  }

  /**
   * Drain everything currently queued. Flushes are chained so the forwarder
   * never sees overlapping calls. The returned promise never rejects, and a
   * failed flush does not hold up the next one.
   */
  flush(): Promise<void> {
    this.pending = this.pending
      .then(() => this.drainAll())
      .catch(error => {
        this.logger.error('telemetry.drain_failed', 'Flush failed', error, { queued: this.queue.size });
      });
    return this.pending;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
  }

  getStats() {
    return { forwarded: this.forwarded, discarded: this.discarded, queued: this.queue.size };
  }

  private async drainAll(): Promise<void> {
    while (!this.queue.isEmpty()) {
      const batch = this.queue.drain(this.options.maxBatchSize);
      if (!this.forwarder) {
        this.discarded += batch.length;
        continue;
      }
      try {
        await this.forwarder.forward(batch);
        this.forwarded += batch.length;
      } catch (error) {
        this.logger.error('telemetry.drain_failed', 'Forwarder raised while delivering batch', error, { count: batch.length });
      }
    }
  }
}
