/**
 * FIFO of closed spans waiting to be forwarded.
 *
 * Producers are any number of concurrent tasks; the consumer is the single
 * drain loop. Each call runs to completion on the event loop, so no locking
 * is needed.
 */

import type { Datum } from './datum.js';

export class SpanQueue {
  private items: Datum[] = [];

  enqueue(datum: Datum): void {
    this.items.push(datum);
  }

  /**
   * Remove and return up to `max` spans, oldest first.
   */
  drain(max: number = Number.POSITIVE_INFINITY): Datum[] {
    if (max >= this.items.length) {
      const all = this.items;
      this.items = [];
      return all;
    }
    return this.items.splice(0, Math.max(0, max));
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}
