import type { MessageEnvelope } from '@tether/protocol';
import { parseOptions, QueueOptionsSchema, type QueueOptions } from '../config/options';

export interface QueuedMessage {
  readonly envelope: MessageEnvelope;
  /** Encoded once at `send()` so encode errors surface at the call site. */
  readonly frame: string;
  readonly enqueuedAt: Date;
}

export type DrainResult =
  | { written: number; complete: true }
  /** A write threw; the failed entry and the rest stay queued. */
  | { written: number; complete: false; error: unknown };

/**
 * Bounded FIFO for messages sent while the connection is down. When full, the
 * oldest entry is evicted to make room.
 */
export class OutboundQueue {
  private items: QueuedMessage[] = [];
  readonly capacity: number;

  constructor(
    options: QueueOptions = {},
    private readonly onOverflow?: (dropped: QueuedMessage) => void
  ) {
    this.capacity = parseOptions(QueueOptionsSchema, options, 'queue').capacity;
  }

  enqueue(envelope: MessageEnvelope, frame: string): void {
    if (this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      if (dropped && this.onOverflow) this.onOverflow(dropped);
    }
    this.items.push(Object.freeze({ envelope, frame, enqueuedAt: new Date() }));
  }

  /** Writes entries oldest first, stopping at the first write that throws. */
  drain(write: (message: QueuedMessage) => void): DrainResult {
    let written = 0;
    while (this.items.length > 0) {
      const head = this.items[0];
      try {
        write(head);
      } catch (error) {
        return { written, complete: false, error };
      }
      this.items.shift();
      written++;
    }
    return { written, complete: true };
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly QueuedMessage[] {
    return [...this.items];
  }
}
