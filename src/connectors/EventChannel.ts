/**
 * Bounded single-consumer channel of typed exchange events
 */

import { ExchangeEvent } from '../models/ExchangeEvent';

export interface EventChannelOptions {
  capacity: number;
  /** Called once per overflow episode */
  onOverflow?: (dropped: ExchangeEvent) => void;
}

/**
 * Events are delivered in push order. When the buffer is full the newest event is dropped
 * and the consumer receives a resync_required event once the buffer drains.
 */
export class EventChannel implements AsyncIterable<ExchangeEvent> {
  private buffer: ExchangeEvent[] = [];
  private waiters: Array<(result: IteratorResult<ExchangeEvent>) => void> = [];
  private overflowed = false;
  private closed = false;
  private droppedCount = 0;
  private readonly capacity: number;
  private readonly onOverflow?: (dropped: ExchangeEvent) => void;

  constructor(options: EventChannelOptions) {
    if (options.capacity < 1) {
      throw new Error('Event channel capacity must be at least 1');
    }
    this.capacity = options.capacity;
    this.onOverflow = options.onOverflow;
  }

  /**
   * Returns false if the event was dropped
   */
  push(event: ExchangeEvent): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      if (!this.overflowed) {
        this.overflowed = true;
        this.onOverflow?.(event);
      }
      return false;
    }

    this.buffer.push(event);
    return true;
  }

  /**
   * Resolves with the next event, or done once closed and drained
   */
  next(): Promise<IteratorResult<ExchangeEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }

    if (this.overflowed) {
      this.overflowed = false;
      return Promise.resolve({
        value: { type: 'resync_required', reason: 'channel_overflow', timestamp: new Date() },
        done: false
      });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<ExchangeEvent> {
    return {
      next: () => this.next(),
      return: async () => ({ value: undefined, done: true })
    };
  }
}
