/**
 * Event Queue
 *
 * Unbounded FIFO between producers (timers, chat poller, signal handlers)
 * and the single dispatch loop. Producers never block; the consumer waits
 * up to a timeout and receives EMPTY when nothing arrived.
 */

import type { StreamEvent } from '../../domain/stream/events.js';

export const EMPTY: unique symbol = Symbol('event-queue.empty');

export type DequeueResult = StreamEvent | typeof EMPTY;

type Waiter = {
  resolve: (result: DequeueResult) => void;
  timer: NodeJS.Timeout | null;
};

export interface IEventQueue {
  enqueue(event: StreamEvent): boolean;
  dequeue(timeoutMs: number): Promise<DequeueResult>;
  size(): number;
}

export interface EventQueueOptions {
  logger?: Pick<Console, 'warn'>;
}

export class EventQueue implements IEventQueue {
  private items: StreamEvent[] = [];
  private head = 0;
  private waiters: Waiter[] = [];
  private closed = false;
  private seen = new Set<string>();
  private logger: Pick<Console, 'warn'>;

  constructor(options: EventQueueOptions = {}) {
    this.logger = options.logger ?? console;
  }

  /**
   * Append an event. Returns false when the queue is closed or the same
   * event instance was already accepted.
   */
  enqueue(event: StreamEvent): boolean {
    if (this.closed) {
      this.logger.warn('[EventQueue] Dropping event after close', { kind: event.kind, id: event.id });
      return false;
    }

    if (this.seen.has(event.id)) {
      this.logger.warn('[EventQueue] Ignoring duplicate event', { kind: event.kind, id: event.id });
      return false;
    }
    this.seen.add(event.id);

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      this.seen.delete(event.id);
      waiter.resolve(event);
      return true;
    }

    this.items.push(event);
    return true;
  }

  /**
   * Wait up to `timeoutMs` for the oldest event.
   */
  dequeue(timeoutMs: number): Promise<DequeueResult> {
    const next = this.shift();
    if (next) {
      return Promise.resolve(next);
    }

    if (this.closed || timeoutMs <= 0) {
      return Promise.resolve(EMPTY);
    }

    return new Promise<DequeueResult>((resolve) => {
      const waiter: Waiter = { resolve, timer: null };
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(EMPTY);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.items.length - this.head;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Whether an event of the given kind is waiting to be dispatched.
   */
  hasPending(kind: StreamEvent['kind']): boolean {
    for (let i = this.head; i < this.items.length; i++) {
      if (this.items[i].kind === kind) {
        return true;
      }
    }
    return false;
  }

  /**
   * Remove and return everything still queued.
   */
  drain(): StreamEvent[] {
    const remaining = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    for (const event of remaining) {
      this.seen.delete(event.id);
    }
    return remaining;
  }

  /**
   * Reject further events and release any waiting consumer.
   */
  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(EMPTY);
    }
  }

  private shift(): StreamEvent | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const event = this.items[this.head];
    this.head++;
    this.seen.delete(event.id);

    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return event;
  }
}
