/**
 * Monologue Ticker
 *
 * Watchdog for the monologue cycle. The cycle normally sustains itself
 * through follow-up ticks; when a handler gives up on a cycle nothing is
 * scheduled, so this producer enqueues a fresh tick once the cycle has been
 * idle for `idleRestartMs`.
 */

import { createEvent, type StreamEventKind } from '../../../domain/stream/events.js';
import type { IEventQueue } from '../event-queue.js';

export interface TickActivitySource {
  getLastDispatchAt(kind: StreamEventKind): number | undefined;
  hasOutstanding(kind: StreamEventKind): boolean;
}

export interface MonologueTickerOptions {
  queue: IEventQueue;
  activity: TickActivitySource;
  idleRestartMs: number;
  checkIntervalMs?: number;
  now?: () => number;
  logger?: Pick<Console, 'info'>;
}

export class MonologueTicker {
  private timer: NodeJS.Timeout | null = null;
  private startedAt = 0;
  private restarts = 0;
  private now: () => number;
  private logger: Pick<Console, 'info'>;

  constructor(private options: MonologueTickerOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
    this.startedAt = this.now();
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.startedAt = this.now();
    const interval = this.options.checkIntervalMs ?? Math.max(1000, Math.floor(this.options.idleRestartMs / 4));
    this.timer = setInterval(() => {
      this.check();
    }, interval);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Enqueue a watchdog tick if the cycle has stalled. Returns true when a
   * tick was enqueued.
   */
  check(): boolean {
    const { activity, queue, idleRestartMs } = this.options;
    if (activity.hasOutstanding('monologue_tick')) {
      return false;
    }

    const lastActivity = activity.getLastDispatchAt('monologue_tick') ?? this.startedAt;
    const idleFor = this.now() - lastActivity;
    if (idleFor < idleRestartMs) {
      return false;
    }

    const accepted = queue.enqueue(createEvent('monologue_tick', { reason: 'watchdog' }));
    if (accepted) {
      this.restarts++;
      this.logger.info('[MonologueTicker] Monologue cycle idle, restarting', { idleFor });
    }
    return accepted;
  }

  getRestartCount(): number {
    return this.restarts;
  }
}
