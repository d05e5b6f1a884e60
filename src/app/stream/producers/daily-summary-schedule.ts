/**
 * Daily Summary Schedule
 * Enqueues prepare_daily_summary at each fire time of a cron expression.
 */

import { createEvent } from '../../../domain/stream/events.js';
import { ValidationError } from '../../../domain/stream/errors.js';
import { checkCronExpression, nextCronFireMs, toLocalDate } from '../../../infra/scheduler/cron-adapter.js';
import type { IEventQueue } from '../event-queue.js';

/** setTimeout treats longer delays as 1 ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface DailySummaryScheduleOptions {
  queue: IEventQueue;
  cron: string;
  timezone?: string;
  now?: () => number;
  logger?: Pick<Console, 'info'>;
}

export class DailySummarySchedule {
  private timer: NodeJS.Timeout | null = null;
  private nextFireAt: number | null = null;
  private now: () => number;
  private logger: Pick<Console, 'info'>;

  constructor(private options: DailySummaryScheduleOptions) {
    const check = checkCronExpression(options.cron, options.timezone);
    if (!check.ok) {
      throw new ValidationError(check.error, [{ path: 'dailySummary.cron', message: check.error }]);
    }
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.arm();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextFireAt = null;
  }

  getNextFireAt(): number | null {
    return this.nextFireAt;
  }

  /**
   * Enqueue the summary for the day of `firedAt` in the schedule's zone.
   */
  fire(firedAt: number = this.now()): boolean {
    const { timezone } = this.options;
    const date = toLocalDate(firedAt, timezone);
    const payload = timezone ? { date, timezone } : { date };
    const accepted = this.options.queue.enqueue(createEvent('prepare_daily_summary', payload));
    this.logger.info('[DailySummarySchedule] Daily summary requested', { date, accepted });
    return accepted;
  }

  /**
   * Fire times further out than one timer can wait are reached in steps.
   */
  private arm(fireAt: number = nextCronFireMs(this.options.cron, this.now(), this.options.timezone)): void {
    this.nextFireAt = fireAt;
    const delay = Math.min(Math.max(0, fireAt - this.now()), MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.now() < fireAt) {
        this.arm(fireAt);
        return;
      }
      this.fire(fireAt);
      this.arm();
    }, delay);
    this.timer.unref();
  }
}
