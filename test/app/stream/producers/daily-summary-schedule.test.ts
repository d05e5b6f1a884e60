import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { EventQueue } from '../../../../src/app/stream/event-queue.js';
import { DailySummarySchedule } from '../../../../src/app/stream/producers/daily-summary-schedule.js';
import { ValidationError } from '../../../../src/domain/stream/errors.js';

const quiet = { info: () => undefined, warn: () => undefined };

describe('DailySummarySchedule', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('rejects an invalid cron expression up front', () => {
    expect(() => new DailySummarySchedule({ queue: new EventQueue({ logger: quiet }), cron: '0 23 * *' })).toThrow(
      ValidationError
    );
  });

  it('requests the summary for the day it fires on', () => {
    jest.useFakeTimers({ now: new Date(2026, 2, 10, 12, 0, 0) });
    const queue = new EventQueue({ logger: quiet });
    const schedule = new DailySummarySchedule({ queue, cron: '0 23 * * *', logger: quiet });

    schedule.start();
    expect(schedule.getNextFireAt()).toBe(new Date(2026, 2, 10, 23, 0, 0).getTime());

    jest.advanceTimersByTime(11 * 60 * 60 * 1000);

    const events = queue.drain();
    expect(events.map((event) => event.kind)).toEqual(['prepare_daily_summary']);
    expect(events[0].payload).toEqual({ date: '2026-03-10' });
    expect(schedule.getNextFireAt()).toBe(new Date(2026, 2, 11, 23, 0, 0).getTime());

    schedule.stop();
    expect(schedule.getNextFireAt()).toBeNull();
  });

  it('tags the summary with the date in the configured zone', () => {
    jest.useFakeTimers({ now: Date.UTC(2026, 2, 10, 12, 0, 0) });
    const queue = new EventQueue({ logger: quiet });
    const schedule = new DailySummarySchedule({ queue, cron: '0 8 * * *', timezone: 'Asia/Tokyo', logger: quiet });

    schedule.start();
    expect(schedule.getNextFireAt()).toBe(Date.UTC(2026, 2, 10, 23, 0, 0));
    jest.advanceTimersByTime(11 * 60 * 60 * 1000);

    const events = queue.drain();
    expect(events).toHaveLength(1);
    expect(events[0].payload).toEqual({ date: '2026-03-11', timezone: 'Asia/Tokyo' });
    schedule.stop();
  });

  it('waits out fire times beyond the longest timer delay without firing early', () => {
    jest.useFakeTimers({ now: new Date(2026, 1, 1, 0, 0, 0) });
    const queue = new EventQueue({ logger: quiet });
    const schedule = new DailySummarySchedule({ queue, cron: '0 0 1 1 *', logger: quiet });
    const fireAt = new Date(2027, 0, 1, 0, 0, 0).getTime();

    schedule.start();
    expect(schedule.getNextFireAt()).toBe(fireAt);

    jest.advanceTimersByTime(2_147_483_647);
    expect(queue.size()).toBe(0);
    expect(schedule.getNextFireAt()).toBe(fireAt);

    jest.advanceTimersByTime(fireAt - Date.now());
    const events = queue.drain();
    expect(events).toHaveLength(1);
    expect(events[0].payload).toEqual({ date: '2027-01-01' });
    expect(schedule.getNextFireAt()).toBe(new Date(2028, 0, 1, 0, 0, 0).getTime());
    schedule.stop();
  });
});
