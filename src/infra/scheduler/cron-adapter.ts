import { CronExpressionParser } from 'cron-parser';

export type CronCheck = { ok: true } | { ok: false; error: string };

const CRON_FIELDS = 5;

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Five-field cron (minute hour day-of-month month day-of-week), optional IANA zone.
 */
export function checkCronExpression(expression: string, tz?: string): CronCheck {
  const trimmed = expression.trim();
  if (!trimmed) {
    return { ok: false, error: 'Cron expression is empty' };
  }

  const fieldCount = trimmed.split(/\s+/).length;
  if (fieldCount !== CRON_FIELDS) {
    return { ok: false, error: `Cron expression needs ${CRON_FIELDS} fields, got ${fieldCount}` };
  }

  if (tz && !isKnownTimeZone(tz)) {
    return { ok: false, error: `Unknown timezone: ${tz}` };
  }

  try {
    CronExpressionParser.parse(trimmed, { currentDate: new Date(0), tz });
  } catch (error) {
    return { ok: false, error: `Invalid cron expression: ${error instanceof Error ? error.message : String(error)}` };
  }

  return { ok: true };
}

/**
 * First fire time strictly after `afterMs`.
 */
export function nextCronFireMs(expression: string, afterMs: number, tz?: string): number {
  const check = checkCronExpression(expression, tz);
  if (!check.ok) {
    throw new Error(check.error);
  }

  const interval = CronExpressionParser.parse(expression.trim(), {
    currentDate: new Date(afterMs + 1),
    tz,
  });
  return interval.next().getTime();
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function wallClockIn(timestampMs: number, timeZone?: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(new Date(timestampMs));
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);
  return {
    year: field('year'),
    month: field('month'),
    day: field('day'),
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
  };
}

function zoneOffsetMs(timestampMs: number, timeZone?: string): number {
  const wall = wallClockIn(timestampMs, timeZone);
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return wallAsUtc - Math.floor(timestampMs / 1000) * 1000;
}

function startOfDay(year: number, month: number, day: number, timeZone?: string): number {
  const midnightUtc = Date.UTC(year, month - 1, day);
  const firstGuess = midnightUtc - zoneOffsetMs(midnightUtc, timeZone);
  return midnightUtc - zoneOffsetMs(firstGuess, timeZone);
}

/**
 * Calendar date (YYYY-MM-DD) of a timestamp in `timeZone`, or the host zone
 * when none is given.
 */
export function toLocalDate(timestampMs: number, timeZone?: string): string {
  const { year, month, day } = wallClockIn(timestampMs, timeZone);
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Epoch range [start, end) of a calendar day in `timeZone`. Days that cross
 * a DST change are 23 or 25 hours long.
 */
export function calendarDayWindow(date: string, timeZone?: string): { start: number; end: number } {
  const match = CALENDAR_DATE.exec(date);
  if (!match) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return {
    start: startOfDay(year, month, day, timeZone),
    end: startOfDay(year, month, day + 1, timeZone),
  };
}
