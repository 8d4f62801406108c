/**
 * Calendar math for recurring lessons
 *
 * Pure functions: no persistence, no conflict knowledge. Dates are ISO
 * calendar dates (YYYY-MM-DD) and compare correctly as strings; times of day
 * are HH:MM and are converted to minutes for arithmetic.
 */

import { addDays, format, getISODay, parseISO } from 'date-fns';
import { InvalidRangeError, ValidationError } from '../errors';
import type { ClockTime, DayOfWeek, IsoDate, OccurrenceSlot, RecurringPattern } from '../types';

export const MINUTES_PER_DAY = 24 * 60;

/** Latest end of a lesson; valid only as an end time. */
export const END_OF_DAY: ClockTime = '24:00';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

export type RecurrenceRule = Pick<
  RecurringPattern,
  'dayOfWeek' | 'startTime' | 'durationMinutes' | 'validFrom' | 'validUntil'
>;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const parsed = parseISO(value);
  return !Number.isNaN(parsed.getTime()) && format(parsed, 'yyyy-MM-dd') === value;
}

export function isClockTime(value: string): boolean {
  return CLOCK_TIME_RE.test(value);
}

export function isDayOfWeek(value: number): value is DayOfWeek {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

function parseDate(value: IsoDate): Date {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid date: ${value}`, [{ path: 'date', message: 'expected YYYY-MM-DD' }]);
  }
  return parseISO(value);
}

function formatDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function toMinutes(time: ClockTime): number {
  if (!isClockTime(time)) {
    throw new ValidationError(`Invalid time: ${time}`, [{ path: 'time', message: 'expected HH:MM' }]);
  }
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Minutes since midnight for an end time, which may be 24:00.
 */
export function endToMinutes(time: ClockTime): number {
  return time === END_OF_DAY ? MINUTES_PER_DAY : toMinutes(time);
}

export function fromMinutes(total: number): ClockTime {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * End of a lesson starting at `start`. Lessons never run past midnight, so
 * 24:00 is the latest representable end.
 */
export function addMinutesToTime(start: ClockTime, minutes: number): ClockTime {
  const end = toMinutes(start) + minutes;
  if (end > MINUTES_PER_DAY) {
    throw new ValidationError(`A lesson starting at ${start} lasting ${minutes} minutes runs past midnight`, [
      { path: 'durationMinutes', message: 'lesson must end by 24:00' },
    ]);
  }
  return fromMinutes(end);
}

export function durationBetween(start: ClockTime, end: ClockTime): number {
  return endToMinutes(end) - toMinutes(start);
}

export function isoWeekday(date: IsoDate): DayOfWeek {
  const day = getISODay(parseDate(date));
  if (!isDayOfWeek(day)) {
    throw new ValidationError(`Invalid date: ${date}`);
  }
  return day;
}

export function addDaysToDate(date: IsoDate, days: number): IsoDate {
  return formatDate(addDays(parseDate(date), days));
}

export function laterDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

export function earlierDate(a: IsoDate, b: IsoDate): IsoDate {
  return a <= b ? a : b;
}

/**
 * Half-open interval test: [aStart, aEnd) and [bStart, bEnd) share time.
 */
export function timesOverlap(
  aStart: ClockTime,
  aEnd: ClockTime,
  bStart: ClockTime,
  bEnd: ClockTime
): boolean {
  return toMinutes(aStart) < endToMinutes(bEnd) && toMinutes(bStart) < endToMinutes(aEnd);
}

/**
 * Today's calendar date in the studio's timezone.
 */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * Expand a weekly rule into concrete slots between two dates (inclusive).
 *
 * The returned iterable is restartable: every iteration walks the weeks again
 * from the first matching date. Range errors are raised here, not lazily.
 */
export function occurrencesFor(
  rule: RecurrenceRule,
  horizonStart: IsoDate,
  horizonEnd: IsoDate
): Iterable<OccurrenceSlot> {
  parseDate(horizonStart);
  parseDate(horizonEnd);
  if (horizonEnd < horizonStart) {
    throw new InvalidRangeError(horizonStart, horizonEnd);
  }

  const start = laterDate(horizonStart, rule.validFrom);
  const end = rule.validUntil ? earlierDate(horizonEnd, rule.validUntil) : horizonEnd;
  const endTime = addMinutesToTime(rule.startTime, rule.durationMinutes);

  return {
    *[Symbol.iterator]() {
      if (start > end) return;

      const offset = (rule.dayOfWeek - isoWeekday(start) + 7) % 7;
      for (let date = addDaysToDate(start, offset); date <= end; date = addDaysToDate(date, 7)) {
        yield { date, startTime: rule.startTime, endTime };
      }
    },
  };
}
