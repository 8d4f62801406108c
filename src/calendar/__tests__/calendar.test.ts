import { describe, expect, it } from 'vitest';
import {
  addDaysToDate,
  addMinutesToTime,
  durationBetween,
  endToMinutes,
  isClockTime,
  isIsoDate,
  isoWeekday,
  occurrencesFor,
  timesOverlap,
  todayIn,
} from '..';
import { InvalidRangeError, ValidationError } from '../../errors';
import type { RecurrenceRule } from '..';

const monday: RecurrenceRule = {
  dayOfWeek: 1,
  startTime: '10:00',
  durationMinutes: 60,
  validFrom: '2024-01-01',
  validUntil: null,
};

describe('occurrencesFor', () => {
  it('yields one slot per week on the pattern weekday', () => {
    const slots = [...occurrencesFor(monday, '2024-01-01', '2024-01-22')];

    expect(slots).toEqual([
      { date: '2024-01-01', startTime: '10:00', endTime: '11:00' },
      { date: '2024-01-08', startTime: '10:00', endTime: '11:00' },
      { date: '2024-01-15', startTime: '10:00', endTime: '11:00' },
      { date: '2024-01-22', startTime: '10:00', endTime: '11:00' },
    ]);
  });

  it('starts at the first matching weekday after the horizon start', () => {
    const thursday = { ...monday, dayOfWeek: 4 as const };
    const slots = [...occurrencesFor(thursday, '2024-01-01', '2024-01-15')];

    expect(slots.map(s => s.date)).toEqual(['2024-01-04', '2024-01-11']);
  });

  it('clips to the validity window', () => {
    const rule = { ...monday, validFrom: '2024-01-08', validUntil: '2024-01-15' };
    const slots = [...occurrencesFor(rule, '2024-01-01', '2024-02-01')];

    expect(slots.map(s => s.date)).toEqual(['2024-01-08', '2024-01-15']);
  });

  it('only yields dates on the weekday within both windows', () => {
    for (const day of [1, 2, 3, 4, 5, 6, 7] as const) {
      const rule = { ...monday, dayOfWeek: day, validFrom: '2024-02-03', validUntil: '2024-04-20' };
      for (const slot of occurrencesFor(rule, '2024-01-10', '2024-03-31')) {
        expect(isoWeekday(slot.date)).toBe(day);
        expect(slot.date >= '2024-02-03' && slot.date <= '2024-03-31').toBe(true);
      }
    }
  });

  it('is empty when the windows do not overlap', () => {
    const rule = { ...monday, validFrom: '2024-03-01' };
    expect([...occurrencesFor(rule, '2024-01-01', '2024-01-31')]).toEqual([]);
  });

  it('can be iterated more than once', () => {
    const slots = occurrencesFor(monday, '2024-01-01', '2024-01-08');
    expect([...slots]).toHaveLength(2);
    expect([...slots]).toHaveLength(2);
  });

  it('rejects a horizon that ends before it starts', () => {
    expect(() => occurrencesFor(monday, '2024-01-10', '2024-01-01')).toThrow(InvalidRangeError);
  });

  it('rejects a lesson running past midnight', () => {
    const late = { ...monday, startTime: '23:30' };
    expect(() => occurrencesFor(late, '2024-01-01', '2024-01-08')).toThrow(ValidationError);
  });
});

describe('time helpers', () => {
  it('adds minutes to a clock time', () => {
    expect(addMinutesToTime('10:00', 45)).toBe('10:45');
    expect(addMinutesToTime('16:30', 90)).toBe('18:00');
    expect(addMinutesToTime('23:00', 60)).toBe('24:00');
  });

  it('rejects crossing midnight', () => {
    expect(() => addMinutesToTime('23:30', 60)).toThrow('runs past midnight');
  });

  it('measures durations', () => {
    expect(durationBetween('09:15', '10:45')).toBe(90);
  });

  it('treats intervals as half-open', () => {
    expect(timesOverlap('10:00', '11:00', '10:30', '11:30')).toBe(true);
    expect(timesOverlap('10:00', '11:00', '11:00', '12:00')).toBe(false);
  });

  it('accepts 24:00 as an end time', () => {
    expect(endToMinutes('24:00')).toBe(1440);
    expect(endToMinutes('11:00')).toBe(660);
    expect(durationBetween('23:00', '24:00')).toBe(60);
    expect(timesOverlap('12:00', '12:30', '23:00', '24:00')).toBe(false);
    expect(timesOverlap('23:30', '24:00', '23:00', '24:00')).toBe(true);
  });

  it('validates dates and times', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-1-5')).toBe(false);
    expect(isClockTime('23:59')).toBe(true);
    expect(isClockTime('24:00')).toBe(false);
  });
});

describe('date helpers', () => {
  it('uses ISO weekdays', () => {
    expect(isoWeekday('2024-01-01')).toBe(1);
    expect(isoWeekday('2024-01-07')).toBe(7);
  });

  it('adds days across month ends', () => {
    expect(addDaysToDate('2024-01-29', 7)).toBe('2024-02-05');
  });

  it('resolves today in a time zone', () => {
    const now = new Date('2024-01-01T23:30:00Z');
    expect(todayIn('UTC', now)).toBe('2024-01-01');
    expect(todayIn('Europe/Berlin', now)).toBe('2024-01-02');
    expect(todayIn('America/New_York', now)).toBe('2024-01-01');
  });
});
