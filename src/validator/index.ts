/**
 * Schedule Auditor
 *
 * Checks a set of persisted lessons against the invariants generation is
 * meant to keep. Used by the validate script and the reports; it never
 * changes anything.
 */

import { endToMinutes, isoWeekday, toMinutes } from '../calendar';
import { detectDoubleBookings, summarizeConflicts, toBooking } from '../conflicts';
import type {
  IsoDate,
  LessonId,
  LessonOccurrence,
  PatternId,
  RecurringPattern,
} from '../types';

export type AuditViolationType =
  | 'double_booking'
  | 'weekday_mismatch'
  | 'invalid_times'
  | 'outside_validity'
  | 'attendance_drift';

export interface AuditViolation {
  type: AuditViolationType;
  severity: 'error' | 'warning';
  lessonIds: LessonId[];
  date: IsoDate;
  description: string;
}

export interface AuditResult {
  valid: boolean;
  errors: AuditViolation[];
  warnings: AuditViolation[];
  score: number;
  summary: string;
}

export function auditSchedule(lessons: LessonOccurrence[], patterns: RecurringPattern[]): AuditResult {
  const errors: AuditViolation[] = [];
  const warnings: AuditViolation[] = [];
  const patternMap = new Map(patterns.map(p => [p.id, p]));

  // 1. Double bookings among lessons that still take place
  errors.push(...checkDoubleBookings(lessons));

  // 2. Lessons that end before they start
  errors.push(...checkTimes(lessons));

  // 3. Generated lessons on the wrong weekday
  errors.push(...checkWeekdays(lessons, patternMap));

  // 4. Generated lessons outside their pattern's validity window
  warnings.push(...checkValidity(lessons, patternMap));

  // 5. Scheduled lessons whose students differ from the pattern's
  warnings.push(...checkAttendance(lessons, patternMap));

  const score = Math.max(0, 100 - errors.length * 20 - warnings.length * 5);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    score,
    summary: generateSummary(lessons, errors, warnings),
  };
}

function checkDoubleBookings(lessons: LessonOccurrence[]): AuditViolation[] {
  const active = lessons.filter(l => l.status !== 'cancelled').map(toBooking);

  return detectDoubleBookings(active).map(({ first, second, conflicts }): AuditViolation => ({
    type: 'double_booking',
    severity: 'error',
    lessonIds: [first.id, second.id].filter((id): id is LessonId => id !== null),
    date: first.date,
    description: summarizeConflicts(conflicts),
  }));
}

function checkTimes(lessons: LessonOccurrence[]): AuditViolation[] {
  return lessons
    .filter(l => endToMinutes(l.endTime) <= toMinutes(l.startTime))
    .map((l): AuditViolation => ({
      type: 'invalid_times',
      severity: 'error',
      lessonIds: [l.id],
      date: l.date,
      description: `Lesson ${l.id} ends at ${l.endTime}, not after its start ${l.startTime}`,
    }));
}

function generated(
  lessons: LessonOccurrence[],
  patternMap: Map<PatternId, RecurringPattern>
): Array<[LessonOccurrence, RecurringPattern]> {
  const pairs: Array<[LessonOccurrence, RecurringPattern]> = [];
  for (const lesson of lessons) {
    if (lesson.patternId === null || lesson.isException) continue;
    const pattern = patternMap.get(lesson.patternId);
    if (pattern) pairs.push([lesson, pattern]);
  }
  return pairs;
}

function checkWeekdays(
  lessons: LessonOccurrence[],
  patternMap: Map<PatternId, RecurringPattern>
): AuditViolation[] {
  return generated(lessons, patternMap)
    .filter(([lesson, pattern]) => isoWeekday(lesson.date) !== pattern.dayOfWeek)
    .map(([lesson, pattern]): AuditViolation => ({
      type: 'weekday_mismatch',
      severity: 'error',
      lessonIds: [lesson.id],
      date: lesson.date,
      description: `Lesson ${lesson.id} falls on weekday ${isoWeekday(lesson.date)}, pattern ${pattern.id} runs on ${pattern.dayOfWeek}`,
    }));
}

function checkValidity(
  lessons: LessonOccurrence[],
  patternMap: Map<PatternId, RecurringPattern>
): AuditViolation[] {
  return generated(lessons, patternMap)
    .filter(([lesson, pattern]) =>
      lesson.date < pattern.validFrom || (pattern.validUntil !== null && lesson.date > pattern.validUntil)
    )
    .map(([lesson, pattern]): AuditViolation => ({
      type: 'outside_validity',
      severity: 'warning',
      lessonIds: [lesson.id],
      date: lesson.date,
      description: `Lesson ${lesson.id} is outside pattern ${pattern.id} (${pattern.validFrom} to ${pattern.validUntil ?? 'open'})`,
    }));
}

function checkAttendance(
  lessons: LessonOccurrence[],
  patternMap: Map<PatternId, RecurringPattern>
): AuditViolation[] {
  const violations: AuditViolation[] = [];

  for (const [lesson, pattern] of generated(lessons, patternMap)) {
    if (lesson.status !== 'scheduled') continue;

    const booked = new Set(lesson.attendance.map(a => a.studentId));
    const missing = pattern.studentIds.filter(id => !booked.has(id));
    if (missing.length === 0) continue;

    violations.push({
      type: 'attendance_drift',
      severity: 'warning',
      lessonIds: [lesson.id],
      date: lesson.date,
      description: `Lesson ${lesson.id} is missing student(s) ${missing.join(', ')} of pattern ${pattern.id}`,
    });
  }

  return violations;
}

function generateSummary(
  lessons: LessonOccurrence[],
  errors: AuditViolation[],
  warnings: AuditViolation[]
): string {
  const lines: string[] = [];
  const recurring = lessons.filter(l => l.patternId !== null).length;
  const exceptions = lessons.filter(l => l.isException).length;
  const cancelled = lessons.filter(l => l.status === 'cancelled').length;

  lines.push(`Lessons: ${lessons.length} (${recurring} recurring, ${lessons.length - recurring} one-off)`);
  lines.push(`Exceptions: ${exceptions}, cancelled: ${cancelled}`);
  lines.push(`Errors: ${errors.length}, warnings: ${warnings.length}`);

  return lines.join('\n');
}
