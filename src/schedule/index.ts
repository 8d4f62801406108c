/**
 * Read-only schedule views for a studio, a teacher or a student.
 */

import { addDaysToDate, isIsoDate } from '../calendar';
import { today, type SchedulingContext } from '../context';
import { InvalidRangeError, ValidationError } from '../errors';
import { ensureStudioHorizon } from '../scheduler';
import type { OccurrenceRangeQuery } from '../store';
import type {
  IsoDate,
  LessonOccurrence,
  ScheduleItem,
  StudentId,
  StudioId,
  TeacherId,
} from '../types';

export interface DateRange {
  from?: IsoDate;
  to?: IsoDate;
}

export interface ScheduleQueryOptions extends DateRange {
  studioId?: StudioId;
  includeCancelled?: boolean;
}

export function toScheduleItem(lesson: LessonOccurrence): ScheduleItem {
  return {
    lessonId: lesson.id,
    studioId: lesson.studioId,
    date: lesson.date,
    startTime: lesson.startTime,
    endTime: lesson.endTime,
    status: lesson.status,
    teacherId: lesson.teacherId,
    roomId: lesson.roomId,
    studentIds: lesson.attendance.map(a => a.studentId),
    isRecurring: lesson.patternId !== null,
    isException: lesson.isException,
    notes: lesson.notes,
  };
}

/**
 * Fill in a range: from defaults to today, to defaults to one week after from.
 */
export function resolveRange(ctx: SchedulingContext, range: DateRange = {}): { from: IsoDate; to: IsoDate } {
  for (const [path, value] of [['from', range.from], ['to', range.to]] as const) {
    if (value !== undefined && !isIsoDate(value)) {
      throw new ValidationError(`Invalid ${path} date: ${value}`, [{ path, message: 'expected YYYY-MM-DD' }]);
    }
  }

  const from = range.from ?? today(ctx);
  const to = range.to ?? addDaysToDate(from, 6);
  if (to < from) throw new InvalidRangeError(from, to);
  return { from, to };
}

async function query(
  ctx: SchedulingContext,
  filter: Omit<OccurrenceRangeQuery, 'dateFrom' | 'dateTo' | 'includeCancelled'>,
  options: ScheduleQueryOptions
): Promise<ScheduleItem[]> {
  const { from, to } = resolveRange(ctx, options);
  const lessons = await ctx.store.getOccurrencesInRange({
    ...filter,
    dateFrom: from,
    dateTo: to,
    includeCancelled: options.includeCancelled ?? true,
  });
  return lessons.map(toScheduleItem);
}

/**
 * A studio's lessons. Tops up pattern generation to the default horizon
 * first, so a freshly read calendar is never empty ahead of today.
 */
export async function getStudioSchedule(
  ctx: SchedulingContext,
  studioId: StudioId,
  options: ScheduleQueryOptions = {}
): Promise<ScheduleItem[]> {
  const run = await ensureStudioHorizon(ctx, studioId);
  const created = run.results.reduce((sum, r) => sum + r.created.length, 0);
  if (created > 0) {
    ctx.logger.debug('Topped up studio schedule', { studioId, created });
  }
  return query(ctx, { studioId }, options);
}

export async function getTeacherSchedule(
  ctx: SchedulingContext,
  teacherId: TeacherId,
  options: ScheduleQueryOptions = {}
): Promise<ScheduleItem[]> {
  return query(ctx, { studioId: options.studioId, teacherId }, options);
}

export async function getStudentSchedule(
  ctx: SchedulingContext,
  studentId: StudentId,
  options: ScheduleQueryOptions = {}
): Promise<ScheduleItem[]> {
  return query(ctx, { studioId: options.studioId, studentIds: [studentId] }, options);
}
