/**
 * Single lessons: exceptions to a pattern, one-off lessons, status changes
 * and attendance.
 *
 * An exception is a generated lesson edited on its own. It keeps its
 * original date so generation never recreates it, and bulk pattern
 * updates skip it.
 */

import { addMinutesToTime, durationBetween } from '../calendar';
import { findConflicts, summarizeConflicts, toBooking } from '../conflicts';
import type { SchedulingContext } from '../context';
import {
  ConflictError,
  InvalidStatusTransitionError,
  LessonNotFoundError,
  ValidationError,
} from '../errors';
import type { PatternStore } from '../store';
import type {
  AttendanceStatus,
  Booking,
  ExceptionChanges,
  IsoDate,
  LessonId,
  LessonOccurrence,
  LessonStatus,
  OccurrenceDraft,
  PatternId,
  StudentId,
} from '../types';
import {
  attendanceStatusSchema,
  lessonStatusSchema,
  parseExceptionChanges,
  parseInput,
  parseLessonInput,
  type LessonInputDraft,
} from '../validation';

export const STATUS_TRANSITIONS: Record<LessonStatus, readonly LessonStatus[]> = {
  scheduled: ['completed', 'cancelled', 'missed'],
  completed: ['missed'],
  cancelled: ['scheduled'],
  missed: [],
};

export function canTransition(from: LessonStatus, to: LessonStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

export interface RevertedException {
  lessonId: LessonId;
  patternId: PatternId;
  originalDate: IsoDate;
}

export interface StatusChangeOptions {
  reason?: string | null;
}

async function loadLesson(store: PatternStore, id: LessonId): Promise<LessonOccurrence> {
  const lesson = await store.getOccurrence(id);
  if (!lesson) throw new LessonNotFoundError(id);
  return lesson;
}

function toDraft(lesson: LessonOccurrence): OccurrenceDraft {
  const { attendance, ...rest } = lesson;
  return {
    ...rest,
    attendance: attendance.map(a => ({ studentId: a.studentId, status: a.status })),
  };
}

/**
 * Reject a booking that collides with another lesson of the studio.
 */
async function assertBookable(store: PatternStore, studioId: number, booking: Booking): Promise<void> {
  const others = await store.getOccurrencesInRange({
    studioId,
    teacherId: booking.teacherId,
    roomId: booking.roomId,
    studentIds: booking.studentIds,
    dateFrom: booking.date,
    dateTo: booking.date,
  });

  const conflicts = findConflicts(booking, others.map(toBooking));
  if (conflicts.length > 0) {
    throw new ConflictError(`Lesson would double-book: ${summarizeConflicts(conflicts)}`, conflicts);
  }
}

function withAttendance(
  lesson: LessonOccurrence,
  from: AttendanceStatus,
  to: AttendanceStatus
): OccurrenceDraft['attendance'] {
  return lesson.attendance.map(a => ({
    studentId: a.studentId,
    status: a.status === from ? to : a.status,
  }));
}

export async function getLesson(ctx: SchedulingContext, id: LessonId): Promise<LessonOccurrence> {
  return loadLesson(ctx.store, id);
}

/**
 * Book a lesson that belongs to no pattern.
 */
export async function createLesson(ctx: SchedulingContext, input: LessonInputDraft): Promise<LessonOccurrence> {
  const parsed = parseLessonInput(input, ctx.settings.defaultDurationMinutes);
  const endTime = addMinutesToTime(parsed.startTime, parsed.durationMinutes);

  return ctx.store.transaction(async tx => {
    await assertBookable(tx, parsed.studioId, {
      id: null,
      date: parsed.date,
      startTime: parsed.startTime,
      endTime,
      teacherId: parsed.teacherId,
      roomId: parsed.roomId,
      studentIds: parsed.studentIds,
      status: 'scheduled',
    });

    const lesson = await tx.upsertOccurrence({
      studioId: parsed.studioId,
      teacherId: parsed.teacherId,
      roomId: parsed.roomId,
      patternId: null,
      date: parsed.date,
      originalDate: null,
      startTime: parsed.startTime,
      endTime,
      status: 'scheduled',
      isException: false,
      cancellationReason: null,
      notes: parsed.notes,
      attendance: parsed.studentIds.map(studentId => ({ studentId, status: 'scheduled' })),
    });

    ctx.logger.info('Created lesson', { lessonId: lesson.id, date: lesson.date });
    return lesson;
  });
}

export async function deleteLesson(ctx: SchedulingContext, id: LessonId): Promise<void> {
  await ctx.store.transaction(async tx => {
    await loadLesson(tx, id);
    await tx.deleteOccurrences([id]);
  });
  ctx.logger.info('Deleted lesson', { lessonId: id });
}

/**
 * Reschedule, move or cancel one lesson without touching its pattern.
 */
export async function createException(
  ctx: SchedulingContext,
  lessonId: LessonId,
  changes: ExceptionChanges
): Promise<LessonOccurrence> {
  const parsed = parseExceptionChanges(changes);

  return ctx.store.transaction(async tx => {
    const lesson = await loadLesson(tx, lessonId);
    if (lesson.status !== 'scheduled') {
      throw new ValidationError(`Lesson ${lessonId} is ${lesson.status}; only scheduled lessons can be changed`);
    }

    const startTime = parsed.startTime ?? lesson.startTime;
    const duration = parsed.durationMinutes ?? durationBetween(lesson.startTime, lesson.endTime);
    const draft: OccurrenceDraft = {
      ...toDraft(lesson),
      date: parsed.date ?? lesson.date,
      startTime,
      endTime: addMinutesToTime(startTime, duration),
      roomId: parsed.roomId !== undefined ? parsed.roomId : lesson.roomId,
      notes: parsed.notes !== undefined ? parsed.notes : lesson.notes,
      isException: lesson.patternId !== null || lesson.isException,
    };

    if (parsed.cancel) {
      draft.status = 'cancelled';
      draft.cancellationReason = parsed.cancel.reason;
      draft.attendance = withAttendance(lesson, 'scheduled', 'cancelled');
    } else {
      await assertBookable(tx, lesson.studioId, {
        id: lesson.id,
        date: draft.date,
        startTime: draft.startTime,
        endTime: draft.endTime,
        teacherId: draft.teacherId,
        roomId: draft.roomId,
        studentIds: draft.attendance.filter(a => a.status !== 'cancelled').map(a => a.studentId),
        status: 'scheduled',
      });
    }

    const updated = await tx.upsertOccurrence(draft);
    ctx.logger.info('Created lesson exception', {
      lessonId,
      patternId: lesson.patternId,
      date: updated.date,
      cancelled: updated.status === 'cancelled',
    });
    return updated;
  });
}

/**
 * Drop an exception so the next generation run recreates the lesson from
 * its pattern.
 */
export async function revertException(ctx: SchedulingContext, lessonId: LessonId): Promise<RevertedException> {
  return ctx.store.transaction(async tx => {
    const lesson = await loadLesson(tx, lessonId);
    if (lesson.patternId === null || !lesson.isException) {
      throw new ValidationError(`Lesson ${lessonId} is not an exception to a recurring pattern`);
    }

    await tx.deleteOccurrences([lessonId]);
    ctx.logger.info('Reverted lesson exception', { lessonId, patternId: lesson.patternId });
    return {
      lessonId,
      patternId: lesson.patternId,
      originalDate: lesson.originalDate ?? lesson.date,
    };
  });
}

export async function changeLessonStatus(
  ctx: SchedulingContext,
  lessonId: LessonId,
  status: LessonStatus,
  options: StatusChangeOptions = {}
): Promise<LessonOccurrence> {
  const next = parseInput(lessonStatusSchema, status, 'lesson status');

  return ctx.store.transaction(async tx => {
    const lesson = await loadLesson(tx, lessonId);
    if (!canTransition(lesson.status, next)) {
      throw new InvalidStatusTransitionError(lesson.status, next);
    }

    const draft = toDraft(lesson);
    draft.status = next;

    switch (next) {
      case 'cancelled':
        draft.cancellationReason = options.reason ?? null;
        draft.attendance = withAttendance(lesson, 'scheduled', 'cancelled');
        break;
      case 'scheduled':
        // Reinstating takes the slot back, so it must still be free
        await assertBookable(tx, lesson.studioId, { ...toBooking(lesson), status: 'scheduled' });
        draft.cancellationReason = null;
        draft.attendance = withAttendance(lesson, 'cancelled', 'scheduled');
        break;
      case 'missed':
        draft.attendance = withAttendance(lesson, 'scheduled', 'missed');
        break;
      case 'completed':
        break;
    }

    const updated = await tx.upsertOccurrence(draft);
    ctx.logger.info('Changed lesson status', { lessonId, from: lesson.status, to: next });
    return updated;
  });
}

/**
 * Record one student's attendance. The student must be booked on the lesson.
 */
export async function markAttendance(
  ctx: SchedulingContext,
  lessonId: LessonId,
  studentId: StudentId,
  status: AttendanceStatus
): Promise<LessonOccurrence> {
  const next = parseInput(attendanceStatusSchema, status, 'attendance status');

  return ctx.store.transaction(async tx => {
    const lesson = await loadLesson(tx, lessonId);
    if (!lesson.attendance.some(a => a.studentId === studentId)) {
      throw new ValidationError(`Student ${studentId} is not booked on lesson ${lessonId}`);
    }
    if (lesson.status === 'cancelled' && next !== 'cancelled') {
      throw new ValidationError(`Lesson ${lessonId} is cancelled`);
    }

    await tx.setAttendance(lessonId, studentId, next);
    return loadLesson(tx, lessonId);
  });
}
