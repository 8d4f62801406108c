/**
 * Pattern Lifecycle Manager
 *
 * Create, update, deactivate and delete recurring patterns, keeping their
 * generated lessons in step:
 * - booking changes (room, time, duration, students) rewrite forward
 *   scheduled lessons, all-or-nothing unless forced
 * - shortening validUntil prunes scheduled lessons past the new end
 * - extending validUntil or reactivating generates the newly opened range
 *
 * Exceptions (individually edited lessons) are never rewritten or pruned.
 */

import { addDaysToDate, addMinutesToTime, laterDate } from '../calendar';
import { findConflicts, toBooking } from '../conflicts';
import { today, withStore, type SchedulingContext } from '../context';
import { PatternNotFoundError, UpdateConflictError, ValidationError } from '../errors';
import { defaultHorizon, materializePattern } from '../scheduler';
import type { PatternFilter, PatternStore } from '../store';
import type {
  AttendanceRecord,
  Booking,
  ConflictDescriptor,
  GenerationResult,
  IsoDate,
  LessonId,
  LessonOccurrence,
  PatternDelta,
  PatternId,
  RecurringPattern,
  StudentId,
} from '../types';
import { parsePatternDelta, parsePatternInput, type PatternInputDraft } from '../validation';

export interface CreatePatternResult {
  pattern: RecurringPattern;
  generation: GenerationResult;
}

export interface UpdateOptions {
  /** Apply the update even when some forward lessons would double-book. */
  force?: boolean;
}

export interface UpdatePatternResult {
  pattern: RecurringPattern;
  /** Forward lessons rewritten to the new booking */
  updated: LessonOccurrence[];
  /** Forced updates only: lessons that kept their old booking, now exceptions */
  flagged: LessonOccurrence[];
  /** Lessons pruned past a shortened validUntil */
  removed: LessonId[];
  /** Lessons generated for a newly opened range */
  generation: GenerationResult | null;
  conflicts: ConflictDescriptor[];
}

export interface DeletePatternResult {
  patternId: PatternId;
  deletedLessons: number;
}

function sameStudents(a: StudentId[], b: StudentId[]): boolean {
  const set = new Set(a);
  return set.size === new Set(b).size && b.every(id => set.has(id));
}

function isRewritable(lesson: LessonOccurrence): boolean {
  return lesson.status === 'scheduled' && !lesson.isException;
}

/**
 * Generate from `from` to the default horizon, or nothing when the range is
 * empty.
 */
async function generateFrom(
  ctx: SchedulingContext,
  pattern: RecurringPattern,
  from: IsoDate
): Promise<GenerationResult> {
  const horizonEnd = defaultHorizon(ctx);
  if (from > horizonEnd) {
    return { patternId: pattern.id, created: [], skipped: [], alreadyMaterialized: [] };
  }
  return materializePattern(ctx, pattern, horizonEnd, { from });
}

/**
 * Attendance for a rewritten lesson: kept students keep their record, new
 * students start as scheduled, dropped students lose only a scheduled record.
 */
function reseedAttendance(
  current: AttendanceRecord[],
  studentIds: StudentId[]
): Array<Pick<AttendanceRecord, 'studentId' | 'status'>> {
  const wanted = new Set(studentIds);
  const byStudent = new Map(current.map(a => [a.studentId, a.status]));

  const kept = current
    .filter(a => wanted.has(a.studentId) || a.status !== 'scheduled')
    .map(a => ({ studentId: a.studentId, status: a.status }));
  const added = studentIds
    .filter(id => !byStudent.has(id))
    .map(studentId => ({ studentId, status: 'scheduled' as const }));

  return [...kept, ...added].sort((a, b) => a.studentId - b.studentId);
}

export async function createPattern(ctx: SchedulingContext, input: PatternInputDraft): Promise<CreatePatternResult> {
  const parsed = parsePatternInput(input, ctx.settings.defaultDurationMinutes);

  return ctx.store.transaction(async tx => {
    const txCtx = withStore(ctx, tx);
    const pattern = await tx.insertPattern(parsed);
    ctx.logger.info('Created pattern', { patternId: pattern.id, studioId: pattern.studioId });

    const generation = await generateFrom(txCtx, pattern, laterDate(pattern.validFrom, today(ctx)));
    return { pattern, generation };
  });
}

export async function getPattern(ctx: SchedulingContext, id: PatternId): Promise<RecurringPattern> {
  const pattern = await ctx.store.getPattern(id);
  if (!pattern) throw new PatternNotFoundError(id);
  return pattern;
}

export async function listPatterns(ctx: SchedulingContext, filter: PatternFilter = {}): Promise<RecurringPattern[]> {
  return ctx.store.listPatterns(filter);
}

/**
 * Lessons a pattern has produced, optionally from a date on.
 */
export async function countGeneratedLessons(
  ctx: SchedulingContext,
  id: PatternId,
  fromDate?: IsoDate
): Promise<number> {
  await getPattern(ctx, id);
  const lessons = await ctx.store.getPatternOccurrences(id, fromDate);
  return lessons.length;
}

interface RewritePlan {
  lesson: LessonOccurrence;
  /** New booking, or null when only non-booking fields change */
  booking: Booking | null;
  conflicts: ConflictDescriptor[];
}

async function planRewrites(
  tx: PatternStore,
  next: RecurringPattern,
  forward: LessonOccurrence[]
): Promise<RewritePlan[]> {
  if (forward.length === 0) return [];

  const endTime = addMinutesToTime(next.startTime, next.durationMinutes);
  const others = await tx.getOccurrencesInRange({
    studioId: next.studioId,
    teacherId: next.teacherId,
    roomId: next.roomId,
    studentIds: next.studentIds,
    dateFrom: forward[0].date,
    dateTo: forward[forward.length - 1].date,
  });
  const existing = others.map(toBooking);

  return forward.map(lesson => {
    const booking: Booking = {
      id: lesson.id,
      date: lesson.date,
      startTime: next.startTime,
      endTime,
      teacherId: next.teacherId,
      roomId: next.roomId,
      studentIds: next.studentIds,
      status: lesson.status,
    };
    return { lesson, booking, conflicts: findConflicts(booking, existing) };
  });
}

export async function updatePattern(
  ctx: SchedulingContext,
  id: PatternId,
  delta: PatternDelta,
  options: UpdateOptions = {}
): Promise<UpdatePatternResult> {
  const { studentIds, expectedVersion, ...changes } = parsePatternDelta(delta);
  const force = options.force ?? false;

  return ctx.store.transaction(async tx => {
    const txCtx = withStore(ctx, tx);
    const current = await tx.getPattern(id);
    if (!current) throw new PatternNotFoundError(id);

    const next: RecurringPattern = {
      ...current,
      roomId: changes.roomId !== undefined ? changes.roomId : current.roomId,
      startTime: changes.startTime ?? current.startTime,
      durationMinutes: changes.durationMinutes ?? current.durationMinutes,
      validUntil: changes.validUntil !== undefined ? changes.validUntil : current.validUntil,
      isActive: changes.isActive ?? current.isActive,
      notes: changes.notes !== undefined ? changes.notes : current.notes,
      studentIds: studentIds ?? current.studentIds,
    };

    if (next.validUntil !== null && next.validUntil < next.validFrom) {
      throw new ValidationError(`validUntil ${next.validUntil} is before validFrom ${next.validFrom}`, [
        { path: 'validUntil', message: 'must not be before validFrom' },
      ]);
    }
    // Throws when the lesson would run past midnight
    addMinutesToTime(next.startTime, next.durationMinutes);

    const bookingChanged = next.roomId !== current.roomId
      || next.startTime !== current.startTime
      || next.durationMinutes !== current.durationMinutes
      || !sameStudents(next.studentIds, current.studentIds);
    const notesChanged = next.notes !== current.notes;

    let pattern = await tx.updatePattern(id, changes, expectedVersion ?? current.version);
    if (studentIds !== undefined) {
      await tx.setStudentLinks(id, studentIds);
      pattern = { ...pattern, studentIds: await tx.getStudentLinks(id) };
    }

    const result: UpdatePatternResult = {
      pattern,
      updated: [],
      flagged: [],
      removed: [],
      generation: null,
      conflicts: [],
    };

    const from = today(ctx);

    // Shortened: prune scheduled lessons past the new end
    if (next.validUntil !== null && (current.validUntil === null || next.validUntil < current.validUntil)) {
      const beyond = await tx.getPatternOccurrences(id, addDaysToDate(next.validUntil, 1));
      const prunable = beyond.filter(isRewritable).map(l => l.id);
      await tx.deleteOccurrences(prunable);
      result.removed = prunable;
    }

    if (bookingChanged || notesChanged) {
      const forward = (await tx.getPatternOccurrences(id, from))
        .filter(isRewritable)
        .filter(l => next.validUntil === null || l.date <= next.validUntil);

      const plans: RewritePlan[] = bookingChanged
        ? await planRewrites(tx, next, forward)
        : forward.map(lesson => ({ lesson, booking: null, conflicts: [] }));

      result.conflicts = plans.flatMap(p => p.conflicts);
      if (result.conflicts.length > 0 && !force) {
        throw new UpdateConflictError(id, result.conflicts);
      }

      for (const { lesson, booking, conflicts } of plans) {
        if (conflicts.length > 0) {
          // Forced: keep the old booking, detach it from future bulk updates
          const { id: lessonId, attendance, ...rest } = lesson;
          result.flagged.push(await tx.upsertOccurrence({
            ...rest,
            id: lessonId,
            isException: true,
            attendance: attendance.map(a => ({ studentId: a.studentId, status: a.status })),
          }));
          continue;
        }

        const { id: lessonId, attendance, ...rest } = lesson;
        result.updated.push(await tx.upsertOccurrence({
          ...rest,
          id: lessonId,
          startTime: booking ? booking.startTime : lesson.startTime,
          endTime: booking ? booking.endTime : lesson.endTime,
          roomId: next.roomId,
          notes: next.notes,
          attendance: reseedAttendance(attendance, next.studentIds),
        }));
      }

      if (result.flagged.length > 0) {
        ctx.logger.warn('Forced pattern update left conflicting lessons as exceptions', {
          patternId: id,
          dates: result.flagged.map(l => l.date),
        });
      }
    }

    // Reactivated or extended: generate the newly opened range
    if (pattern.isActive) {
      const reactivated = !current.isActive;
      const extended = current.validUntil !== null
        && (next.validUntil === null || next.validUntil > current.validUntil);

      if (reactivated) {
        result.generation = await generateFrom(txCtx, pattern, laterDate(pattern.validFrom, from));
      } else if (extended && current.validUntil !== null) {
        const opened = laterDate(addDaysToDate(current.validUntil, 1), from);
        result.generation = await generateFrom(txCtx, pattern, laterDate(pattern.validFrom, opened));
      }
    }

    ctx.logger.info('Updated pattern', {
      patternId: id,
      version: pattern.version,
      updated: result.updated.length,
      flagged: result.flagged.length,
      removed: result.removed.length,
      generated: result.generation?.created.length ?? 0,
    });

    return result;
  });
}

export async function deactivatePattern(
  ctx: SchedulingContext,
  id: PatternId,
  expectedVersion?: number
): Promise<UpdatePatternResult> {
  return updatePattern(ctx, id, expectedVersion === undefined ? { isActive: false } : { isActive: false, expectedVersion });
}

/**
 * Delete a pattern together with its lessons and student links.
 */
export async function deletePattern(ctx: SchedulingContext, id: PatternId): Promise<DeletePatternResult> {
  return ctx.store.transaction(async tx => {
    const lessons = await tx.getPatternOccurrences(id);
    const deleted = await tx.deletePattern(id);
    if (!deleted) throw new PatternNotFoundError(id);

    ctx.logger.info('Deleted pattern', { patternId: id, deletedLessons: lessons.length });
    return { patternId: id, deletedLessons: lessons.length };
  });
}
