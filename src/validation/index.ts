/**
 * Input validation schemas
 *
 * Shared by the core (which validates before any write) and the HTTP
 * layer (which parses request bodies with the same schemas).
 */

import { z } from 'zod';
import { MINUTES_PER_DAY, isClockTime, isDayOfWeek, isIsoDate, toMinutes } from '../calendar';
import { ValidationError } from '../errors';
import {
  ATTENDANCE_STATUSES,
  LESSON_STATUSES,
  type ExceptionChanges,
  type LessonInput,
  type PatternDelta,
  type PatternInput,
} from '../types';

export const MIN_DURATION_MINUTES = 30;
export const MAX_DURATION_MINUTES = 180;

const id = z.number().int().positive();
const isoDate = z.string().refine(isIsoDate, 'Expected a date as YYYY-MM-DD');
const clockTime = z.string().refine(isClockTime, 'Expected a time as HH:MM');
const dayOfWeek = z.number().int().refine(isDayOfWeek, 'Day of week must be 1 (Monday) to 7 (Sunday)');
const duration = z.number().int().min(MIN_DURATION_MINUTES).max(MAX_DURATION_MINUTES);
const notes = z.string().max(1000).nullable();
const studentIds = z.array(id).transform(ids => [...new Set(ids)]);

function endsByMidnight(value: { startTime?: string; durationMinutes?: number }): boolean {
  if (value.startTime === undefined || value.durationMinutes === undefined) return true;
  if (!isClockTime(value.startTime)) return true;
  return toMinutes(value.startTime) + value.durationMinutes <= MINUTES_PER_DAY;
}

export const DEFAULT_DURATION_MINUTES = 60;

export const createPatternInputSchema = (defaultDuration = DEFAULT_DURATION_MINUTES) => z.object({
  studioId: id,
  teacherId: id,
  roomId: id.nullable().default(null),
  dayOfWeek,
  startTime: clockTime,
  durationMinutes: duration.default(defaultDuration),
  validFrom: isoDate,
  validUntil: isoDate.nullable().default(null),
  notes: notes.default(null),
  studentIds: studentIds.default([]),
})
  .refine(p => p.validUntil === null || p.validUntil >= p.validFrom, {
    message: 'validUntil must not be before validFrom',
    path: ['validUntil'],
  })
  .refine(endsByMidnight, { message: 'Lesson must end by 24:00', path: ['durationMinutes'] });

export const patternDeltaSchema = z.object({
  roomId: id.nullable().optional(),
  startTime: clockTime.optional(),
  durationMinutes: duration.optional(),
  validUntil: isoDate.nullable().optional(),
  isActive: z.boolean().optional(),
  notes: notes.optional(),
  studentIds: studentIds.optional(),
  expectedVersion: z.number().int().positive().optional(),
}).strict();

export const createLessonInputSchema = (defaultDuration = DEFAULT_DURATION_MINUTES) => z.object({
  studioId: id,
  teacherId: id,
  roomId: id.nullable().default(null),
  date: isoDate,
  startTime: clockTime,
  durationMinutes: duration.default(defaultDuration),
  notes: notes.default(null),
  studentIds: studentIds.default([]),
}).refine(endsByMidnight, { message: 'Lesson must end by 24:00', path: ['durationMinutes'] });

export const exceptionChangesSchema = z.object({
  date: isoDate.optional(),
  startTime: clockTime.optional(),
  durationMinutes: duration.optional(),
  roomId: id.nullable().optional(),
  notes: notes.optional(),
  cancel: z.object({ reason: z.string().max(1000).nullable().default(null) }).optional(),
}).strict().refine(c => Object.keys(c).length > 0, { message: 'No changes given' });

export const lessonStatusSchema = z.enum(LESSON_STATUSES);
export const attendanceStatusSchema = z.enum(ATTENDANCE_STATUSES);

/**
 * Parse a value or throw a ValidationError listing every issue.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toValidationError(result.error, what);
  }
  return result.data;
}

export function toValidationError(error: z.ZodError, what: string): ValidationError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
  return new ValidationError(`Invalid ${what}: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`, issues);
}

export function parsePatternInput(value: unknown, defaultDuration?: number): PatternInput {
  return parseInput(createPatternInputSchema(defaultDuration), value, 'pattern');
}

export function parsePatternDelta(value: unknown): PatternDelta {
  return parseInput(patternDeltaSchema, value, 'pattern update');
}

export function parseLessonInput(value: unknown, defaultDuration?: number): LessonInput {
  return parseInput(createLessonInputSchema(defaultDuration), value, 'lesson');
}

export function parseExceptionChanges(value: unknown): ExceptionChanges {
  return parseInput(exceptionChangesSchema, value, 'lesson exception');
}

export type PatternInputDraft = z.input<ReturnType<typeof createPatternInputSchema>>;
export type LessonInputDraft = z.input<ReturnType<typeof createLessonInputSchema>>;
