/**
 * Scheduling error taxonomy
 *
 * Every failure the core reports is one of these classes. The `code` is the
 * stable identifier the API layer puts in its error envelope.
 */

import type { ConflictDescriptor, IsoDate, LessonId, LessonStatus, PatternId } from '../types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'HORIZON_TOO_LARGE'
  | 'CONCURRENT_MODIFICATION'
  | 'INVALID_STATUS_TRANSITION';

export class SchedulingError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export interface FieldIssue {
  path: string;
  message: string;
}

export class ValidationError extends SchedulingError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super('VALIDATION_ERROR', message, issues.length > 0 ? { issues } : undefined);
    this.issues = issues;
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(from: IsoDate, to: IsoDate) {
    super(`Invalid date range: ${to} is before ${from}`, [
      { path: 'horizonEnd', message: `must not be before ${from}` },
    ]);
  }
}

export class ConflictError extends SchedulingError {
  readonly conflicts: ConflictDescriptor[];

  constructor(message: string, conflicts: ConflictDescriptor[]) {
    super('CONFLICT', message, { conflicts });
    this.conflicts = conflicts;
  }
}

export class UpdateConflictError extends ConflictError {
  readonly dates: IsoDate[];

  constructor(patternId: PatternId, conflicts: ConflictDescriptor[]) {
    const dates = [...new Set(conflicts.map(c => c.date))].sort();
    super(
      `Updating pattern ${patternId} would double-book ${dates.length} lesson(s): ${dates.join(', ')}`,
      conflicts
    );
    this.dates = dates;
  }
}

export class NotFoundError extends SchedulingError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class PatternNotFoundError extends NotFoundError {
  constructor(patternId: PatternId) {
    super(`Recurring pattern ${patternId} not found`);
  }
}

export class LessonNotFoundError extends NotFoundError {
  constructor(lessonId: LessonId) {
    super(`Lesson ${lessonId} not found`);
  }
}

export class HorizonTooLargeError extends SchedulingError {
  constructor(horizonEnd: IsoDate, limit: IsoDate, maxWeeks: number) {
    super(
      'HORIZON_TOO_LARGE',
      `Horizon ${horizonEnd} is beyond the ${maxWeeks}-week generation window (latest ${limit})`,
      { horizonEnd, limit, maxWeeks }
    );
  }
}

export class ConcurrentModificationError extends SchedulingError {
  constructor(patternId: PatternId, expectedVersion: number) {
    super(
      'CONCURRENT_MODIFICATION',
      `Pattern ${patternId} was modified concurrently (expected version ${expectedVersion})`,
      { patternId, expectedVersion }
    );
  }
}

export class InvalidStatusTransitionError extends SchedulingError {
  constructor(from: LessonStatus, to: LessonStatus) {
    super('INVALID_STATUS_TRANSITION', `Cannot change lesson status from ${from} to ${to}`, { from, to });
  }
}

export function isSchedulingError(err: unknown): err is SchedulingError {
  return err instanceof SchedulingError;
}
