/**
 * Pattern Store contract
 *
 * Everything the scheduling core needs from persistence. Implementations
 * must make `transaction` atomic and serialize transactions against each
 * other; the core never retries.
 */

import type {
  AttendanceStatus,
  IsoDate,
  LessonId,
  LessonOccurrence,
  OccurrenceDraft,
  PatternChanges,
  PatternId,
  PatternInput,
  RecurringPattern,
  RoomId,
  StudentId,
  StudioId,
  TeacherId,
} from '../types';

export interface PatternFilter {
  studioId?: StudioId;
  teacherId?: TeacherId;
  activeOnly?: boolean;
}

/**
 * Occurrences of a studio in [dateFrom, dateTo]. When any resource filter is
 * given, an occurrence matches if it uses at least one of them.
 */
export interface OccurrenceRangeQuery {
  studioId?: StudioId;
  teacherId?: TeacherId;
  roomId?: RoomId | null;
  studentIds?: StudentId[];
  dateFrom: IsoDate;
  dateTo: IsoDate;
  includeCancelled?: boolean;
}

export interface PatternStore {
  transaction<T>(work: (tx: PatternStore) => Promise<T>): Promise<T>;

  getPattern(id: PatternId): Promise<RecurringPattern | null>;
  listPatterns(filter?: PatternFilter): Promise<RecurringPattern[]>;
  insertPattern(input: PatternInput): Promise<RecurringPattern>;
  /** Throws ConcurrentModificationError when `expectedVersion` is stale. */
  updatePattern(id: PatternId, changes: PatternChanges, expectedVersion: number): Promise<RecurringPattern>;
  deletePattern(id: PatternId): Promise<boolean>;

  getStudentLinks(patternId: PatternId): Promise<StudentId[]>;
  setStudentLinks(patternId: PatternId, studentIds: StudentId[]): Promise<void>;

  getOccurrence(id: LessonId): Promise<LessonOccurrence | null>;
  getOccurrencesInRange(query: OccurrenceRangeQuery): Promise<LessonOccurrence[]>;
  getPatternOccurrences(patternId: PatternId, fromDate?: IsoDate): Promise<LessonOccurrence[]>;
  upsertOccurrence(draft: OccurrenceDraft): Promise<LessonOccurrence>;
  deleteOccurrences(ids: LessonId[]): Promise<number>;

  setAttendance(lessonId: LessonId, studentId: StudentId, status: AttendanceStatus): Promise<void>;
  removeAttendance(lessonId: LessonId, studentId: StudentId): Promise<void>;
}

export { Database } from './database';
export { SqlPatternStore, openPatternStore } from './sql-store';
