/**
 * Pattern Store backed by SQLite (sql.js)
 *
 * TABLES:
 * - recurring_patterns: weekly rules, versioned for optimistic locking
 * - pattern_students: students attached to a pattern (attendance template)
 * - lessons: concrete occurrences, generated (pattern_id set) or one-off
 * - lesson_students: per-student attendance for a lesson
 *
 * A pattern owns its lessons and student links; a lesson owns its
 * attendance. Deletes cascade explicitly here as well as through the
 * foreign keys.
 */

import { ConcurrentModificationError, PatternNotFoundError } from '../errors';
import { isDayOfWeek } from '../calendar';
import {
  ATTENDANCE_STATUSES,
  LESSON_STATUSES,
  type AttendanceRecord,
  type AttendanceStatus,
  type DayOfWeek,
  type IsoDate,
  type LessonId,
  type LessonOccurrence,
  type LessonStatus,
  type OccurrenceDraft,
  type PatternChanges,
  type PatternId,
  type PatternInput,
  type RecurringPattern,
  type StudentId,
} from '../types';
import type { SqlValue } from 'sql.js';
import {
  Database,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
  type Row,
} from './database';
import type { OccurrenceRangeQuery, PatternFilter, PatternStore } from './index';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS recurring_patterns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    studio_id INTEGER NOT NULL,
    teacher_id INTEGER NOT NULL,
    room_id INTEGER,
    day_of_week INTEGER NOT NULL CHECK (day_of_week BETWEEN 1 AND 7),
    start_time TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL CHECK (duration_minutes BETWEEN 30 AND 180),
    valid_from TEXT NOT NULL,
    valid_until TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    notes TEXT,
    version INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (valid_until IS NULL OR valid_until >= valid_from)
  );

  CREATE INDEX IF NOT EXISTS idx_patterns_studio ON recurring_patterns(studio_id);
  CREATE INDEX IF NOT EXISTS idx_patterns_teacher ON recurring_patterns(teacher_id);

  CREATE TABLE IF NOT EXISTS pattern_students (
    pattern_id INTEGER NOT NULL REFERENCES recurring_patterns(id) ON DELETE CASCADE,
    student_id INTEGER NOT NULL,
    UNIQUE (pattern_id, student_id)
  );

  CREATE TABLE IF NOT EXISTS lessons (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    studio_id INTEGER NOT NULL,
    teacher_id INTEGER NOT NULL,
    room_id INTEGER,
    pattern_id INTEGER REFERENCES recurring_patterns(id) ON DELETE CASCADE,
    lesson_date TEXT NOT NULL,
    original_date TEXT,
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'scheduled',
    is_exception INTEGER NOT NULL DEFAULT 0,
    cancellation_reason TEXT,
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (pattern_id, original_date)
  );

  CREATE INDEX IF NOT EXISTS idx_lessons_studio_date ON lessons(studio_id, lesson_date);
  CREATE INDEX IF NOT EXISTS idx_lessons_teacher_date ON lessons(teacher_id, lesson_date);
  CREATE INDEX IF NOT EXISTS idx_lessons_room_date ON lessons(room_id, lesson_date, start_time);

  CREATE TABLE IF NOT EXISTS lesson_students (
    lesson_id INTEGER NOT NULL REFERENCES lessons(id) ON DELETE CASCADE,
    student_id INTEGER NOT NULL,
    attendance_status TEXT NOT NULL DEFAULT 'scheduled',
    UNIQUE (lesson_id, student_id)
  );

  CREATE INDEX IF NOT EXISTS idx_lesson_students_student ON lesson_students(student_id);
`;

const PATTERN_COLUMNS: Array<[keyof PatternChanges, string]> = [
  ['roomId', 'room_id'],
  ['startTime', 'start_time'],
  ['durationMinutes', 'duration_minutes'],
  ['validUntil', 'valid_until'],
  ['isActive', 'is_active'],
  ['notes', 'notes'],
];

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

function toSqlValue(value: string | number | boolean | null | undefined): SqlValue {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function toDayOfWeek(value: number): DayOfWeek {
  if (!isDayOfWeek(value)) {
    throw new Error(`Stored day_of_week ${value} is out of range`);
  }
  return value;
}

function toLessonStatus(value: string): LessonStatus {
  const status = LESSON_STATUSES.find(s => s === value);
  if (!status) throw new Error(`Unknown lesson status: ${value}`);
  return status;
}

function toAttendanceStatus(value: string): AttendanceStatus {
  const status = ATTENDANCE_STATUSES.find(s => s === value);
  if (!status) throw new Error(`Unknown attendance status: ${value}`);
  return status;
}

function rowToPattern(row: Row, studentIds: StudentId[]): RecurringPattern {
  return {
    id: readNumber(row, 'id'),
    studioId: readNumber(row, 'studio_id'),
    teacherId: readNumber(row, 'teacher_id'),
    roomId: readNullableNumber(row, 'room_id'),
    dayOfWeek: toDayOfWeek(readNumber(row, 'day_of_week')),
    startTime: readString(row, 'start_time'),
    durationMinutes: readNumber(row, 'duration_minutes'),
    validFrom: readString(row, 'valid_from'),
    validUntil: readNullableString(row, 'valid_until'),
    isActive: readNumber(row, 'is_active') === 1,
    notes: readNullableString(row, 'notes'),
    studentIds,
    version: readNumber(row, 'version'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at'),
  };
}

function rowToLesson(row: Row, attendance: AttendanceRecord[]): LessonOccurrence {
  return {
    id: readNumber(row, 'id'),
    studioId: readNumber(row, 'studio_id'),
    teacherId: readNumber(row, 'teacher_id'),
    roomId: readNullableNumber(row, 'room_id'),
    patternId: readNullableNumber(row, 'pattern_id'),
    date: readString(row, 'lesson_date'),
    originalDate: readNullableString(row, 'original_date'),
    startTime: readString(row, 'start_time'),
    endTime: readString(row, 'end_time'),
    status: toLessonStatus(readString(row, 'status')),
    isException: readNumber(row, 'is_exception') === 1,
    cancellationReason: readNullableString(row, 'cancellation_reason'),
    notes: readNullableString(row, 'notes'),
    attendance,
  };
}

export class SqlPatternStore implements PatternStore {
  private queue: Promise<void> = Promise.resolve();

  /**
   * `queued` is set on the stores handed to transaction and read bodies:
   * they already hold the queue and talk to the database directly.
   */
  constructor(
    private readonly db: Database,
    private readonly queued = false,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Create the tables if they do not exist yet.
   */
  migrate(): void {
    this.db.exec(SCHEMA);
  }

  async transaction<T>(work: (tx: PatternStore) => Promise<T>): Promise<T> {
    // Nested calls join the surrounding transaction
    if (this.queued) return work(this);

    const run = async (): Promise<T> => {
      this.db.exec('BEGIN');
      try {
        const result = await work(new SqlPatternStore(this.db, true, this.now));
        this.db.exec('COMMIT');
        this.db.persist();
        return result;
      } catch (err) {
        this.rollback(err);
        throw err;
      }
    };

    return this.serialize(run);
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const next = this.queue.then(work);
    this.queue = next.then(() => undefined, () => undefined);
    return next;
  }

  /**
   * Reads outside a transaction wait for open transactions, so they never
   * see uncommitted rows.
   */
  private read<T>(work: (store: SqlPatternStore) => Promise<T>): Promise<T> {
    return this.serialize(() => work(new SqlPatternStore(this.db, true, this.now)));
  }

  private rollback(cause: unknown): void {
    try {
      this.db.exec('ROLLBACK');
    } catch (rollbackError) {
      throw new AggregateError([cause, rollbackError], 'Transaction failed and could not be rolled back');
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ==========================================================================
  // Patterns
  // ==========================================================================

  async getPattern(id: PatternId): Promise<RecurringPattern | null> {
    if (!this.queued) return this.read(store => store.getPattern(id));
    const row = await this.db.prepare('SELECT * FROM recurring_patterns WHERE id = ?').bind(id).first();
    if (!row) return null;
    return rowToPattern(row, await this.getStudentLinks(id));
  }

  async listPatterns(filter: PatternFilter = {}): Promise<RecurringPattern[]> {
    if (!this.queued) return this.read(store => store.listPatterns(filter));
    const where: string[] = [];
    const params: SqlValue[] = [];

    if (filter.studioId !== undefined) {
      where.push('studio_id = ?');
      params.push(filter.studioId);
    }
    if (filter.teacherId !== undefined) {
      where.push('teacher_id = ?');
      params.push(filter.teacherId);
    }
    if (filter.activeOnly) {
      where.push('is_active = 1');
    }

    const sql = `SELECT * FROM recurring_patterns${where.length ? ` WHERE ${where.join(' AND ')}` : ''} ORDER BY id`;
    const rows = await this.db.prepare(sql).bind(...params).all();

    const patterns: RecurringPattern[] = [];
    for (const row of rows) {
      const id = readNumber(row, 'id');
      patterns.push(rowToPattern(row, await this.getStudentLinks(id)));
    }
    return patterns;
  }

  async insertPattern(input: PatternInput): Promise<RecurringPattern> {
    if (!this.queued) return this.transaction(tx => tx.insertPattern(input));
    const now = this.timestamp();
    const result = await this.db.prepare(`
      INSERT INTO recurring_patterns (
        studio_id, teacher_id, room_id, day_of_week, start_time, duration_minutes,
        valid_from, valid_until, is_active, notes, version, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, ?, 1, ?, ?)
    `).bind(
      input.studioId,
      input.teacherId,
      input.roomId,
      input.dayOfWeek,
      input.startTime,
      input.durationMinutes,
      input.validFrom,
      input.validUntil,
      input.notes,
      now,
      now
    ).run();

    await this.setStudentLinks(result.lastRowId, input.studentIds);

    const pattern = await this.getPattern(result.lastRowId);
    if (!pattern) throw new PatternNotFoundError(result.lastRowId);
    return pattern;
  }

  async updatePattern(id: PatternId, changes: PatternChanges, expectedVersion: number): Promise<RecurringPattern> {
    if (!this.queued) return this.transaction(tx => tx.updatePattern(id, changes, expectedVersion));
    const sets: string[] = [];
    const params: SqlValue[] = [];

    for (const [key, column] of PATTERN_COLUMNS) {
      const value = changes[key];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      params.push(toSqlValue(value));
    }
    sets.push('version = version + 1', 'updated_at = ?');
    params.push(this.timestamp());

    const result = await this.db.prepare(`
      UPDATE recurring_patterns SET ${sets.join(', ')} WHERE id = ? AND version = ?
    `).bind(...params, id, expectedVersion).run();

    if (result.changes === 0) {
      const exists = await this.db.prepare('SELECT id FROM recurring_patterns WHERE id = ?').bind(id).first();
      if (!exists) throw new PatternNotFoundError(id);
      throw new ConcurrentModificationError(id, expectedVersion);
    }

    const pattern = await this.getPattern(id);
    if (!pattern) throw new PatternNotFoundError(id);
    return pattern;
  }

  async deletePattern(id: PatternId): Promise<boolean> {
    if (!this.queued) return this.transaction(tx => tx.deletePattern(id));
    await this.db.prepare(`
      DELETE FROM lesson_students WHERE lesson_id IN (SELECT id FROM lessons WHERE pattern_id = ?)
    `).bind(id).run();
    await this.db.prepare('DELETE FROM lessons WHERE pattern_id = ?').bind(id).run();
    await this.db.prepare('DELETE FROM pattern_students WHERE pattern_id = ?').bind(id).run();
    const result = await this.db.prepare('DELETE FROM recurring_patterns WHERE id = ?').bind(id).run();
    return result.changes > 0;
  }

  async getStudentLinks(patternId: PatternId): Promise<StudentId[]> {
    if (!this.queued) return this.read(store => store.getStudentLinks(patternId));
    const rows = await this.db.prepare(
      'SELECT student_id FROM pattern_students WHERE pattern_id = ? ORDER BY student_id'
    ).bind(patternId).all();
    return rows.map(r => readNumber(r, 'student_id'));
  }

  async setStudentLinks(patternId: PatternId, studentIds: StudentId[]): Promise<void> {
    if (!this.queued) return this.transaction(tx => tx.setStudentLinks(patternId, studentIds));
    await this.db.prepare('DELETE FROM pattern_students WHERE pattern_id = ?').bind(patternId).run();
    for (const studentId of new Set(studentIds)) {
      await this.db.prepare(
        'INSERT INTO pattern_students (pattern_id, student_id) VALUES (?, ?)'
      ).bind(patternId, studentId).run();
    }
  }

  // ==========================================================================
  // Lessons
  // ==========================================================================

  private async attachAttendance(rows: Row[]): Promise<LessonOccurrence[]> {
    if (rows.length === 0) return [];

    const ids = rows.map(r => readNumber(r, 'id'));
    const attendanceRows = await this.db.prepare(`
      SELECT lesson_id, student_id, attendance_status
      FROM lesson_students
      WHERE lesson_id IN (${placeholders(ids.length)})
      ORDER BY student_id
    `).bind(...ids).all();

    const byLesson = new Map<LessonId, AttendanceRecord[]>();
    for (const row of attendanceRows) {
      const lessonId = readNumber(row, 'lesson_id');
      const list = byLesson.get(lessonId) || [];
      list.push({
        lessonId,
        studentId: readNumber(row, 'student_id'),
        status: toAttendanceStatus(readString(row, 'attendance_status')),
      });
      byLesson.set(lessonId, list);
    }

    return rows.map(row => rowToLesson(row, byLesson.get(readNumber(row, 'id')) || []));
  }

  async getOccurrence(id: LessonId): Promise<LessonOccurrence | null> {
    if (!this.queued) return this.read(store => store.getOccurrence(id));
    const row = await this.db.prepare('SELECT * FROM lessons WHERE id = ?').bind(id).first();
    if (!row) return null;
    const [lesson] = await this.attachAttendance([row]);
    return lesson;
  }

  async getOccurrencesInRange(query: OccurrenceRangeQuery): Promise<LessonOccurrence[]> {
    if (!this.queued) return this.read(store => store.getOccurrencesInRange(query));
    const where: string[] = ['l.lesson_date BETWEEN ? AND ?'];
    const params: SqlValue[] = [query.dateFrom, query.dateTo];

    if (query.studioId !== undefined) {
      where.push('l.studio_id = ?');
      params.push(query.studioId);
    }
    if (!query.includeCancelled) {
      where.push("l.status != 'cancelled'");
    }

    // Resource filters: match lessons that use any of the given resources
    const resources: string[] = [];
    if (query.teacherId !== undefined) {
      resources.push('l.teacher_id = ?');
      params.push(query.teacherId);
    }
    if (query.roomId !== undefined && query.roomId !== null) {
      resources.push('l.room_id = ?');
      params.push(query.roomId);
    }
    if (query.studentIds && query.studentIds.length > 0) {
      resources.push(`EXISTS (
        SELECT 1 FROM lesson_students ls
        WHERE ls.lesson_id = l.id AND ls.student_id IN (${placeholders(query.studentIds.length)})
      )`);
      params.push(...query.studentIds);
    }
    if (resources.length > 0) {
      where.push(`(${resources.join(' OR ')})`);
    }

    const rows = await this.db.prepare(`
      SELECT l.* FROM lessons l
      WHERE ${where.join(' AND ')}
      ORDER BY l.lesson_date, l.start_time, l.id
    `).bind(...params).all();

    return this.attachAttendance(rows);
  }

  async getPatternOccurrences(patternId: PatternId, fromDate?: IsoDate): Promise<LessonOccurrence[]> {
    if (!this.queued) return this.read(store => store.getPatternOccurrences(patternId, fromDate));
    const rows = fromDate
      ? await this.db.prepare(
          'SELECT * FROM lessons WHERE pattern_id = ? AND lesson_date >= ? ORDER BY lesson_date, id'
        ).bind(patternId, fromDate).all()
      : await this.db.prepare(
          'SELECT * FROM lessons WHERE pattern_id = ? ORDER BY lesson_date, id'
        ).bind(patternId).all();
    return this.attachAttendance(rows);
  }

  async upsertOccurrence(draft: OccurrenceDraft): Promise<LessonOccurrence> {
    if (!this.queued) return this.transaction(tx => tx.upsertOccurrence(draft));
    const now = this.timestamp();
    let id: LessonId;

    if (draft.id !== undefined) {
      id = draft.id;
      await this.db.prepare(`
        UPDATE lessons SET
          studio_id = ?, teacher_id = ?, room_id = ?, pattern_id = ?,
          lesson_date = ?, original_date = ?, start_time = ?, end_time = ?,
          status = ?, is_exception = ?, cancellation_reason = ?, notes = ?, updated_at = ?
        WHERE id = ?
      `).bind(
        draft.studioId,
        draft.teacherId,
        draft.roomId,
        draft.patternId,
        draft.date,
        draft.originalDate,
        draft.startTime,
        draft.endTime,
        draft.status,
        toSqlValue(draft.isException),
        draft.cancellationReason,
        draft.notes,
        now,
        id
      ).run();
    } else {
      const result = await this.db.prepare(`
        INSERT INTO lessons (
          studio_id, teacher_id, room_id, pattern_id, lesson_date, original_date,
          start_time, end_time, status, is_exception, cancellation_reason, notes,
          created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).bind(
        draft.studioId,
        draft.teacherId,
        draft.roomId,
        draft.patternId,
        draft.date,
        draft.originalDate,
        draft.startTime,
        draft.endTime,
        draft.status,
        toSqlValue(draft.isException),
        draft.cancellationReason,
        draft.notes,
        now,
        now
      ).run();
      id = result.lastRowId;
    }

    // Attendance follows the draft exactly
    const keep = draft.attendance.map(a => a.studentId);
    if (keep.length > 0) {
      await this.db.prepare(
        `DELETE FROM lesson_students WHERE lesson_id = ? AND student_id NOT IN (${placeholders(keep.length)})`
      ).bind(id, ...keep).run();
    } else {
      await this.db.prepare('DELETE FROM lesson_students WHERE lesson_id = ?').bind(id).run();
    }
    for (const record of draft.attendance) {
      await this.setAttendance(id, record.studentId, record.status);
    }

    const lesson = await this.getOccurrence(id);
    if (!lesson) throw new Error(`Lesson ${id} vanished during write`);
    return lesson;
  }

  async deleteOccurrences(ids: LessonId[]): Promise<number> {
    if (!this.queued) return this.transaction(tx => tx.deleteOccurrences(ids));
    if (ids.length === 0) return 0;

    await this.db.prepare(
      `DELETE FROM lesson_students WHERE lesson_id IN (${placeholders(ids.length)})`
    ).bind(...ids).run();
    const result = await this.db.prepare(
      `DELETE FROM lessons WHERE id IN (${placeholders(ids.length)})`
    ).bind(...ids).run();
    return result.changes;
  }

  async setAttendance(lessonId: LessonId, studentId: StudentId, status: AttendanceStatus): Promise<void> {
    if (!this.queued) return this.transaction(tx => tx.setAttendance(lessonId, studentId, status));
    await this.db.prepare(`
      INSERT INTO lesson_students (lesson_id, student_id, attendance_status) VALUES (?, ?, ?)
      ON CONFLICT (lesson_id, student_id) DO UPDATE SET attendance_status = excluded.attendance_status
    `).bind(lessonId, studentId, status).run();
  }

  async removeAttendance(lessonId: LessonId, studentId: StudentId): Promise<void> {
    if (!this.queued) return this.transaction(tx => tx.removeAttendance(lessonId, studentId));
    await this.db.prepare(
      'DELETE FROM lesson_students WHERE lesson_id = ? AND student_id = ?'
    ).bind(lessonId, studentId).run();
  }
}

/**
 * Open (or create) a database and return a migrated store.
 */
export async function openPatternStore(
  filename?: string | null,
  now?: () => Date
): Promise<SqlPatternStore> {
  const db = await Database.open(filename);
  const store = new SqlPatternStore(db, false, now);
  store.migrate();
  db.persist();
  return store;
}
