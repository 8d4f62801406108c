/**
 * Core domain types for lesson scheduling
 */

// Unique identifiers (owned by other services, referenced by id only)
export type StudioId = number;
export type TeacherId = number;
export type RoomId = number;
export type StudentId = number;
export type PatternId = number;
export type LessonId = number;

// Time representation
export type IsoDate = string;    // YYYY-MM-DD
export type ClockTime = string;  // HH:MM, 24h
export type DayOfWeek = 1 | 2 | 3 | 4 | 5 | 6 | 7; // ISO: 1 = Monday

export const LESSON_STATUSES = ['scheduled', 'completed', 'cancelled', 'missed'] as const;
export type LessonStatus = typeof LESSON_STATUSES[number];

export const ATTENDANCE_STATUSES = ['scheduled', 'attended', 'missed', 'cancelled'] as const;
export type AttendanceStatus = typeof ATTENDANCE_STATUSES[number];

// Recurring patterns
export interface RecurringPattern {
  id: PatternId;
  studioId: StudioId;
  teacherId: TeacherId;
  roomId: RoomId | null;        // null = online lesson
  dayOfWeek: DayOfWeek;
  startTime: ClockTime;
  durationMinutes: number;
  validFrom: IsoDate;
  validUntil: IsoDate | null;   // null = open-ended
  isActive: boolean;
  notes: string | null;
  studentIds: StudentId[];
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface PatternInput {
  studioId: StudioId;
  teacherId: TeacherId;
  roomId: RoomId | null;
  dayOfWeek: DayOfWeek;
  startTime: ClockTime;
  durationMinutes: number;
  validFrom: IsoDate;
  validUntil: IsoDate | null;
  notes: string | null;
  studentIds: StudentId[];
}

export interface PatternDelta {
  roomId?: RoomId | null;
  startTime?: ClockTime;
  durationMinutes?: number;
  validUntil?: IsoDate | null;
  isActive?: boolean;
  notes?: string | null;
  studentIds?: StudentId[];
  expectedVersion?: number;
}

export type PatternChanges = Omit<PatternDelta, 'studentIds' | 'expectedVersion'>;

// Concrete lessons
export interface AttendanceRecord {
  lessonId: LessonId;
  studentId: StudentId;
  status: AttendanceStatus;
}

export interface LessonOccurrence {
  id: LessonId;
  studioId: StudioId;
  teacherId: TeacherId;
  roomId: RoomId | null;
  patternId: PatternId | null;   // null = one-off lesson
  date: IsoDate;
  originalDate: IsoDate | null;  // date the pattern generated it for
  startTime: ClockTime;
  endTime: ClockTime;
  status: LessonStatus;
  isException: boolean;
  cancellationReason: string | null;
  notes: string | null;
  attendance: AttendanceRecord[];
}

export type OccurrenceDraft = Omit<LessonOccurrence, 'id' | 'attendance'> & {
  id?: LessonId;
  attendance: Array<Pick<AttendanceRecord, 'studentId' | 'status'>>;
};

export interface LessonInput {
  studioId: StudioId;
  teacherId: TeacherId;
  roomId: RoomId | null;
  date: IsoDate;
  startTime: ClockTime;
  durationMinutes: number;
  notes: string | null;
  studentIds: StudentId[];
}

export interface ExceptionChanges {
  date?: IsoDate;
  startTime?: ClockTime;
  durationMinutes?: number;
  roomId?: RoomId | null;
  notes?: string | null;
  cancel?: { reason: string | null };
}

// Calendar output
export interface OccurrenceSlot {
  date: IsoDate;
  startTime: ClockTime;
  endTime: ClockTime;
}

// Conflicts
export type ResourceType = 'teacher' | 'room' | 'student';

export interface Booking {
  id: LessonId | null;
  date: IsoDate;
  startTime: ClockTime;
  endTime: ClockTime;
  teacherId: TeacherId;
  roomId: RoomId | null;
  studentIds: StudentId[];
  status?: LessonStatus;
}

export interface ConflictDescriptor {
  resource: ResourceType;
  resourceIds: number[];
  occurrenceId: LessonId | null;
  date: IsoDate;
  overlapStart: ClockTime;
  overlapEnd: ClockTime;
}

// Generation output
export interface SkippedOccurrence {
  date: IsoDate;
  reason: string;
  conflicts: ConflictDescriptor[];
}

export interface GenerationResult {
  patternId: PatternId;
  created: LessonOccurrence[];
  skipped: SkippedOccurrence[];
  alreadyMaterialized: IsoDate[];
}

export interface GenerationRunFailure {
  patternId: PatternId;
  message: string;
}

export interface GenerationRun {
  horizonEnd: IsoDate;
  results: GenerationResult[];
  failures: GenerationRunFailure[];
  generatedAt: string;
}

// Schedule views
export interface ScheduleItem {
  lessonId: LessonId;
  studioId: StudioId;
  date: IsoDate;
  startTime: ClockTime;
  endTime: ClockTime;
  status: LessonStatus;
  teacherId: TeacherId;
  roomId: RoomId | null;
  studentIds: StudentId[];
  isRecurring: boolean;
  isException: boolean;
  notes: string | null;
}

// Progress reporting
export interface ProgressCallback {
  (progress: ProgressReport): void;
}

export interface ProgressReport {
  phase: 'initializing' | 'checking' | 'persisting' | 'complete';
  percentComplete: number;
  currentOperation: string;
  stats?: {
    candidates?: number;
    created?: number;
    skipped?: number;
  };
}
