/**
 * Conflict Detector
 *
 * Decides whether bookings double-book a teacher, a room or a student.
 * Two bookings collide when they share a resource and their [start, end)
 * intervals overlap on the same date. Cancelled lessons never block.
 */

import { endToMinutes, fromMinutes, timesOverlap, toMinutes } from '../calendar';
import type {
  Booking,
  ConflictDescriptor,
  LessonOccurrence,
  ResourceType,
  StudentId,
} from '../types';

const RESOURCE_ORDER: ResourceType[] = ['teacher', 'room', 'student'];

export function toBooking(occurrence: LessonOccurrence): Booking {
  return {
    id: occurrence.id,
    date: occurrence.date,
    startTime: occurrence.startTime,
    endTime: occurrence.endTime,
    teacherId: occurrence.teacherId,
    roomId: occurrence.roomId,
    // A student who cancelled out of a lesson no longer occupies it
    studentIds: occurrence.attendance.filter(a => a.status !== 'cancelled').map(a => a.studentId),
    status: occurrence.status,
  };
}

function sharedStudents(a: Booking, b: Booking): StudentId[] {
  const other = new Set(b.studentIds);
  return [...new Set(a.studentIds.filter(id => other.has(id)))].sort((x, y) => x - y);
}

function overlapWindow(a: Booking, b: Booking): { overlapStart: string; overlapEnd: string } {
  return {
    overlapStart: fromMinutes(Math.max(toMinutes(a.startTime), toMinutes(b.startTime))),
    overlapEnd: fromMinutes(Math.min(endToMinutes(a.endTime), endToMinutes(b.endTime))),
  };
}

/**
 * Conflicts between one candidate and a set of existing bookings: one
 * descriptor per shared resource type per colliding booking.
 */
export function findConflicts(candidate: Booking, existing: Booking[]): ConflictDescriptor[] {
  const conflicts: ConflictDescriptor[] = [];

  for (const other of existing) {
    if (candidate.id !== null && other.id === candidate.id) continue;
    if (other.status === 'cancelled' || candidate.status === 'cancelled') continue;
    if (other.date !== candidate.date) continue;
    if (!timesOverlap(candidate.startTime, candidate.endTime, other.startTime, other.endTime)) continue;

    const window = overlapWindow(candidate, other);
    const base = { occurrenceId: other.id, date: candidate.date, ...window };

    if (other.teacherId === candidate.teacherId) {
      conflicts.push({ resource: 'teacher', resourceIds: [candidate.teacherId], ...base });
    }

    if (candidate.roomId !== null && other.roomId === candidate.roomId) {
      conflicts.push({ resource: 'room', resourceIds: [candidate.roomId], ...base });
    }

    const students = sharedStudents(candidate, other);
    if (students.length > 0) {
      conflicts.push({ resource: 'student', resourceIds: students, ...base });
    }
  }

  return conflicts;
}

/**
 * Human reason for a skipped candidate, e.g. "room conflict" or
 * "teacher conflict, student conflict".
 */
export function describeConflicts(conflicts: ConflictDescriptor[]): string {
  const types = new Set(conflicts.map(c => c.resource));
  return RESOURCE_ORDER
    .filter(type => types.has(type))
    .map(type => `${type} conflict`)
    .join(', ');
}

export function summarizeConflict(conflict: ConflictDescriptor): string {
  const who = conflict.resource === 'student'
    ? `Student(s) ${conflict.resourceIds.join(', ')}`
    : `${conflict.resource === 'teacher' ? 'Teacher' : 'Room'} ${conflict.resourceIds[0]}`;
  const against = conflict.occurrenceId === null ? 'another lesson in this batch' : `lesson ${conflict.occurrenceId}`;
  return `${who} double-booked on ${conflict.date} ${conflict.overlapStart}-${conflict.overlapEnd} with ${against}`;
}

export interface DoubleBooking {
  first: Booking;
  second: Booking;
  conflicts: ConflictDescriptor[];
}

/**
 * Every colliding pair within a set of bookings, each pair reported once.
 */
export function detectDoubleBookings(bookings: Booking[]): DoubleBooking[] {
  const result: DoubleBooking[] = [];

  // Group by date so only same-day bookings are compared
  const byDate = new Map<string, Booking[]>();
  for (const booking of bookings) {
    const list = byDate.get(booking.date) || [];
    list.push(booking);
    byDate.set(booking.date, list);
  }

  for (const [, sameDay] of byDate) {
    for (let i = 0; i < sameDay.length; i++) {
      for (let j = i + 1; j < sameDay.length; j++) {
        const conflicts = findConflicts(sameDay[i], [sameDay[j]]);
        if (conflicts.length > 0) {
          result.push({ first: sameDay[i], second: sameDay[j], conflicts });
        }
      }
    }
  }

  return result;
}

export function summarizeConflicts(conflicts: ConflictDescriptor[]): string {
  return conflicts.map(summarizeConflict).join('; ');
}
