/**
 * Shared test setup: an in-memory store and a context pinned to
 * Monday 2024-01-01 08:00 UTC.
 */

import { createContext, type SchedulingContext } from '../context';
import type { SchedulingSettings } from '../config';
import { openPatternStore, type SqlPatternStore } from '../store';
import type { LessonOccurrence, PatternInput, ProgressCallback } from '../types';

export const NOW = new Date('2024-01-01T08:00:00Z');

export interface TestEnv {
  store: SqlPatternStore;
  ctx: SchedulingContext;
}

export async function createTestEnv(
  settings: Partial<SchedulingSettings> = {},
  onProgress?: ProgressCallback
): Promise<TestEnv> {
  const store = await openPatternStore(null, () => NOW);
  const ctx = createContext(store, { settings, clock: () => NOW, onProgress });
  return { store, ctx };
}

/** Mondays 10:00-11:00, teacher 7, room 3, student 101, from 2024-01-01. */
export function mondayPattern(overrides: Partial<PatternInput> = {}): PatternInput {
  return {
    studioId: 1,
    teacherId: 7,
    roomId: 3,
    dayOfWeek: 1,
    startTime: '10:00',
    durationMinutes: 60,
    validFrom: '2024-01-01',
    validUntil: null,
    notes: null,
    studentIds: [101],
    ...overrides,
  };
}

export function dates(lessons: LessonOccurrence[]): string[] {
  return lessons.map(l => l.date);
}
