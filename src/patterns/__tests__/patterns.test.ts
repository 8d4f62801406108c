import { describe, expect, it } from 'vitest';
import {
  countGeneratedLessons,
  createPattern,
  deactivatePattern,
  deletePattern,
  getPattern,
  listPatterns,
  updatePattern,
} from '..';
import { createException, createLesson, deleteLesson } from '../../lessons';
import { generateLessons } from '../../scheduler';
import {
  ConcurrentModificationError,
  PatternNotFoundError,
  UpdateConflictError,
  ValidationError,
} from '../../errors';
import type { PatternInputDraft } from '../../validation';
import { createTestEnv, dates, mondayPattern } from '../../__tests__/fixtures';

describe('createPattern', () => {
  it('stores the pattern and generates up to the default horizon', async () => {
    const { ctx } = await createTestEnv();

    const { pattern, generation } = await createPattern(ctx, mondayPattern());

    expect(pattern).toMatchObject({ id: 1, version: 1, isActive: true, studentIds: [101] });
    expect(dates(generation.created)).toEqual(['2024-01-01', '2024-01-08', '2024-01-15']);
  });

  it('fills in the default duration', async () => {
    const { ctx } = await createTestEnv({ defaultDurationMinutes: 45 });
    const { durationMinutes: _omitted, ...input } = mondayPattern();

    const { pattern, generation } = await createPattern(ctx, input);

    expect(pattern.durationMinutes).toBe(45);
    expect(generation.created[0].endTime).toBe('10:45');
  });

  it('does not generate dates before today', async () => {
    const { ctx } = await createTestEnv();

    const { generation } = await createPattern(ctx, mondayPattern({ validFrom: '2023-12-04' }));

    expect(dates(generation.created)).toEqual(['2024-01-01', '2024-01-08', '2024-01-15']);
  });

  it('reports lessons it could not place', async () => {
    const { ctx } = await createTestEnv();
    await createPattern(ctx, mondayPattern());

    const { generation } = await createPattern(ctx, mondayPattern({
      teacherId: 9,
      startTime: '10:30',
      durationMinutes: 30,
      studentIds: [107],
    }));

    expect(generation.created).toEqual([]);
    expect(generation.skipped.map(s => [s.date, s.reason])).toEqual([
      ['2024-01-01', 'room conflict'],
      ['2024-01-08', 'room conflict'],
      ['2024-01-15', 'room conflict'],
    ]);
  });

  const invalid: Array<[string, Partial<PatternInputDraft>]> = [
    ['dayOfWeek', { dayOfWeek: 8 }],
    ['durationMinutes', { durationMinutes: 20 }],
    ['startTime', { startTime: '25:00' }],
    ['validUntil', { validUntil: '2023-12-31' }],
    ['durationMinutes', { startTime: '23:30', durationMinutes: 60 }],
  ];

  it.each(invalid)('rejects an invalid %s', async (path, overrides) => {
    const { ctx } = await createTestEnv();

    const error = await createPattern(ctx, { ...mondayPattern(), ...overrides }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.issues.map(i => i.path)).toContain(path);
    }
    expect(await listPatterns(ctx)).toEqual([]);
  });
});

describe('reading patterns', () => {
  it('lists by studio and counts lessons', async () => {
    const { ctx } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());
    await createPattern(ctx, mondayPattern({ studioId: 2, teacherId: 8 }));

    expect((await listPatterns(ctx, { studioId: 1 })).map(p => p.id)).toEqual([pattern.id]);
    expect(await countGeneratedLessons(ctx, pattern.id)).toBe(3);
    expect(await countGeneratedLessons(ctx, pattern.id, '2024-01-08')).toBe(2);
  });

  it('fails for an unknown pattern', async () => {
    const { ctx } = await createTestEnv();
    await expect(getPattern(ctx, 5)).rejects.toThrow('Recurring pattern 5 not found');
  });
});

describe('updatePattern', () => {
  it('moves forward lessons to a free room', async () => {
    const { ctx } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());

    const result = await updatePattern(ctx, pattern.id, { roomId: 5 });

    expect(result.pattern.roomId).toBe(5);
    expect(result.pattern.version).toBe(2);
    expect(result.updated.map(l => [l.date, l.roomId])).toEqual([
      ['2024-01-01', 5],
      ['2024-01-08', 5],
      ['2024-01-15', 5],
    ]);
    expect(result.flagged).toEqual([]);
    expect(result.conflicts).toEqual([]);
  });

  it('rejects the whole update when the new room is busy on one date', async () => {
    const { ctx, store } = await createTestEnv();
    const busy = await createLesson(ctx, {
      studioId: 1,
      teacherId: 8,
      roomId: 5,
      date: '2024-01-08',
      startTime: '10:00',
    });
    const { pattern } = await createPattern(ctx, mondayPattern());

    const error = await updatePattern(ctx, pattern.id, { roomId: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpdateConflictError);
    if (error instanceof UpdateConflictError) {
      expect(error.dates).toEqual(['2024-01-08']);
      expect(error.conflicts.map(c => [c.resource, c.occurrenceId])).toEqual([['room', busy.id]]);
    }

    const unchanged = await getPattern(ctx, pattern.id);
    expect(unchanged.roomId).toBe(3);
    expect(unchanged.version).toBe(1);
    const lessons = await store.getPatternOccurrences(pattern.id);
    expect(lessons.map(l => l.roomId)).toEqual([3, 3, 3]);
  });

  it('flags conflicting lessons as exceptions when forced', async () => {
    const { ctx } = await createTestEnv();
    await createLesson(ctx, { studioId: 1, teacherId: 8, roomId: 5, date: '2024-01-08', startTime: '10:00' });
    const { pattern } = await createPattern(ctx, mondayPattern());

    const result = await updatePattern(ctx, pattern.id, { roomId: 5 }, { force: true });

    expect(result.updated.map(l => [l.date, l.roomId])).toEqual([['2024-01-01', 5], ['2024-01-15', 5]]);
    expect(result.flagged).toHaveLength(1);
    expect(result.flagged[0]).toMatchObject({ date: '2024-01-08', roomId: 3, isException: true });
    expect(result.conflicts).toHaveLength(1);
  });

  it('leaves exceptions alone on a time change', async () => {
    const { ctx, store } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern());
    const moved = await createException(ctx, generation.created[1].id, { startTime: '14:00' });

    const result = await updatePattern(ctx, pattern.id, { startTime: '11:00' });

    expect(result.updated.map(l => [l.date, l.startTime, l.endTime])).toEqual([
      ['2024-01-01', '11:00', '12:00'],
      ['2024-01-15', '11:00', '12:00'],
    ]);
    const exception = await store.getOccurrence(moved.id);
    expect(exception).toMatchObject({ startTime: '14:00', endTime: '15:00', isException: true });
  });

  it('prunes lessons past a shortened end date', async () => {
    const { ctx, store } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern());

    const result = await updatePattern(ctx, pattern.id, { validUntil: '2024-01-08' });

    expect(result.removed).toEqual([generation.created[2].id]);
    expect(dates(await store.getPatternOccurrences(pattern.id))).toEqual(['2024-01-01', '2024-01-08']);
  });

  it('keeps completed lessons when shortening', async () => {
    const { ctx, store } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern());
    const last = generation.created[2];
    await store.upsertOccurrence({
      ...last,
      status: 'completed',
      attendance: last.attendance.map(a => ({ studentId: a.studentId, status: a.status })),
    });

    const result = await updatePattern(ctx, pattern.id, { validUntil: '2024-01-01' });

    expect(result.removed).toEqual([generation.created[1].id]);
    expect(dates(await store.getPatternOccurrences(pattern.id))).toEqual(['2024-01-01', '2024-01-15']);
  });

  it('generates the range opened by an extended end date', async () => {
    const { ctx } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern({ validUntil: '2024-01-08' }));
    expect(generation.created).toHaveLength(2);

    const result = await updatePattern(ctx, pattern.id, { validUntil: null });

    expect(result.generation && dates(result.generation.created)).toEqual(['2024-01-15']);
  });

  it('re-seeds attendance when students change', async () => {
    const { ctx } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern());
    await createException(ctx, generation.created[0].id, { notes: 'moved' });

    const result = await updatePattern(ctx, pattern.id, { studentIds: [102, 103] });

    expect(result.pattern.studentIds).toEqual([102, 103]);
    expect(result.updated.map(l => l.date)).toEqual(['2024-01-08', '2024-01-15']);
    expect(result.updated[0].attendance.map(a => [a.studentId, a.status])).toEqual([
      [102, 'scheduled'],
      [103, 'scheduled'],
    ]);
  });

  it('rewrites notes on forward lessons', async () => {
    const { ctx } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());

    const result = await updatePattern(ctx, pattern.id, { notes: 'Bring scales' });

    expect(result.updated.map(l => l.notes)).toEqual(['Bring scales', 'Bring scales', 'Bring scales']);
  });

  it('rejects a stale version', async () => {
    const { ctx } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());
    await updatePattern(ctx, pattern.id, { notes: 'first', expectedVersion: 1 });

    await expect(updatePattern(ctx, pattern.id, { notes: 'second', expectedVersion: 1 }))
      .rejects.toThrow(ConcurrentModificationError);
  });

  it('rejects an end date before the start', async () => {
    const { ctx } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());

    await expect(updatePattern(ctx, pattern.id, { validUntil: '2023-12-01' })).rejects.toThrow(ValidationError);
  });
});

describe('deactivation', () => {
  it('stops generation but keeps lessons', async () => {
    const { ctx, store } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());

    const result = await deactivatePattern(ctx, pattern.id);

    expect(result.pattern.isActive).toBe(false);
    expect(await store.getPatternOccurrences(pattern.id)).toHaveLength(3);
    const more = await generateLessons(ctx, pattern.id, '2024-01-29');
    expect(more.created).toEqual([]);
  });

  it('fills gaps again on reactivation', async () => {
    const { ctx } = await createTestEnv();
    const { pattern, generation } = await createPattern(ctx, mondayPattern());
    await deactivatePattern(ctx, pattern.id);
    await deleteLesson(ctx, generation.created[2].id);

    const result = await updatePattern(ctx, pattern.id, { isActive: true });

    expect(result.generation && dates(result.generation.created)).toEqual(['2024-01-15']);
    expect(result.generation?.alreadyMaterialized).toEqual(['2024-01-01', '2024-01-08']);
  });
});

describe('deletePattern', () => {
  it('removes the pattern and its lessons', async () => {
    const { ctx, store } = await createTestEnv();
    const { pattern } = await createPattern(ctx, mondayPattern());

    const result = await deletePattern(ctx, pattern.id);

    expect(result).toEqual({ patternId: pattern.id, deletedLessons: 3 });
    await expect(getPattern(ctx, pattern.id)).rejects.toThrow(PatternNotFoundError);
    expect(await store.getOccurrencesInRange({ dateFrom: '2024-01-01', dateTo: '2024-12-31', includeCancelled: true }))
      .toEqual([]);
  });

  it('fails for an unknown pattern', async () => {
    const { ctx } = await createTestEnv();
    await expect(deletePattern(ctx, 3)).rejects.toThrow(PatternNotFoundError);
  });
});
