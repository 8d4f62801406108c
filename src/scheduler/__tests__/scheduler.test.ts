import { describe, expect, it } from 'vitest';
import {
  assertHorizon,
  defaultHorizon,
  ensureStudioHorizon,
  generateAllPatterns,
  generateLessons,
} from '..';
import { HorizonTooLargeError, PatternNotFoundError, ValidationError } from '../../errors';
import type { ProgressReport } from '../../types';
import { createTestEnv, dates, mondayPattern } from '../../__tests__/fixtures';

describe('generateLessons', () => {
  it('creates one lesson per Monday up to the horizon', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());

    const result = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(dates(result.created)).toEqual(['2024-01-01', '2024-01-08', '2024-01-15', '2024-01-22']);
    expect(result.skipped).toEqual([]);
    expect(result.created[0]).toMatchObject({
      patternId: pattern.id,
      originalDate: '2024-01-01',
      startTime: '10:00',
      endTime: '11:00',
      status: 'scheduled',
      isException: false,
      attendance: [{ studentId: 101, status: 'scheduled' }],
    });
  });

  it('skips a date whose room is taken by another pattern', async () => {
    const { store, ctx } = await createTestEnv();
    const other = await store.insertPattern(mondayPattern({
      teacherId: 8,
      studentIds: [],
      validFrom: '2024-01-08',
      validUntil: '2024-01-08',
    }));
    const [blocker] = (await generateLessons(ctx, other.id, '2024-01-22')).created;

    const pattern = await store.insertPattern(mondayPattern());
    const result = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(dates(result.created)).toEqual(['2024-01-01', '2024-01-15', '2024-01-22']);
    expect(result.skipped).toEqual([{
      date: '2024-01-08',
      reason: 'room conflict',
      conflicts: [{
        resource: 'room',
        resourceIds: [3],
        occurrenceId: blocker.id,
        date: '2024-01-08',
        overlapStart: '10:00',
        overlapEnd: '11:00',
      }],
    }]);
  });

  it('does not duplicate lessons on a second run', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());

    await generateLessons(ctx, pattern.id, '2024-01-22');
    const second = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(second.created).toEqual([]);
    expect(second.alreadyMaterialized).toEqual(['2024-01-01', '2024-01-08', '2024-01-15', '2024-01-22']);
    expect(await store.getPatternOccurrences(pattern.id)).toHaveLength(4);
  });

  it('only generates the dates past a previous horizon', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());

    await generateLessons(ctx, pattern.id, '2024-01-08');
    const result = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(dates(result.created)).toEqual(['2024-01-15', '2024-01-22']);
    expect(result.alreadyMaterialized).toEqual(['2024-01-01', '2024-01-08']);
  });

  it('starts at the given date', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());

    const result = await generateLessons(ctx, pattern.id, '2024-01-22', { from: '2024-01-10' });

    expect(dates(result.created)).toEqual(['2024-01-15', '2024-01-22']);
  });

  it('does nothing for an inactive pattern', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());
    await store.updatePattern(pattern.id, { isActive: false }, 1);

    const result = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(result).toEqual({ patternId: pattern.id, created: [], skipped: [], alreadyMaterialized: [] });
  });

  it('skips a date on which a student is already booked', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern({ roomId: null }));
    await store.upsertOccurrence({
      studioId: 1,
      teacherId: 9,
      roomId: 4,
      patternId: null,
      date: '2024-01-15',
      originalDate: null,
      startTime: '09:30',
      endTime: '10:30',
      status: 'scheduled',
      isException: false,
      cancellationReason: null,
      notes: null,
      attendance: [{ studentId: 101, status: 'scheduled' }],
    });

    const result = await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(result.skipped.map(s => [s.date, s.reason])).toEqual([['2024-01-15', 'student conflict']]);
    expect(result.skipped[0].conflicts[0].resourceIds).toEqual([101]);
  });

  it('ignores cancelled lessons when checking', async () => {
    const { store, ctx } = await createTestEnv();
    await store.upsertOccurrence({
      studioId: 1,
      teacherId: 8,
      roomId: 3,
      patternId: null,
      date: '2024-01-08',
      originalDate: null,
      startTime: '10:00',
      endTime: '11:00',
      status: 'cancelled',
      isException: false,
      cancellationReason: 'ill',
      notes: null,
      attendance: [],
    });
    const pattern = await store.insertPattern(mondayPattern());

    const result = await generateLessons(ctx, pattern.id, '2024-01-08');

    expect(dates(result.created)).toEqual(['2024-01-01', '2024-01-08']);
  });

  it('reports progress phases', async () => {
    const phases: ProgressReport['phase'][] = [];
    const { store, ctx } = await createTestEnv({}, p => phases.push(p.phase));
    const pattern = await store.insertPattern(mondayPattern());

    await generateLessons(ctx, pattern.id, '2024-01-22');

    expect(phases).toEqual(['initializing', 'checking', 'persisting', 'complete']);
  });

  it('fails for an unknown pattern', async () => {
    const { ctx } = await createTestEnv();
    await expect(generateLessons(ctx, 99, '2024-01-22')).rejects.toThrow(PatternNotFoundError);
  });
});

describe('horizon', () => {
  it('defaults to today plus the generation window', async () => {
    const { ctx } = await createTestEnv();
    expect(defaultHorizon(ctx)).toBe('2024-01-15');
  });

  it('accepts the last day of the maximum window', async () => {
    const { ctx } = await createTestEnv({ maxHorizonWeeks: 4 });
    expect(() => assertHorizon(ctx, '2024-01-29')).not.toThrow();
  });

  it('rejects a horizon beyond the maximum window', async () => {
    const { store, ctx } = await createTestEnv({ maxHorizonWeeks: 4 });
    const pattern = await store.insertPattern(mondayPattern());

    await expect(generateLessons(ctx, pattern.id, '2024-01-30')).rejects.toThrow(HorizonTooLargeError);
    expect(await store.getPatternOccurrences(pattern.id)).toEqual([]);
  });

  it('rejects a malformed horizon', async () => {
    const { ctx } = await createTestEnv();
    expect(() => assertHorizon(ctx, '2024-13-01')).toThrow(ValidationError);
  });
});

describe('generateAllPatterns', () => {
  it('generates every active pattern of a studio', async () => {
    const { store, ctx } = await createTestEnv();
    await store.insertPattern(mondayPattern());
    await store.insertPattern(mondayPattern({ dayOfWeek: 3, startTime: '16:00' }));
    await store.insertPattern(mondayPattern({ studioId: 2, teacherId: 8, roomId: 1 }));
    const inactive = await store.insertPattern(mondayPattern({ dayOfWeek: 5 }));
    await store.updatePattern(inactive.id, { isActive: false }, 1);

    const run = await generateAllPatterns(ctx, '2024-01-15', { studioId: 1 });

    expect(run.horizonEnd).toBe('2024-01-15');
    expect(run.failures).toEqual([]);
    expect(run.results.map(r => [r.patternId, r.created.length])).toEqual([[1, 3], [2, 2]]);
    expect(run.generatedAt).toBe('2024-01-01T08:00:00.000Z');
  });

  it('uses the default horizon', async () => {
    const { store, ctx } = await createTestEnv();
    await store.insertPattern(mondayPattern());

    const run = await generateAllPatterns(ctx);

    expect(run.horizonEnd).toBe('2024-01-15');
    expect(dates(run.results[0].created)).toEqual(['2024-01-01', '2024-01-08', '2024-01-15']);
  });
});

describe('ensureStudioHorizon', () => {
  it('tops up patterns that fall short of the horizon', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());
    await generateLessons(ctx, pattern.id, '2024-01-01');

    const run = await ensureStudioHorizon(ctx, 1);

    expect(run.results).toHaveLength(1);
    expect(dates(run.results[0].created)).toEqual(['2024-01-08', '2024-01-15']);
  });

  it('leaves patterns alone once they reach the horizon', async () => {
    const { store, ctx } = await createTestEnv();
    const pattern = await store.insertPattern(mondayPattern());
    await generateLessons(ctx, pattern.id, '2024-01-15');

    const run = await ensureStudioHorizon(ctx, 1);

    expect(run.results).toEqual([]);
  });

  it('treats a pattern as complete once it holds its last slot before the horizon', async () => {
    const { store, ctx } = await createTestEnv();
    const tuesday = await store.insertPattern(mondayPattern({ dayOfWeek: 2 }));
    const first = await generateLessons(ctx, tuesday.id, '2024-01-15');
    expect(dates(first.created)).toEqual(['2024-01-02', '2024-01-09']);

    const run = await ensureStudioHorizon(ctx, 1);

    expect(run.results).toEqual([]);
  });

  it('skips patterns that already ended', async () => {
    const { store, ctx } = await createTestEnv();
    await store.insertPattern(mondayPattern({ validFrom: '2023-10-02', validUntil: '2023-12-25' }));

    const run = await ensureStudioHorizon(ctx, 1);

    expect(run.results).toEqual([]);
  });
});
