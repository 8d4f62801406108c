import { describe, expect, it } from 'vitest';
import { getStudentSchedule, getStudioSchedule, getTeacherSchedule, resolveRange } from '..';
import { changeLessonStatus, createLesson } from '../../lessons';
import { InvalidRangeError, ValidationError } from '../../errors';
import { createTestEnv, mondayPattern } from '../../__tests__/fixtures';

describe('resolveRange', () => {
  it('defaults to a week from today', async () => {
    const { ctx } = await createTestEnv();
    expect(resolveRange(ctx)).toEqual({ from: '2024-01-01', to: '2024-01-07' });
    expect(resolveRange(ctx, { from: '2024-02-01' })).toEqual({ from: '2024-02-01', to: '2024-02-07' });
  });

  it('rejects bad ranges', async () => {
    const { ctx } = await createTestEnv();
    expect(() => resolveRange(ctx, { from: '2024-01-10', to: '2024-01-01' })).toThrow(InvalidRangeError);
    expect(() => resolveRange(ctx, { from: 'tomorrow' })).toThrow(ValidationError);
  });
});

describe('getStudioSchedule', () => {
  it('generates missing lessons before reading', async () => {
    const { store, ctx } = await createTestEnv();
    await store.insertPattern(mondayPattern());

    const items = await getStudioSchedule(ctx, 1, { from: '2024-01-01', to: '2024-01-14' });

    expect(items.map(i => [i.date, i.startTime, i.endTime, i.isRecurring])).toEqual([
      ['2024-01-01', '10:00', '11:00', true],
      ['2024-01-08', '10:00', '11:00', true],
    ]);
    expect(items[0]).toMatchObject({ studioId: 1, teacherId: 7, roomId: 3, studentIds: [101], status: 'scheduled' });
  });

  it('can leave out cancelled lessons', async () => {
    const { store, ctx } = await createTestEnv();
    await store.insertPattern(mondayPattern());
    const [first] = await getStudioSchedule(ctx, 1);
    await changeLessonStatus(ctx, first.lessonId, 'cancelled');

    const all = await getStudioSchedule(ctx, 1);
    const active = await getStudioSchedule(ctx, 1, { includeCancelled: false });

    expect(all.map(i => i.status)).toEqual(['cancelled']);
    expect(active).toEqual([]);
  });
});

describe('teacher and student schedules', () => {
  it('select lessons by resource', async () => {
    const { ctx } = await createTestEnv();
    await createLesson(ctx, { studioId: 1, teacherId: 7, date: '2024-01-02', startTime: '09:00', studentIds: [101] });
    await createLesson(ctx, { studioId: 1, teacherId: 8, date: '2024-01-02', startTime: '09:00', studentIds: [102] });
    await createLesson(ctx, { studioId: 2, teacherId: 7, date: '2024-01-03', startTime: '09:00', studentIds: [102] });

    const teacher = await getTeacherSchedule(ctx, 7);
    const teacherInStudio = await getTeacherSchedule(ctx, 7, { studioId: 2 });
    const student = await getStudentSchedule(ctx, 102);

    expect(teacher.map(i => [i.studioId, i.date])).toEqual([[1, '2024-01-02'], [2, '2024-01-03']]);
    expect(teacherInStudio.map(i => i.date)).toEqual(['2024-01-03']);
    expect(student.map(i => [i.teacherId, i.isRecurring])).toEqual([[8, false], [7, false]]);
  });
});
