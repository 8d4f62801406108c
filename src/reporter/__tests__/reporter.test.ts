import { describe, expect, it } from 'vitest';
import { dayName, generateRunReport, generateScheduleReport, runTotals } from '..';
import type { GenerationRun, ScheduleItem } from '../../types';

const run: GenerationRun = {
  horizonEnd: '2024-01-22',
  results: [{
    patternId: 1,
    created: [],
    skipped: [{ date: '2024-01-08', reason: 'room conflict', conflicts: [] }],
    alreadyMaterialized: ['2024-01-01'],
  }],
  failures: [{ patternId: 2, message: 'Recurring pattern 2 not found' }],
  generatedAt: '2024-01-01T08:00:00.000Z',
};

function item(overrides: Partial<ScheduleItem> = {}): ScheduleItem {
  return {
    lessonId: 1,
    studioId: 1,
    date: '2024-01-08',
    startTime: '10:00',
    endTime: '11:00',
    status: 'scheduled',
    teacherId: 7,
    roomId: 3,
    studentIds: [101],
    isRecurring: true,
    isException: false,
    notes: null,
    ...overrides,
  };
}

describe('run reports', () => {
  it('totals a run', () => {
    expect(runTotals(run)).toEqual({ patterns: 2, created: 0, skipped: 1, alreadyMaterialized: 1, failures: 1 });
  });

  it('renders markdown with skipped lessons and failures', () => {
    const lines = generateRunReport(run, { format: 'markdown' }).split('\n');

    expect(lines[0]).toBe('# Lesson Generation Report');
    expect(lines).toContain('| Skipped (conflicts) | 1 |');
    expect(lines).toContain('| 1 | 2024-01-08 | room conflict |');
    expect(lines).toContain('- **Pattern 2**: Recurring pattern 2 not found');
  });

  it('renders json with totals', () => {
    const parsed: unknown = JSON.parse(generateRunReport(run, { format: 'json' }));
    expect(parsed).toMatchObject({ horizonEnd: '2024-01-22', totals: { skipped: 1 } });
  });

  it('renders plain text', () => {
    const lines = generateRunReport(run, { format: 'text' }).split('\n');

    expect(lines).toContain('  Skipped:            1');
    expect(lines).toContain('    • 2024-01-08 room conflict');
    expect(lines).toContain('  Pattern 2 failed: Recurring pattern 2 not found');
  });
});

describe('schedule reports', () => {
  const items = [
    item(),
    item({ lessonId: 2, date: '2024-01-01' }),
    item({
      lessonId: 3,
      startTime: '18:00',
      endTime: '19:00',
      teacherId: 9,
      roomId: null,
      studentIds: [],
      status: 'cancelled',
      isRecurring: false,
    }),
  ];

  it('groups markdown by date', () => {
    const lines = generateScheduleReport(items, { format: 'markdown', title: 'Studio 1' }).split('\n');

    expect(lines[0]).toBe('# Studio 1');
    const headings = lines.filter(l => l.startsWith('## '));
    expect(headings).toEqual(['## Monday 2024-01-01', '## Monday 2024-01-08']);
    expect(lines).toContain('| 10:00-11:00 | 7 | 3 | 101 | scheduled | recurring |');
    expect(lines).toContain('| 18:00-19:00 | 9 | online | - | cancelled | one-off |');
  });

  it('marks exceptions', () => {
    const lines = generateScheduleReport([item({ isException: true })], { format: 'markdown' }).split('\n');
    expect(lines).toContain('| 10:00-11:00 | 7 | 3 | 101 | scheduled | exception |');
  });

  it('says so when there is nothing to show', () => {
    expect(generateScheduleReport([], { format: 'markdown' })).toBe('# Lesson Schedule\n\n_No lessons._');
  });

  it('renders plain text rows', () => {
    const lines = generateScheduleReport([item()], { format: 'text' }).split('\n');

    expect(lines).toContain('Monday 2024-01-08');
    expect(lines).toContain('  10:00-11:00  teacher 7    room 3    students 101        scheduled (recurring)');
  });

  it('renders json', () => {
    const parsed: unknown = JSON.parse(generateScheduleReport([item()], { format: 'json' }));
    expect(parsed).toEqual({ lessons: [item()] });
  });
});

describe('dayName', () => {
  it('names ISO weekdays', () => {
    expect(dayName('2024-01-01')).toBe('Monday');
    expect(dayName('2024-01-07')).toBe('Sunday');
  });
});
