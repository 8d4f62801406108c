import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadSeedFile, parseSeedData } from '../data-loader';
import { ValidationError } from '../../errors';

const pattern = {
  studioId: 1,
  teacherId: 7,
  roomId: 3,
  dayOfWeek: 1,
  startTime: '10:00',
  validFrom: '2024-01-01',
  studentIds: [101, 101],
};

describe('parseSeedData', () => {
  it('fills in defaults', () => {
    const seed = parseSeedData({ patterns: [pattern] }, 45);

    expect(seed.lessons).toEqual([]);
    expect(seed.patterns[0]).toEqual({
      ...pattern,
      durationMinutes: 45,
      validUntil: null,
      notes: null,
      studentIds: [101],
    });
  });

  it('names the broken field', () => {
    const attempt = () => parseSeedData({ patterns: [{ ...pattern, dayOfWeek: 0 }] });

    expect(attempt).toThrow(ValidationError);
    expect(attempt).toThrow('Invalid seed file: patterns.0.dayOfWeek: Day of week must be 1 (Monday) to 7 (Sunday)');
  });
});

describe('loadSeedFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lesson-seed-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a seed file', async () => {
    const path = join(dir, 'seed.json');
    await writeFile(path, JSON.stringify({
      patterns: [pattern],
      lessons: [{ studioId: 1, teacherId: 8, date: '2024-01-03', startTime: '09:00' }],
    }));

    const seed = await loadSeedFile(path);

    expect(seed.patterns).toHaveLength(1);
    expect(seed.lessons[0]).toMatchObject({ roomId: null, durationMinutes: 60, studentIds: [] });
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'missing.json');
    await expect(loadSeedFile(path)).rejects.toThrow(`File not found: ${path}`);
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "patterns": ');

    await expect(loadSeedFile(path)).rejects.toThrow(`Seed file ${path} is not valid JSON`);
  });
});

describe('demo seed', () => {
  it('is valid', async () => {
    const seed = await loadSeedFile(fileURLToPath(new URL('../../../data/demo/patterns.json', import.meta.url)));
    expect(seed.patterns).toHaveLength(6);
    expect(seed.lessons).toHaveLength(1);
  });
});
