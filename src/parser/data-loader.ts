/**
 * Data loader for seed files
 *
 * A seed file is JSON with recurring patterns and optional one-off lessons:
 *   { "patterns": [ ... ], "lessons": [ ... ] }
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { ValidationError } from '../errors';
import type { LessonInput, PatternInput } from '../types';
import {
  createLessonInputSchema,
  createPatternInputSchema,
  parseInput,
} from '../validation';

export interface SeedData {
  patterns: PatternInput[];
  lessons: LessonInput[];
}

export function createSeedSchema(defaultDuration?: number) {
  return z.object({
    patterns: z.array(createPatternInputSchema(defaultDuration)),
    lessons: z.array(createLessonInputSchema(defaultDuration)).default([]),
  });
}

export function parseSeedData(value: unknown, defaultDuration?: number): SeedData {
  return parseInput(createSeedSchema(defaultDuration), value, 'seed file');
}

export async function loadSeedFile(path: string, defaultDuration?: number): Promise<SeedData> {
  if (!existsSync(path)) {
    throw new ValidationError(`File not found: ${path}`, [{ path: 'file', message: 'not found' }]);
  }

  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Seed file ${path} is not valid JSON: ${message}`);
  }

  return parseSeedData(raw, defaultDuration);
}
